import {
  BindingLayoutCreateInfo, BindingLayoutHandle, BindingPoolCreateInfo, BindingPoolHandle, BindingSetHandle,
  BindingWrite, BufferCreateInfo, BufferHandle, CommandPoolCreateInfo, CommandPoolHandle, CommandUnitCreateInfo,
  CommandUnitHandle, CompletionSignalCreateInfo, ComputePipelineCreateInfo, DeviceInterface, DeviceOperation,
  KernelCreateInfo, KernelHandle, MemoryAllocateInfo, MemoryHandle, MemoryRequirements, PipelineHandle,
  PipelineLayoutCreateInfo, PipelineLayoutHandle, ProgramFormat, RecordingBeginInfo, SignalHandle, WaitResult,
} from './types';

/**
 * Forwards every call to an inner device. Subclasses hook `before` to observe
 * or veto calls, or override individual operations.
 */
export class DelegatingDevice implements DeviceInterface {
  constructor(protected readonly inner: DeviceInterface) { }

  get name(): string {
    return this.inner.name;
  }

  get programFormat(): ProgramFormat {
    return this.inner.programFormat;
  }

  protected before(_operation: DeviceOperation): void { }

  getBufferMemoryRequirements(buffer: BufferHandle): MemoryRequirements {
    this.before('getBufferMemoryRequirements');
    return this.inner.getBufferMemoryRequirements(buffer);
  }

  allocateMemory(info: MemoryAllocateInfo): MemoryHandle {
    this.before('allocateMemory');
    return this.inner.allocateMemory(info);
  }

  freeMemory(memory: MemoryHandle): void {
    this.before('freeMemory');
    this.inner.freeMemory(memory);
  }

  mapMemory(memory: MemoryHandle): Uint8Array {
    this.before('mapMemory');
    return this.inner.mapMemory(memory);
  }

  flushMappedRange(memory: MemoryHandle, offset: number, size: number): void {
    this.before('flushMappedRange');
    this.inner.flushMappedRange(memory, offset, size);
  }

  async invalidateMappedRange(memory: MemoryHandle, offset: number, size: number): Promise<void> {
    this.before('invalidateMappedRange');
    await this.inner.invalidateMappedRange(memory, offset, size);
  }

  createBuffer(info: BufferCreateInfo): BufferHandle {
    this.before('createBuffer');
    return this.inner.createBuffer(info);
  }

  destroyBuffer(buffer: BufferHandle): void {
    this.before('destroyBuffer');
    this.inner.destroyBuffer(buffer);
  }

  bindBufferMemory(buffer: BufferHandle, memory: MemoryHandle, offset: number): void {
    this.before('bindBufferMemory');
    this.inner.bindBufferMemory(buffer, memory, offset);
  }

  createBindingLayout(info: BindingLayoutCreateInfo): BindingLayoutHandle {
    this.before('createBindingLayout');
    return this.inner.createBindingLayout(info);
  }

  destroyBindingLayout(layout: BindingLayoutHandle): void {
    this.before('destroyBindingLayout');
    this.inner.destroyBindingLayout(layout);
  }

  createBindingPool(info: BindingPoolCreateInfo): BindingPoolHandle {
    this.before('createBindingPool');
    return this.inner.createBindingPool(info);
  }

  destroyBindingPool(pool: BindingPoolHandle): void {
    this.before('destroyBindingPool');
    this.inner.destroyBindingPool(pool);
  }

  allocateBindingSet(pool: BindingPoolHandle, layout: BindingLayoutHandle): BindingSetHandle {
    this.before('allocateBindingSet');
    return this.inner.allocateBindingSet(pool, layout);
  }

  freeBindingSet(pool: BindingPoolHandle, set: BindingSetHandle): void {
    this.before('freeBindingSet');
    this.inner.freeBindingSet(pool, set);
  }

  updateBindingSet(writes: BindingWrite[]): void {
    this.before('updateBindingSet');
    this.inner.updateBindingSet(writes);
  }

  async createKernelObject(info: KernelCreateInfo): Promise<KernelHandle> {
    this.before('createKernelObject');
    return this.inner.createKernelObject(info);
  }

  destroyKernelObject(kernel: KernelHandle): void {
    this.before('destroyKernelObject');
    this.inner.destroyKernelObject(kernel);
  }

  createPipelineLayout(info: PipelineLayoutCreateInfo): PipelineLayoutHandle {
    this.before('createPipelineLayout');
    return this.inner.createPipelineLayout(info);
  }

  destroyPipelineLayout(layout: PipelineLayoutHandle): void {
    this.before('destroyPipelineLayout');
    this.inner.destroyPipelineLayout(layout);
  }

  async createComputePipeline(info: ComputePipelineCreateInfo): Promise<PipelineHandle> {
    this.before('createComputePipeline');
    return this.inner.createComputePipeline(info);
  }

  destroyPipeline(pipeline: PipelineHandle): void {
    this.before('destroyPipeline');
    this.inner.destroyPipeline(pipeline);
  }

  createCommandPool(info: CommandPoolCreateInfo): CommandPoolHandle {
    this.before('createCommandPool');
    return this.inner.createCommandPool(info);
  }

  destroyCommandPool(pool: CommandPoolHandle): void {
    this.before('destroyCommandPool');
    this.inner.destroyCommandPool(pool);
  }

  createCommandUnit(info: CommandUnitCreateInfo): CommandUnitHandle {
    this.before('createCommandUnit');
    return this.inner.createCommandUnit(info);
  }

  freeCommandUnit(pool: CommandPoolHandle, unit: CommandUnitHandle): void {
    this.before('freeCommandUnit');
    this.inner.freeCommandUnit(pool, unit);
  }

  beginRecording(unit: CommandUnitHandle, info: RecordingBeginInfo): void {
    this.before('beginRecording');
    this.inner.beginRecording(unit, info);
  }

  endRecording(unit: CommandUnitHandle): void {
    this.before('endRecording');
    this.inner.endRecording(unit);
  }

  bindPipeline(unit: CommandUnitHandle, pipeline: PipelineHandle): void {
    this.before('bindPipeline');
    this.inner.bindPipeline(unit, pipeline);
  }

  bindBindingSet(unit: CommandUnitHandle, layout: PipelineLayoutHandle, firstSet: number, sets: BindingSetHandle[]): void {
    this.before('bindBindingSet');
    this.inner.bindBindingSet(unit, layout, firstSet, sets);
  }

  dispatch(unit: CommandUnitHandle, x: number, y: number, z: number): void {
    this.before('dispatch');
    this.inner.dispatch(unit, x, y, z);
  }

  createCompletionSignal(info: CompletionSignalCreateInfo): SignalHandle {
    this.before('createCompletionSignal');
    return this.inner.createCompletionSignal(info);
  }

  destroyCompletionSignal(signal: SignalHandle): void {
    this.before('destroyCompletionSignal');
    this.inner.destroyCompletionSignal(signal);
  }

  submit(queueIndex: number, units: CommandUnitHandle[], signal: SignalHandle): void {
    this.before('submit');
    this.inner.submit(queueIndex, units, signal);
  }

  async waitOnSignal(signal: SignalHandle, timeoutMs: number | null): Promise<WaitResult> {
    this.before('waitOnSignal');
    return this.inner.waitOnSignal(signal, timeoutMs);
  }
}
