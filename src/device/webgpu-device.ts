/// <reference types="@webgpu/types" />
/**
 * @file webgpu-device.ts
 * @description `DeviceInterface` on top of a WebGPU `GPUDevice`, consuming WGSL.
 *
 * WebGPU has no separate memory objects, so a "memory" is a host staging view
 * that is attached to exactly one GPU buffer by `bindBufferMemory`. Flushing
 * uploads through `queue.writeBuffer`; invalidating copies back through a
 * MAP_READ staging buffer.
 *
 * @external-interactions
 * - Requires the WebGPU globals (`GPUBufferUsage`, `GPUShaderStage`, `GPUMapMode`);
 *   `device-factory.ts` installs them from the `webgpu` package under Node.
 *
 * @pitfalls
 * - Bind groups are immutable in WebGPU, so the group for a binding set is
 *   created when the set is first bound, after all writes have landed.
 * - Command validation errors are only reported asynchronously; they are
 *   collected with an error scope around `submit` and surface from `waitOnSignal`.
 */
import { DeviceError } from '../errors/harness-error';
import { log } from '../debug/log';
import { setLongTimeout } from './long-timeout';
import { ObjectTable } from './object-table';
import {
  BindingLayoutCreateInfo, BindingLayoutHandle, BindingPoolCreateInfo, BindingPoolHandle, BindingSetHandle,
  BindingWrite, BufferCreateInfo, BufferHandle, BufferRange, CommandPoolCreateInfo, CommandPoolHandle,
  CommandUnitCreateInfo, CommandUnitHandle, CompletionSignalCreateInfo, ComputePipelineCreateInfo, DeviceInterface,
  KernelCreateInfo, KernelHandle, MemoryAllocateInfo, MemoryClass, MemoryHandle, MemoryRequirements,
  PipelineHandle, PipelineLayoutCreateInfo, PipelineLayoutHandle, ProgramFormat, RecordingBeginInfo,
  SignalHandle, WaitResult,
} from './types';

const COPY_ALIGNMENT = 4;

const alignUp = (n: number, a: number) => Math.ceil(n / a) * a;
const alignDown = (n: number, a: number) => Math.floor(n / a) * a;

interface GpuMemory {
  size: number;
  memoryClass: MemoryClass;
  hostView: Uint8Array<ArrayBuffer>;
  buffer?: number;
}

interface GpuBufferState {
  size: number;
  gpu: GPUBuffer;
  memory?: number;
}

interface GpuBindingLayout {
  info: BindingLayoutCreateInfo;
  gpu: GPUBindGroupLayout;
}

interface GpuBindingSet {
  pool: number;
  layout: number;
  slots: Map<number, BufferRange>;
  group?: GPUBindGroup;
}

interface GpuKernel {
  module: GPUShaderModule;
  entryPoint: string;
}

type GpuCommand =
  | { type: 'bind-pipeline'; pipeline: number }
  | { type: 'bind-sets'; firstSet: number; sets: number[] }
  | { type: 'dispatch'; groups: [number, number, number] };

interface GpuCommandUnit {
  pool: number;
  phase: 'initial' | 'recording' | 'executable' | 'pending' | 'invalid';
  oneTimeSubmit: boolean;
  commands: GpuCommand[];
}

interface GpuSignal {
  phase: 'unsignaled' | 'pending' | 'signaled';
  done?: Promise<void>;
  validation?: Promise<GPUError | null>;
  units: number[];
}

export class WebGpuDevice implements DeviceInterface {
  readonly name = 'webgpu';
  readonly programFormat: ProgramFormat = 'wgsl';

  private lostReason: string | null = null;
  private readonly ids = { next: 1 };

  private readonly memories = new ObjectTable<'memory', GpuMemory>('memory', this.ids);
  private readonly buffers = new ObjectTable<'buffer', GpuBufferState>('buffer', this.ids);
  private readonly bindingLayouts = new ObjectTable<'binding-layout', GpuBindingLayout>('binding-layout', this.ids);
  private readonly bindingPools = new ObjectTable<'binding-pool', { maxSets: number; sets: Set<number> }>('binding-pool', this.ids);
  private readonly bindingSets = new ObjectTable<'binding-set', GpuBindingSet>('binding-set', this.ids);
  private readonly kernels = new ObjectTable<'kernel', GpuKernel>('kernel', this.ids);
  private readonly pipelineLayouts = new ObjectTable<'pipeline-layout', GPUPipelineLayout>('pipeline-layout', this.ids);
  private readonly pipelines = new ObjectTable<'pipeline', GPUComputePipeline>('pipeline', this.ids);
  private readonly commandPools = new ObjectTable<'command-pool', { units: Set<number> }>('command-pool', this.ids);
  private readonly commandUnits = new ObjectTable<'command-unit', GpuCommandUnit>('command-unit', this.ids);
  private readonly signals = new ObjectTable<'signal', GpuSignal>('signal', this.ids);

  constructor(private readonly device: GPUDevice) {
    void device.lost.then((info) => {
      log.error('WebGpuDevice', `Device lost: ${info.message}`);
      this.lostReason = info.message || info.reason;
    });
  }

  private alive(operation: string) {
    if (this.lostReason !== null) throw new DeviceError(operation, 'device-lost', this.lostReason);
  }

  // -------------------------------------------------------
  // Memory & buffers
  // -------------------------------------------------------

  getBufferMemoryRequirements(buffer: BufferHandle): MemoryRequirements {
    const state = this.buffers.get(buffer, 'getBufferMemoryRequirements');
    return { size: state.gpu.size, alignment: COPY_ALIGNMENT };
  }

  allocateMemory(info: MemoryAllocateInfo): MemoryHandle {
    this.alive('allocateMemory');
    if (!Number.isInteger(info.size) || info.size < 0) {
      throw new DeviceError('allocateMemory', 'invalid-argument', `bad size ${info.size}`);
    }
    return this.memories.add({ size: info.size, memoryClass: info.memoryClass, hostView: new Uint8Array(info.size) });
  }

  freeMemory(memory: MemoryHandle): void {
    const state = this.memories.get(memory, 'freeMemory');
    if (state.buffer !== undefined && this.buffers.getById(state.buffer)) {
      throw new DeviceError('freeMemory', 'invalid-argument', `memory still bound to buffer #${state.buffer}`);
    }
    this.memories.delete(memory, 'freeMemory');
  }

  mapMemory(memory: MemoryHandle): Uint8Array {
    const state = this.memories.get(memory, 'mapMemory');
    if (state.memoryClass !== 'host-visible') {
      throw new DeviceError('mapMemory', 'invalid-argument', 'memory is not host-visible');
    }
    return state.hostView;
  }

  private boundBuffer(operation: string, state: GpuMemory, offset: number, size: number): GpuBufferState | undefined {
    if (offset < 0 || size < 0 || offset + size > state.size) {
      throw new DeviceError(operation, 'invalid-argument', `range [${offset}, ${offset + size}) outside allocation of ${state.size} bytes`);
    }
    return state.buffer === undefined ? undefined : this.buffers.getById(state.buffer);
  }

  flushMappedRange(memory: MemoryHandle, offset: number, size: number): void {
    this.alive('flushMappedRange');
    const state = this.memories.get(memory, 'flushMappedRange');
    const buffer = this.boundBuffer('flushMappedRange', state, offset, size);
    if (!buffer || size === 0) return;
    const start = alignDown(offset, COPY_ALIGNMENT);
    const end = Math.min(alignUp(offset + size, COPY_ALIGNMENT), buffer.gpu.size, state.size);
    if (end > start) this.device.queue.writeBuffer(buffer.gpu, start, state.hostView, start, end - start);
  }

  async invalidateMappedRange(memory: MemoryHandle, offset: number, size: number): Promise<void> {
    this.alive('invalidateMappedRange');
    const state = this.memories.get(memory, 'invalidateMappedRange');
    const buffer = this.boundBuffer('invalidateMappedRange', state, offset, size);
    if (!buffer || size === 0) return;

    const start = alignDown(offset, COPY_ALIGNMENT);
    const end = Math.min(alignUp(offset + size, COPY_ALIGNMENT), buffer.gpu.size);
    const staging = this.device.createBuffer({ size: end - start, usage: GPUBufferUsage.MAP_READ | GPUBufferUsage.COPY_DST });
    try {
      const encoder = this.device.createCommandEncoder();
      encoder.copyBufferToBuffer(buffer.gpu, start, staging, 0, end - start);
      this.device.queue.submit([encoder.finish()]);
      await staging.mapAsync(GPUMapMode.READ);
      const bytes = new Uint8Array(staging.getMappedRange());
      state.hostView.set(bytes.subarray(offset - start, offset - start + size), offset);
      staging.unmap();
    } catch (err) {
      throw new DeviceError('invalidateMappedRange', 'device-lost', err instanceof Error ? err.message : String(err), { cause: err });
    } finally {
      staging.destroy();
    }
  }

  createBuffer(info: BufferCreateInfo): BufferHandle {
    this.alive('createBuffer');
    if (!Number.isInteger(info.size) || info.size < 0) {
      throw new DeviceError('createBuffer', 'invalid-argument', `bad size ${info.size}`);
    }
    const gpu = this.device.createBuffer({
      size: Math.max(COPY_ALIGNMENT, alignUp(info.size, COPY_ALIGNMENT)),
      usage: GPUBufferUsage.STORAGE | GPUBufferUsage.COPY_SRC | GPUBufferUsage.COPY_DST,
    });
    return this.buffers.add({ size: info.size, gpu });
  }

  destroyBuffer(buffer: BufferHandle): void {
    this.buffers.delete(buffer, 'destroyBuffer').gpu.destroy();
  }

  bindBufferMemory(buffer: BufferHandle, memory: MemoryHandle, offset: number): void {
    const bufferState = this.buffers.get(buffer, 'bindBufferMemory');
    const memoryState = this.memories.get(memory, 'bindBufferMemory');
    if (offset !== 0) throw new DeviceError('bindBufferMemory', 'unsupported', 'sub-allocation is not supported');
    if (bufferState.memory !== undefined || memoryState.buffer !== undefined) {
      throw new DeviceError('bindBufferMemory', 'invalid-argument', 'buffer or memory already bound');
    }
    if (memoryState.size < bufferState.gpu.size) {
      throw new DeviceError('bindBufferMemory', 'invalid-argument', `memory of ${memoryState.size} bytes is too small`);
    }
    bufferState.memory = memory.id;
    memoryState.buffer = buffer.id;
  }

  // -------------------------------------------------------
  // Bindings
  // -------------------------------------------------------

  createBindingLayout(info: BindingLayoutCreateInfo): BindingLayoutHandle {
    this.alive('createBindingLayout');
    const gpu = this.device.createBindGroupLayout({
      entries: info.entries.map(e => ({
        binding: e.binding,
        visibility: GPUShaderStage.COMPUTE,
        buffer: { type: 'storage' },
      })),
    });
    return this.bindingLayouts.add({ info, gpu });
  }

  destroyBindingLayout(layout: BindingLayoutHandle): void {
    this.bindingLayouts.delete(layout, 'destroyBindingLayout');
  }

  createBindingPool(info: BindingPoolCreateInfo): BindingPoolHandle {
    if (info.maxSets < 1) throw new DeviceError('createBindingPool', 'invalid-argument', 'maxSets must be at least 1');
    return this.bindingPools.add({ maxSets: info.maxSets, sets: new Set() });
  }

  destroyBindingPool(pool: BindingPoolHandle): void {
    this.bindingPools.delete(pool, 'destroyBindingPool').sets.forEach(id => this.bindingSets.deleteById(id));
  }

  allocateBindingSet(pool: BindingPoolHandle, layout: BindingLayoutHandle): BindingSetHandle {
    const poolState = this.bindingPools.get(pool, 'allocateBindingSet');
    this.bindingLayouts.get(layout, 'allocateBindingSet');
    if (poolState.sets.size >= poolState.maxSets) {
      throw new DeviceError('allocateBindingSet', 'out-of-memory', 'binding pool exhausted');
    }
    const handle = this.bindingSets.add({ pool: pool.id, layout: layout.id, slots: new Map() });
    poolState.sets.add(handle.id);
    return handle;
  }

  freeBindingSet(pool: BindingPoolHandle, set: BindingSetHandle): void {
    const poolState = this.bindingPools.get(pool, 'freeBindingSet');
    this.bindingSets.delete(set, 'freeBindingSet');
    poolState.sets.delete(set.id);
  }

  updateBindingSet(writes: BindingWrite[]): void {
    for (const write of writes) {
      const set = this.bindingSets.get(write.set, 'updateBindingSet');
      if (set.group) throw new DeviceError('updateBindingSet', 'unsupported', 'set was already bound');
      this.buffers.get(write.range.buffer, 'updateBindingSet');
      set.slots.set(write.binding, { ...write.range });
    }
  }

  private bindGroupFor(set: GpuBindingSet): GPUBindGroup {
    if (set.group) return set.group;
    const layout = this.bindingLayouts.getById(set.layout);
    if (!layout) throw new DeviceError('bindBindingSet', 'invalid-argument', 'set layout was destroyed');
    const entries: GPUBindGroupEntry[] = [...set.slots].map(([binding, range]) => {
      const buffer = this.buffers.getById(range.buffer.id);
      if (!buffer) throw new DeviceError('bindBindingSet', 'invalid-argument', `buffer #${range.buffer.id} was destroyed`);
      return { binding, resource: { buffer: buffer.gpu, offset: range.offset, size: range.length } };
    });
    set.group = this.device.createBindGroup({ layout: layout.gpu, entries });
    return set.group;
  }

  // -------------------------------------------------------
  // Kernels & pipelines
  // -------------------------------------------------------

  async createKernelObject(info: KernelCreateInfo): Promise<KernelHandle> {
    this.alive('createKernelObject');
    if (info.binary.format !== this.programFormat) {
      throw new DeviceError('createKernelObject', 'invalid-program', `expected ${this.programFormat} binary, got ${info.binary.format}`);
    }
    const code = new TextDecoder().decode(info.binary.bytes);
    const module = this.device.createShaderModule({ code });
    const compilation = await module.getCompilationInfo();
    const errors = compilation.messages.filter(m => m.type === 'error');
    if (errors.length > 0) {
      const formatted = errors.map(m => `[${m.lineNum}:${m.linePos}] ${m.message}`).join('\n');
      throw new DeviceError('createKernelObject', 'invalid-program', `${info.binary.name}:\n${formatted}`);
    }
    return this.kernels.add({ module, entryPoint: info.entryPoint });
  }

  destroyKernelObject(kernel: KernelHandle): void {
    this.kernels.delete(kernel, 'destroyKernelObject');
  }

  createPipelineLayout(info: PipelineLayoutCreateInfo): PipelineLayoutHandle {
    this.alive('createPipelineLayout');
    if (info.pushConstantRanges.length > 0) {
      throw new DeviceError('createPipelineLayout', 'unsupported', 'push constants are not supported');
    }
    const bindGroupLayouts = info.setLayouts.map(l => this.bindingLayouts.get(l, 'createPipelineLayout').gpu);
    return this.pipelineLayouts.add(this.device.createPipelineLayout({ bindGroupLayouts }));
  }

  destroyPipelineLayout(layout: PipelineLayoutHandle): void {
    this.pipelineLayouts.delete(layout, 'destroyPipelineLayout');
  }

  async createComputePipeline(info: ComputePipelineCreateInfo): Promise<PipelineHandle> {
    this.alive('createComputePipeline');
    const kernel = this.kernels.get(info.kernel, 'createComputePipeline');
    const layout = this.pipelineLayouts.get(info.layout, 'createComputePipeline');
    try {
      const pipeline = await this.device.createComputePipelineAsync({
        layout,
        compute: { module: kernel.module, entryPoint: kernel.entryPoint },
      });
      return this.pipelines.add(pipeline);
    } catch (err) {
      throw new DeviceError('createComputePipeline', 'invalid-program', err instanceof Error ? err.message : String(err), { cause: err });
    }
  }

  destroyPipeline(pipeline: PipelineHandle): void {
    this.pipelines.delete(pipeline, 'destroyPipeline');
  }

  // -------------------------------------------------------
  // Commands
  // -------------------------------------------------------

  createCommandPool(info: CommandPoolCreateInfo): CommandPoolHandle {
    if (info.queueFamilyIndex !== 0) {
      throw new DeviceError('createCommandPool', 'invalid-argument', `no queue family ${info.queueFamilyIndex}`);
    }
    return this.commandPools.add({ units: new Set() });
  }

  destroyCommandPool(pool: CommandPoolHandle): void {
    this.commandPools.delete(pool, 'destroyCommandPool').units.forEach(id => this.commandUnits.deleteById(id));
  }

  createCommandUnit(info: CommandUnitCreateInfo): CommandUnitHandle {
    const pool = this.commandPools.get(info.pool, 'createCommandUnit');
    const handle = this.commandUnits.add({ pool: info.pool.id, phase: 'initial', oneTimeSubmit: false, commands: [] });
    pool.units.add(handle.id);
    return handle;
  }

  freeCommandUnit(pool: CommandPoolHandle, unit: CommandUnitHandle): void {
    const poolState = this.commandPools.get(pool, 'freeCommandUnit');
    this.commandUnits.delete(unit, 'freeCommandUnit');
    poolState.units.delete(unit.id);
  }

  private recording(unit: CommandUnitHandle, operation: string): GpuCommandUnit {
    const state = this.commandUnits.get(unit, operation);
    if (state.phase !== 'recording') {
      throw new DeviceError(operation, 'invalid-argument', `command unit is ${state.phase}, not recording`);
    }
    return state;
  }

  beginRecording(unit: CommandUnitHandle, info: RecordingBeginInfo): void {
    const state = this.commandUnits.get(unit, 'beginRecording');
    if (state.phase === 'pending' || state.phase === 'recording') {
      throw new DeviceError('beginRecording', 'invalid-argument', `command unit is ${state.phase}`);
    }
    state.phase = 'recording';
    state.oneTimeSubmit = info.oneTimeSubmit;
    state.commands = [];
  }

  endRecording(unit: CommandUnitHandle): void {
    this.recording(unit, 'endRecording').phase = 'executable';
  }

  bindPipeline(unit: CommandUnitHandle, pipeline: PipelineHandle): void {
    const state = this.recording(unit, 'bindPipeline');
    this.pipelines.get(pipeline, 'bindPipeline');
    state.commands.push({ type: 'bind-pipeline', pipeline: pipeline.id });
  }

  bindBindingSet(unit: CommandUnitHandle, layout: PipelineLayoutHandle, firstSet: number, sets: BindingSetHandle[]): void {
    const state = this.recording(unit, 'bindBindingSet');
    this.pipelineLayouts.get(layout, 'bindBindingSet');
    sets.forEach(set => this.bindingSets.get(set, 'bindBindingSet'));
    state.commands.push({ type: 'bind-sets', firstSet, sets: sets.map(s => s.id) });
  }

  dispatch(unit: CommandUnitHandle, x: number, y: number, z: number): void {
    const state = this.recording(unit, 'dispatch');
    state.commands.push({ type: 'dispatch', groups: [x, y, z] });
  }

  // -------------------------------------------------------
  // Submission
  // -------------------------------------------------------

  createCompletionSignal(info: CompletionSignalCreateInfo): SignalHandle {
    return this.signals.add({ phase: info.signaled ? 'signaled' : 'unsignaled', units: [] });
  }

  destroyCompletionSignal(signal: SignalHandle): void {
    const state = this.signals.delete(signal, 'destroyCompletionSignal');
    if (state.phase === 'pending') {
      log.warn('WebGpuDevice', `Destroying signal #${signal.id} with work still in flight`);
    }
  }

  private encode(unit: GpuCommandUnit): GPUCommandBuffer {
    const encoder = this.device.createCommandEncoder();
    const pass = encoder.beginComputePass();
    for (const command of unit.commands) {
      switch (command.type) {
        case 'bind-pipeline': {
          const pipeline = this.pipelines.getById(command.pipeline);
          if (!pipeline) throw new DeviceError('submit', 'invalid-argument', `pipeline #${command.pipeline} was destroyed`);
          pass.setPipeline(pipeline);
          break;
        }
        case 'bind-sets':
          command.sets.forEach((id, i) => {
            const set = this.bindingSets.getById(id);
            if (!set) throw new DeviceError('submit', 'invalid-argument', `binding set #${id} was destroyed`);
            pass.setBindGroup(command.firstSet + i, this.bindGroupFor(set));
          });
          break;
        case 'dispatch':
          pass.dispatchWorkgroups(...command.groups);
          break;
      }
    }
    pass.end();
    return encoder.finish();
  }

  submit(queueIndex: number, units: CommandUnitHandle[], signal: SignalHandle): void {
    this.alive('submit');
    if (queueIndex !== 0) throw new DeviceError('submit', 'invalid-argument', `no queue ${queueIndex}`);
    const signalState = this.signals.get(signal, 'submit');
    if (signalState.phase !== 'unsignaled') {
      throw new DeviceError('submit', 'invalid-argument', `signal is already ${signalState.phase}`);
    }
    const states = units.map(unit => {
      const state = this.commandUnits.get(unit, 'submit');
      if (state.phase !== 'executable') {
        throw new DeviceError('submit', 'invalid-argument', `command unit #${unit.id} is ${state.phase}`);
      }
      return state;
    });

    this.device.pushErrorScope('validation');
    try {
      this.device.queue.submit(states.map(state => this.encode(state)));
    } finally {
      signalState.validation = this.device.popErrorScope();
    }

    states.forEach(state => { state.phase = state.oneTimeSubmit ? 'invalid' : 'executable'; });
    signalState.phase = 'pending';
    signalState.units = units.map(u => u.id);
    signalState.done = this.device.queue.onSubmittedWorkDone().then(() => {
      signalState.phase = 'signaled';
    });
  }

  async waitOnSignal(signal: SignalHandle, timeoutMs: number | null): Promise<WaitResult> {
    const state = this.signals.get(signal, 'waitOnSignal');
    if (state.phase === 'signaled') return 'signaled';
    const done = state.done;
    if (!done) throw new DeviceError('waitOnSignal', 'invalid-argument', 'no work was submitted with this signal');

    const validation = await state.validation;
    if (validation) throw new DeviceError('submit', 'invalid-argument', validation.message);

    if (timeoutMs === null) {
      await done;
      return 'signaled';
    }
    let cancelTimer = () => {};
    const timeout = new Promise<WaitResult>(resolve => {
      cancelTimer = setLongTimeout(() => resolve('timeout'), timeoutMs);
    });
    try {
      return await Promise.race([done.then((): WaitResult => 'signaled'), timeout]);
    } finally {
      cancelTimer();
    }
  }
}
