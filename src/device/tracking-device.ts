import { DelegatingDevice } from './delegating-device';
import {
  BindingLayoutCreateInfo, BindingLayoutHandle, BindingPoolCreateInfo, BindingPoolHandle, BindingSetHandle,
  BufferCreateInfo, BufferHandle, CommandPoolCreateInfo, CommandPoolHandle, CommandUnitCreateInfo, CommandUnitHandle,
  CompletionSignalCreateInfo, ComputePipelineCreateInfo, Handle, KernelCreateInfo, KernelHandle, MemoryAllocateInfo,
  MemoryHandle, OBJECT_KINDS, ObjectKind, PipelineHandle, PipelineLayoutCreateInfo, PipelineLayoutHandle,
  SignalHandle, describeHandle,
} from './types';

/**
 * Counts outstanding creations against destructions per object kind.
 *
 * Sets and command units die with their pool, so the tracker remembers which
 * pool each came from and retires them when the pool goes.
 */
export class TrackingDevice extends DelegatingDevice {
  private readonly live = new Map<string, Handle<ObjectKind>>();
  private readonly children = new Map<string, Set<string>>();

  private track<H extends Handle<ObjectKind>>(handle: H, parent?: Handle<ObjectKind>): H {
    const key = describeHandle(handle);
    this.live.set(key, handle);
    if (parent) {
      const parentKey = describeHandle(parent);
      const set = this.children.get(parentKey) ?? new Set<string>();
      set.add(key);
      this.children.set(parentKey, set);
    }
    return handle;
  }

  private retire(handle: Handle<ObjectKind>) {
    const key = describeHandle(handle);
    this.live.delete(key);
    this.children.get(key)?.forEach(child => this.live.delete(child));
    this.children.delete(key);
  }

  /** Live object count per kind; kinds with nothing live are omitted. */
  liveObjects(): Map<ObjectKind, number> {
    const counts = new Map<ObjectKind, number>();
    for (const kind of OBJECT_KINDS) {
      const n = [...this.live.values()].filter(h => h.kind === kind).length;
      if (n > 0) counts.set(kind, n);
    }
    return counts;
  }

  get liveCount(): number {
    return this.live.size;
  }

  liveHandles(): Handle<ObjectKind>[] {
    return [...this.live.values()];
  }

  // -------------------------------------------------------
  // Creation
  // -------------------------------------------------------

  override allocateMemory(info: MemoryAllocateInfo): MemoryHandle {
    return this.track(super.allocateMemory(info));
  }

  override createBuffer(info: BufferCreateInfo): BufferHandle {
    return this.track(super.createBuffer(info));
  }

  override createBindingLayout(info: BindingLayoutCreateInfo): BindingLayoutHandle {
    return this.track(super.createBindingLayout(info));
  }

  override createBindingPool(info: BindingPoolCreateInfo): BindingPoolHandle {
    return this.track(super.createBindingPool(info));
  }

  override allocateBindingSet(pool: BindingPoolHandle, layout: BindingLayoutHandle): BindingSetHandle {
    return this.track(super.allocateBindingSet(pool, layout), pool);
  }

  override async createKernelObject(info: KernelCreateInfo): Promise<KernelHandle> {
    return this.track(await super.createKernelObject(info));
  }

  override createPipelineLayout(info: PipelineLayoutCreateInfo): PipelineLayoutHandle {
    return this.track(super.createPipelineLayout(info));
  }

  override async createComputePipeline(info: ComputePipelineCreateInfo): Promise<PipelineHandle> {
    return this.track(await super.createComputePipeline(info));
  }

  override createCommandPool(info: CommandPoolCreateInfo): CommandPoolHandle {
    return this.track(super.createCommandPool(info));
  }

  override createCommandUnit(info: CommandUnitCreateInfo): CommandUnitHandle {
    return this.track(super.createCommandUnit(info), info.pool);
  }

  override createCompletionSignal(info: CompletionSignalCreateInfo): SignalHandle {
    return this.track(super.createCompletionSignal(info));
  }

  // -------------------------------------------------------
  // Destruction
  // -------------------------------------------------------

  override freeMemory(memory: MemoryHandle): void {
    super.freeMemory(memory);
    this.retire(memory);
  }

  override destroyBuffer(buffer: BufferHandle): void {
    super.destroyBuffer(buffer);
    this.retire(buffer);
  }

  override destroyBindingLayout(layout: BindingLayoutHandle): void {
    super.destroyBindingLayout(layout);
    this.retire(layout);
  }

  override destroyBindingPool(pool: BindingPoolHandle): void {
    super.destroyBindingPool(pool);
    this.retire(pool);
  }

  override freeBindingSet(pool: BindingPoolHandle, set: BindingSetHandle): void {
    super.freeBindingSet(pool, set);
    this.retire(set);
    this.children.get(describeHandle(pool))?.delete(describeHandle(set));
  }

  override destroyKernelObject(kernel: KernelHandle): void {
    super.destroyKernelObject(kernel);
    this.retire(kernel);
  }

  override destroyPipelineLayout(layout: PipelineLayoutHandle): void {
    super.destroyPipelineLayout(layout);
    this.retire(layout);
  }

  override destroyPipeline(pipeline: PipelineHandle): void {
    super.destroyPipeline(pipeline);
    this.retire(pipeline);
  }

  override destroyCommandPool(pool: CommandPoolHandle): void {
    super.destroyCommandPool(pool);
    this.retire(pool);
  }

  override freeCommandUnit(pool: CommandPoolHandle, unit: CommandUnitHandle): void {
    super.freeCommandUnit(pool, unit);
    this.retire(unit);
    this.children.get(describeHandle(pool))?.delete(describeHandle(unit));
  }

  override destroyCompletionSignal(signal: SignalHandle): void {
    super.destroyCompletionSignal(signal);
    this.retire(signal);
  }
}
