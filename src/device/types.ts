/**
 * @file types.ts
 * @description The capability surface the harness consumes from a device/driver.
 *
 * Devices hand out opaque handles; the harness never looks inside them. Every
 * operation reports failure by throwing `DeviceError`.
 *
 * @pitfalls
 * - `invalidateMappedRange`, `createKernelObject`, `createComputePipeline` and
 *   `waitOnSignal` are async because some backends only validate or read back
 *   asynchronously. Nothing else may suspend.
 */

// ------------------------------------------------------------------
// Handles
// ------------------------------------------------------------------

export type ObjectKind =
  | 'memory'
  | 'buffer'
  | 'binding-layout'
  | 'binding-pool'
  | 'binding-set'
  | 'kernel'
  | 'pipeline-layout'
  | 'pipeline'
  | 'command-pool'
  | 'command-unit'
  | 'signal';

export const OBJECT_KINDS: readonly ObjectKind[] = [
  'memory', 'buffer', 'binding-layout', 'binding-pool', 'binding-set', 'kernel',
  'pipeline-layout', 'pipeline', 'command-pool', 'command-unit', 'signal',
];

export interface Handle<K extends ObjectKind> {
  readonly kind: K;
  readonly id: number;
}

export type MemoryHandle = Handle<'memory'>;
export type BufferHandle = Handle<'buffer'>;
export type BindingLayoutHandle = Handle<'binding-layout'>;
export type BindingPoolHandle = Handle<'binding-pool'>;
export type BindingSetHandle = Handle<'binding-set'>;
export type KernelHandle = Handle<'kernel'>;
export type PipelineLayoutHandle = Handle<'pipeline-layout'>;
export type PipelineHandle = Handle<'pipeline'>;
export type CommandPoolHandle = Handle<'command-pool'>;
export type CommandUnitHandle = Handle<'command-unit'>;
export type SignalHandle = Handle<'signal'>;

export function makeHandle<K extends ObjectKind>(kind: K, id: number): Handle<K> {
  return Object.freeze({ kind, id });
}

export function describeHandle(handle: Handle<ObjectKind>): string {
  return `${handle.kind}#${handle.id}`;
}

// ------------------------------------------------------------------
// Programs
// ------------------------------------------------------------------

/** Text formats the shipped devices consume. */
export type ProgramFormat = 'reference-asm' | 'wgsl';

export interface ProgramBinary {
  name: string;
  format: ProgramFormat;
  bytes: Uint8Array;
}

// ------------------------------------------------------------------
// Create infos
// ------------------------------------------------------------------

export type MemoryClass = 'host-visible' | 'device-local';

export interface MemoryRequirements {
  size: number;
  alignment: number;
}

export interface MemoryAllocateInfo {
  size: number;
  memoryClass: MemoryClass;
}

export type BufferUsage = 'storage';

export interface BufferCreateInfo {
  size: number;
  usage: BufferUsage;
}

export type BindingKind = 'storage-buffer';

export interface BindingLayoutEntry {
  binding: number;
  kind: BindingKind;
  stage: 'compute';
}

export interface BindingLayoutCreateInfo {
  entries: BindingLayoutEntry[];
}

export interface BindingPoolCreateInfo {
  maxSets: number;
  sizes: { kind: BindingKind; count: number }[];
  oneShot: boolean;
}

export interface BufferRange {
  buffer: BufferHandle;
  offset: number;
  length: number;
}

export interface BindingWrite {
  set: BindingSetHandle;
  binding: number;
  kind: BindingKind;
  range: BufferRange;
}

export interface KernelCreateInfo {
  binary: ProgramBinary;
  entryPoint: string;
}

export interface PushConstantRange {
  offset: number;
  size: number;
}

export interface PipelineLayoutCreateInfo {
  setLayouts: BindingLayoutHandle[];
  pushConstantRanges: PushConstantRange[];
}

export interface ComputePipelineCreateInfo {
  kernel: KernelHandle;
  layout: PipelineLayoutHandle;
  cache: null;
  basePipeline: PipelineHandle | null;
}

export interface CommandPoolCreateInfo {
  queueFamilyIndex: number;
}

export interface CommandUnitCreateInfo {
  pool: CommandPoolHandle;
  level: 'primary';
}

export interface RecordingBeginInfo {
  oneTimeSubmit: boolean;
}

export interface CompletionSignalCreateInfo {
  signaled: boolean;
}

export type WaitResult = 'signaled' | 'timeout';

// ------------------------------------------------------------------
// Device
// ------------------------------------------------------------------

export interface DeviceInterface {
  readonly name: string;
  readonly programFormat: ProgramFormat;

  getBufferMemoryRequirements(buffer: BufferHandle): MemoryRequirements;
  allocateMemory(info: MemoryAllocateInfo): MemoryHandle;
  freeMemory(memory: MemoryHandle): void;
  /** Persistent host view of the whole allocation. */
  mapMemory(memory: MemoryHandle): Uint8Array;
  flushMappedRange(memory: MemoryHandle, offset: number, size: number): void;
  invalidateMappedRange(memory: MemoryHandle, offset: number, size: number): Promise<void>;

  createBuffer(info: BufferCreateInfo): BufferHandle;
  destroyBuffer(buffer: BufferHandle): void;
  bindBufferMemory(buffer: BufferHandle, memory: MemoryHandle, offset: number): void;

  createBindingLayout(info: BindingLayoutCreateInfo): BindingLayoutHandle;
  destroyBindingLayout(layout: BindingLayoutHandle): void;
  createBindingPool(info: BindingPoolCreateInfo): BindingPoolHandle;
  /** Also frees every set still allocated from the pool. */
  destroyBindingPool(pool: BindingPoolHandle): void;
  allocateBindingSet(pool: BindingPoolHandle, layout: BindingLayoutHandle): BindingSetHandle;
  freeBindingSet(pool: BindingPoolHandle, set: BindingSetHandle): void;
  updateBindingSet(writes: BindingWrite[]): void;

  createKernelObject(info: KernelCreateInfo): Promise<KernelHandle>;
  destroyKernelObject(kernel: KernelHandle): void;
  createPipelineLayout(info: PipelineLayoutCreateInfo): PipelineLayoutHandle;
  destroyPipelineLayout(layout: PipelineLayoutHandle): void;
  createComputePipeline(info: ComputePipelineCreateInfo): Promise<PipelineHandle>;
  destroyPipeline(pipeline: PipelineHandle): void;

  createCommandPool(info: CommandPoolCreateInfo): CommandPoolHandle;
  /** Also frees every command unit still allocated from the pool. */
  destroyCommandPool(pool: CommandPoolHandle): void;
  createCommandUnit(info: CommandUnitCreateInfo): CommandUnitHandle;
  freeCommandUnit(pool: CommandPoolHandle, unit: CommandUnitHandle): void;
  beginRecording(unit: CommandUnitHandle, info: RecordingBeginInfo): void;
  endRecording(unit: CommandUnitHandle): void;
  bindPipeline(unit: CommandUnitHandle, pipeline: PipelineHandle): void;
  bindBindingSet(unit: CommandUnitHandle, layout: PipelineLayoutHandle, firstSet: number, sets: BindingSetHandle[]): void;
  dispatch(unit: CommandUnitHandle, x: number, y: number, z: number): void;

  createCompletionSignal(info: CompletionSignalCreateInfo): SignalHandle;
  destroyCompletionSignal(signal: SignalHandle): void;
  submit(queueIndex: number, units: CommandUnitHandle[], signal: SignalHandle): void;
  /** `timeoutMs` of null waits without bound. */
  waitOnSignal(signal: SignalHandle, timeoutMs: number | null): Promise<WaitResult>;
}

export type DeviceOperation = Exclude<keyof DeviceInterface, 'name' | 'programFormat'>;
