/**
 * @file reference-device.ts
 * @description In-process software device that executes reference-asm kernels.
 *
 * Memory is modelled with a separate host view and device copy per allocation,
 * so flush and invalidate have observable effects: host writes reach the
 * device only through `flushMappedRange`, and device writes reach the host view
 * only through `invalidateMappedRange`.
 *
 * Submitted work runs on a timer (`latencyMs`, default 0). A latency of
 * `Infinity` never completes, which is how tests model a hung device. Work
 * that faults while executing loses its signal: waiters get `device-lost`.
 *
 * @pitfalls
 * - Destroying a signal while its work is pending abandons that work.
 * - Freeing memory that is still bound to a live buffer is rejected.
 */
import { DeviceError, DeviceErrorCode } from '../errors/harness-error';
import { log } from '../debug/log';
import { KernelEntry, KernelSyntaxError, parseKernelModule, runKernel } from './reference-kernel';
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

export interface ReferenceDeviceOptions {
  /** Delay between submit and completion. */
  latencyMs?: number;
  /** Total bytes `allocateMemory` may hand out before failing. */
  maxMemoryBytes?: number;
}

const WORD = 4;
const MEMORY_ALIGNMENT = 16;

// ------------------------------------------------------------------
// Object state
// ------------------------------------------------------------------

interface MemoryState {
  size: number;
  memoryClass: MemoryClass;
  deviceBytes: Uint8Array;
  hostView: Uint8Array;
  boundBuffers: Set<number>;
}

interface BufferState {
  size: number;
  binding?: { memory: number; offset: number };
}

interface BindingPoolState {
  maxSets: number;
  capacity: number;
  oneShot: boolean;
  sets: Set<number>;
}

interface BindingSetState {
  pool: number;
  layout: number;
  slots: Map<number, BufferRange>;
}

interface PipelineState {
  entry: KernelEntry;
  layout: number;
}

type Command =
  | { type: 'bind-pipeline'; pipeline: number }
  | { type: 'bind-sets'; layout: number; firstSet: number; sets: number[] }
  | { type: 'dispatch'; groups: [number, number, number] };

type UnitPhase = 'initial' | 'recording' | 'executable' | 'pending' | 'invalid';

interface CommandUnitState {
  pool: number;
  phase: UnitPhase;
  oneTimeSubmit: boolean;
  commands: Command[];
}

type SignalPhase = 'unsignaled' | 'pending' | 'signaled' | 'lost';

interface SignalWaiter {
  resolve(result: WaitResult): void;
  reject(error: DeviceError): void;
}

interface SignalState {
  phase: SignalPhase;
  cancelTimer?: () => void;
  fault?: DeviceError;
  units: number[];
  waiters: SignalWaiter[];
}

// ------------------------------------------------------------------
// Device
// ------------------------------------------------------------------

export class ReferenceDevice implements DeviceInterface {
  readonly name = 'reference';
  readonly programFormat: ProgramFormat = 'reference-asm';

  private readonly latencyMs: number;
  private readonly maxMemoryBytes: number;
  private allocatedBytes = 0;
  private readonly ids = { next: 1 };

  private readonly memories = new ObjectTable<'memory', MemoryState>('memory', this.ids);
  private readonly buffers = new ObjectTable<'buffer', BufferState>('buffer', this.ids);
  private readonly bindingLayouts = new ObjectTable<'binding-layout', BindingLayoutCreateInfo>('binding-layout', this.ids);
  private readonly bindingPools = new ObjectTable<'binding-pool', BindingPoolState>('binding-pool', this.ids);
  private readonly bindingSets = new ObjectTable<'binding-set', BindingSetState>('binding-set', this.ids);
  private readonly kernels = new ObjectTable<'kernel', KernelEntry>('kernel', this.ids);
  private readonly pipelineLayouts = new ObjectTable<'pipeline-layout', PipelineLayoutCreateInfo>('pipeline-layout', this.ids);
  private readonly pipelines = new ObjectTable<'pipeline', PipelineState>('pipeline', this.ids);
  private readonly commandPools = new ObjectTable<'command-pool', { units: Set<number> }>('command-pool', this.ids);
  private readonly commandUnits = new ObjectTable<'command-unit', CommandUnitState>('command-unit', this.ids);
  private readonly signals = new ObjectTable<'signal', SignalState>('signal', this.ids);

  constructor(options: ReferenceDeviceOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    this.maxMemoryBytes = options.maxMemoryBytes ?? Number.MAX_SAFE_INTEGER;
  }

  /** Number of live objects across every kind. */
  get liveObjectCount(): number {
    return [
      this.memories, this.buffers, this.bindingLayouts, this.bindingPools, this.bindingSets, this.kernels,
      this.pipelineLayouts, this.pipelines, this.commandPools, this.commandUnits, this.signals,
    ].reduce((sum, table) => sum + table.size, 0);
  }

  // -------------------------------------------------------
  // Memory & buffers
  // -------------------------------------------------------

  getBufferMemoryRequirements(buffer: BufferHandle): MemoryRequirements {
    const state = this.buffers.get(buffer, 'getBufferMemoryRequirements');
    return { size: state.size, alignment: MEMORY_ALIGNMENT };
  }

  allocateMemory(info: MemoryAllocateInfo): MemoryHandle {
    if (!Number.isInteger(info.size) || info.size < 0) {
      throw new DeviceError('allocateMemory', 'invalid-argument', `bad size ${info.size}`);
    }
    if (this.allocatedBytes + info.size > this.maxMemoryBytes) {
      throw new DeviceError('allocateMemory', 'out-of-memory', `${info.size} bytes requested, ${this.maxMemoryBytes - this.allocatedBytes} available`);
    }
    this.allocatedBytes += info.size;
    return this.memories.add({
      size: info.size,
      memoryClass: info.memoryClass,
      deviceBytes: new Uint8Array(info.size),
      // Host view starts with junk so tests can tell cleared memory from fresh memory
      hostView: new Uint8Array(info.size).fill(0xcd),
      boundBuffers: new Set(),
    });
  }

  freeMemory(memory: MemoryHandle): void {
    const state = this.memories.get(memory, 'freeMemory');
    const live = [...state.boundBuffers].filter(id => this.buffers.getById(id) !== undefined);
    if (live.length > 0) {
      throw new DeviceError('freeMemory', 'invalid-argument', `memory still bound to buffer(s) ${live.join(', ')}`);
    }
    this.memories.delete(memory, 'freeMemory');
    this.allocatedBytes -= state.size;
  }

  mapMemory(memory: MemoryHandle): Uint8Array {
    const state = this.memories.get(memory, 'mapMemory');
    if (state.memoryClass !== 'host-visible') {
      throw new DeviceError('mapMemory', 'invalid-argument', 'memory is not host-visible');
    }
    return state.hostView;
  }

  private checkRange(operation: string, state: MemoryState, offset: number, size: number) {
    if (offset < 0 || size < 0 || offset + size > state.size) {
      throw new DeviceError(operation, 'invalid-argument', `range [${offset}, ${offset + size}) outside allocation of ${state.size} bytes`);
    }
  }

  flushMappedRange(memory: MemoryHandle, offset: number, size: number): void {
    const state = this.memories.get(memory, 'flushMappedRange');
    this.checkRange('flushMappedRange', state, offset, size);
    state.deviceBytes.set(state.hostView.subarray(offset, offset + size), offset);
  }

  async invalidateMappedRange(memory: MemoryHandle, offset: number, size: number): Promise<void> {
    const state = this.memories.get(memory, 'invalidateMappedRange');
    this.checkRange('invalidateMappedRange', state, offset, size);
    state.hostView.set(state.deviceBytes.subarray(offset, offset + size), offset);
  }

  createBuffer(info: BufferCreateInfo): BufferHandle {
    if (!Number.isInteger(info.size) || info.size < 0) {
      throw new DeviceError('createBuffer', 'invalid-argument', `bad size ${info.size}`);
    }
    return this.buffers.add({ size: info.size });
  }

  destroyBuffer(buffer: BufferHandle): void {
    this.buffers.delete(buffer, 'destroyBuffer');
  }

  bindBufferMemory(buffer: BufferHandle, memory: MemoryHandle, offset: number): void {
    const bufferState = this.buffers.get(buffer, 'bindBufferMemory');
    const memoryState = this.memories.get(memory, 'bindBufferMemory');
    if (bufferState.binding) {
      throw new DeviceError('bindBufferMemory', 'invalid-argument', 'buffer already bound');
    }
    if (offset % MEMORY_ALIGNMENT !== 0 || offset + bufferState.size > memoryState.size) {
      throw new DeviceError('bindBufferMemory', 'invalid-argument', `buffer of ${bufferState.size} bytes does not fit at offset ${offset}`);
    }
    bufferState.binding = { memory: memory.id, offset };
    memoryState.boundBuffers.add(buffer.id);
  }

  // -------------------------------------------------------
  // Bindings
  // -------------------------------------------------------

  createBindingLayout(info: BindingLayoutCreateInfo): BindingLayoutHandle {
    const seen = new Set<number>();
    for (const entry of info.entries) {
      if (seen.has(entry.binding)) {
        throw new DeviceError('createBindingLayout', 'invalid-argument', `duplicate binding ${entry.binding}`);
      }
      seen.add(entry.binding);
    }
    return this.bindingLayouts.add({ entries: info.entries.map(e => ({ ...e })) });
  }

  destroyBindingLayout(layout: BindingLayoutHandle): void {
    this.bindingLayouts.delete(layout, 'destroyBindingLayout');
  }

  createBindingPool(info: BindingPoolCreateInfo): BindingPoolHandle {
    if (info.maxSets < 1) throw new DeviceError('createBindingPool', 'invalid-argument', 'maxSets must be at least 1');
    const capacity = info.sizes.reduce((sum, s) => sum + s.count, 0);
    return this.bindingPools.add({ maxSets: info.maxSets, capacity, oneShot: info.oneShot, sets: new Set() });
  }

  destroyBindingPool(pool: BindingPoolHandle): void {
    const state = this.bindingPools.delete(pool, 'destroyBindingPool');
    state.sets.forEach(id => this.bindingSets.deleteById(id));
  }

  allocateBindingSet(pool: BindingPoolHandle, layout: BindingLayoutHandle): BindingSetHandle {
    const poolState = this.bindingPools.get(pool, 'allocateBindingSet');
    const layoutState = this.bindingLayouts.get(layout, 'allocateBindingSet');
    const used = [...poolState.sets].reduce((sum, id) => {
      const set = this.bindingSets.getById(id);
      const setLayout = set ? this.bindingLayouts.getById(set.layout) : undefined;
      return sum + (setLayout?.entries.length ?? 0);
    }, 0);
    if (poolState.sets.size >= poolState.maxSets || used + layoutState.entries.length > poolState.capacity) {
      throw new DeviceError('allocateBindingSet', 'out-of-memory', 'binding pool exhausted');
    }
    const handle = this.bindingSets.add({ pool: pool.id, layout: layout.id, slots: new Map() });
    poolState.sets.add(handle.id);
    return handle;
  }

  freeBindingSet(pool: BindingPoolHandle, set: BindingSetHandle): void {
    const poolState = this.bindingPools.get(pool, 'freeBindingSet');
    if (poolState.oneShot) {
      throw new DeviceError('freeBindingSet', 'invalid-argument', 'sets from a one-shot pool are freed with the pool');
    }
    const setState = this.bindingSets.get(set, 'freeBindingSet');
    if (setState.pool !== pool.id) {
      throw new DeviceError('freeBindingSet', 'invalid-argument', 'set was not allocated from this pool');
    }
    this.bindingSets.delete(set, 'freeBindingSet');
    poolState.sets.delete(set.id);
  }

  updateBindingSet(writes: BindingWrite[]): void {
    for (const write of writes) {
      const setState = this.bindingSets.get(write.set, 'updateBindingSet');
      const layout = this.bindingLayouts.getById(setState.layout);
      const entry = layout?.entries.find(e => e.binding === write.binding);
      if (!entry || entry.kind !== write.kind) {
        throw new DeviceError('updateBindingSet', 'invalid-argument', `binding ${write.binding} is not a ${write.kind} in the set layout`);
      }
      const buffer = this.buffers.get(write.range.buffer, 'updateBindingSet');
      if (write.range.offset < 0 || write.range.offset + write.range.length > buffer.size) {
        throw new DeviceError('updateBindingSet', 'invalid-argument', `range exceeds buffer #${write.range.buffer.id}`);
      }
      setState.slots.set(write.binding, { ...write.range });
    }
  }

  // -------------------------------------------------------
  // Kernels & pipelines
  // -------------------------------------------------------

  async createKernelObject(info: KernelCreateInfo): Promise<KernelHandle> {
    if (info.binary.format !== this.programFormat) {
      throw new DeviceError('createKernelObject', 'invalid-program', `expected ${this.programFormat} binary, got ${info.binary.format}`);
    }
    let entry: KernelEntry | undefined;
    try {
      entry = parseKernelModule(new TextDecoder().decode(info.binary.bytes)).entries.get(info.entryPoint);
    } catch (err) {
      if (err instanceof KernelSyntaxError) {
        throw new DeviceError('createKernelObject', 'invalid-program', `${info.binary.name}: ${err.message}`, { cause: err });
      }
      throw err;
    }
    if (!entry) {
      throw new DeviceError('createKernelObject', 'invalid-program', `entry point '${info.entryPoint}' not found in ${info.binary.name}`);
    }
    return this.kernels.add(entry);
  }

  destroyKernelObject(kernel: KernelHandle): void {
    this.kernels.delete(kernel, 'destroyKernelObject');
  }

  createPipelineLayout(info: PipelineLayoutCreateInfo): PipelineLayoutHandle {
    info.setLayouts.forEach(layout => this.bindingLayouts.get(layout, 'createPipelineLayout'));
    if (info.pushConstantRanges.length > 0) {
      throw new DeviceError('createPipelineLayout', 'unsupported', 'push constants are not supported');
    }
    return this.pipelineLayouts.add({ setLayouts: [...info.setLayouts], pushConstantRanges: [] });
  }

  destroyPipelineLayout(layout: PipelineLayoutHandle): void {
    this.pipelineLayouts.delete(layout, 'destroyPipelineLayout');
  }

  async createComputePipeline(info: ComputePipelineCreateInfo): Promise<PipelineHandle> {
    const entry = this.kernels.get(info.kernel, 'createComputePipeline');
    const layout = this.pipelineLayouts.get(info.layout, 'createComputePipeline');
    if (info.basePipeline) this.pipelines.get(info.basePipeline, 'createComputePipeline');

    // The kernel addresses set 0 only
    const set0 = layout.setLayouts[0] ? this.bindingLayouts.getById(layout.setLayouts[0].id) : undefined;
    const bound = new Set(set0?.entries.map(e => e.binding) ?? []);
    for (let binding = 0; binding <= entry.maxBinding; binding++) {
      if (!bound.has(binding)) {
        throw new DeviceError('createComputePipeline', 'invalid-argument', `kernel '${entry.name}' uses binding ${binding} which the layout does not declare`);
      }
    }
    return this.pipelines.add({ entry, layout: info.layout.id });
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
    const state = this.commandPools.get(pool, 'destroyCommandPool');
    for (const id of state.units) {
      if (this.commandUnits.getById(id)?.phase === 'pending') {
        throw new DeviceError('destroyCommandPool', 'not-ready', `command unit #${id} is still pending`);
      }
    }
    this.commandPools.delete(pool, 'destroyCommandPool');
    state.units.forEach(id => this.commandUnits.deleteById(id));
  }

  createCommandUnit(info: CommandUnitCreateInfo): CommandUnitHandle {
    const pool = this.commandPools.get(info.pool, 'createCommandUnit');
    const handle = this.commandUnits.add({ pool: info.pool.id, phase: 'initial', oneTimeSubmit: false, commands: [] });
    pool.units.add(handle.id);
    return handle;
  }

  freeCommandUnit(pool: CommandPoolHandle, unit: CommandUnitHandle): void {
    const poolState = this.commandPools.get(pool, 'freeCommandUnit');
    const state = this.commandUnits.get(unit, 'freeCommandUnit');
    if (state.pool !== pool.id) {
      throw new DeviceError('freeCommandUnit', 'invalid-argument', 'unit was not allocated from this pool');
    }
    if (state.phase === 'pending') {
      throw new DeviceError('freeCommandUnit', 'not-ready', 'command unit is still pending');
    }
    this.commandUnits.delete(unit, 'freeCommandUnit');
    poolState.units.delete(unit.id);
  }

  private recording(unit: CommandUnitHandle, operation: string): CommandUnitState {
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
    state.commands.push({ type: 'bind-sets', layout: layout.id, firstSet, sets: sets.map(s => s.id) });
  }

  dispatch(unit: CommandUnitHandle, x: number, y: number, z: number): void {
    const state = this.recording(unit, 'dispatch');
    if ([x, y, z].some(n => !Number.isInteger(n) || n < 0)) {
      throw new DeviceError('dispatch', 'invalid-argument', `bad work-group counts ${x}x${y}x${z}`);
    }
    state.commands.push({ type: 'dispatch', groups: [x, y, z] });
  }

  // -------------------------------------------------------
  // Submission
  // -------------------------------------------------------

  createCompletionSignal(info: CompletionSignalCreateInfo): SignalHandle {
    return this.signals.add({ phase: info.signaled ? 'signaled' : 'unsignaled', units: [], waiters: [] });
  }

  destroyCompletionSignal(signal: SignalHandle): void {
    const state = this.signals.delete(signal, 'destroyCompletionSignal');
    if (state.phase === 'pending') {
      log.warn('ReferenceDevice', `Abandoning pending work on signal #${signal.id}`);
      state.cancelTimer?.();
      state.units.forEach(id => {
        const unit = this.commandUnits.getById(id);
        if (unit) unit.phase = 'invalid';
      });
      this.settle(state, 'timeout');
    }
  }

  submit(queueIndex: number, units: CommandUnitHandle[], signal: SignalHandle): void {
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

    states.forEach(state => { state.phase = 'pending'; });
    signalState.phase = 'pending';
    signalState.units = units.map(u => u.id);

    if (this.latencyMs === Infinity) return;
    signalState.cancelTimer = setLongTimeout(() => this.complete(signalState), this.latencyMs);
  }

  async waitOnSignal(signal: SignalHandle, timeoutMs: number | null): Promise<WaitResult> {
    const state = this.signals.get(signal, 'waitOnSignal');
    if (state.phase === 'signaled') return 'signaled';
    if (state.phase === 'lost') throw this.lostSignal(state);
    if (state.phase === 'unsignaled' && timeoutMs === null) {
      // Nothing will ever raise it
      throw new DeviceError('waitOnSignal', 'invalid-argument', 'unbounded wait on a signal with no submitted work');
    }
    if (timeoutMs === 0) return 'timeout';

    return new Promise<WaitResult>((resolve, reject) => {
      let cancelTimer: (() => void) | undefined;
      const waiter: SignalWaiter = {
        resolve: result => {
          cancelTimer?.();
          resolve(result);
        },
        reject: error => {
          cancelTimer?.();
          reject(error);
        },
      };
      state.waiters.push(waiter);
      if (timeoutMs !== null) {
        cancelTimer = setLongTimeout(() => {
          state.waiters = state.waiters.filter(w => w !== waiter);
          resolve('timeout');
        }, timeoutMs);
      }
    });
  }

  private settle(state: SignalState, result: WaitResult) {
    const waiters = state.waiters;
    state.waiters = [];
    waiters.forEach(w => w.resolve(result));
  }

  private lostSignal(state: SignalState): DeviceError {
    return new DeviceError('waitOnSignal', 'device-lost', state.fault?.message, { cause: state.fault });
  }

  private complete(signal: SignalState) {
    signal.cancelTimer = undefined;
    let fault: DeviceError | undefined;
    for (const id of signal.units) {
      const unit = this.commandUnits.getById(id);
      if (!unit) continue;
      try {
        this.execute(unit);
      } catch (err) {
        if (!(err instanceof DeviceError)) throw err;
        fault = err;
        log.error('ReferenceDevice', `Command unit #${id} faulted: ${err.message}`);
      }
      unit.phase = unit.oneTimeSubmit ? 'invalid' : 'executable';
    }
    if (fault) {
      signal.phase = 'lost';
      signal.fault = fault;
      const waiters = signal.waiters;
      signal.waiters = [];
      waiters.forEach(w => w.reject(this.lostSignal(signal)));
      return;
    }
    signal.phase = 'signaled';
    this.settle(signal, 'signaled');
  }

  private fault(code: DeviceErrorCode, detail: string): DeviceError {
    return new DeviceError('execute', code, detail);
  }

  private execute(unit: CommandUnitState) {
    let pipeline: PipelineState | undefined;
    const boundSets = new Map<number, number>();

    for (const command of unit.commands) {
      switch (command.type) {
        case 'bind-pipeline': {
          pipeline = this.pipelines.getById(command.pipeline);
          if (!pipeline) throw this.fault('device-lost', `pipeline #${command.pipeline} destroyed before execution`);
          break;
        }
        case 'bind-sets':
          command.sets.forEach((set, i) => boundSets.set(command.firstSet + i, set));
          break;
        case 'dispatch': {
          if (!pipeline) throw this.fault('invalid-argument', 'dispatch without a bound pipeline');
          const setId = boundSets.get(0);
          const set = setId === undefined ? undefined : this.bindingSets.getById(setId);
          if (pipeline.entry.maxBinding >= 0 && !set) {
            throw this.fault('invalid-argument', 'dispatch without binding set 0');
          }
          runKernel(pipeline.entry, command.groups, this.kernelMemory(set));
          break;
        }
      }
    }
  }

  private kernelMemory(set: BindingSetState | undefined) {
    const views = new Map<number, DataView>();
    set?.slots.forEach((range, binding) => {
      const buffer = this.buffers.getById(range.buffer.id);
      const memory = buffer?.binding ? this.memories.getById(buffer.binding.memory) : undefined;
      if (!buffer?.binding || !memory) {
        throw this.fault('device-lost', `binding ${binding} refers to a buffer without memory`);
      }
      const start = buffer.binding.offset + range.offset;
      views.set(binding, new DataView(memory.deviceBytes.buffer, memory.deviceBytes.byteOffset + start, range.length));
    });

    return {
      load(binding: number, index: number): number {
        const view = views.get(binding);
        if (!view || (index + 1) * WORD > view.byteLength) return 0;
        return view.getUint32(index * WORD, true);
      },
      store(binding: number, index: number, value: number) {
        const view = views.get(binding);
        if (!view || (index + 1) * WORD > view.byteLength) return;
        view.setUint32(index * WORD, value, true);
      },
    };
  }
}
