import { BindingOrderError } from '../errors/harness-error';
import {
  BindingLayoutHandle, BindingPoolHandle, BindingSetHandle, BindingWrite, BufferHandle, DeviceInterface,
} from '../device/types';
import { DeviceBuffer } from './buffer-resource';
import { ResourceScope } from './resource-scope';

export type SlotRole = 'input' | 'output';

export interface BindingSlot {
  readonly slot: number;
  readonly buffer: BufferHandle;
  readonly offset: number;
  readonly length: number;
  readonly role: SlotRole;
  /** Position within the inputs or the outputs. */
  readonly index: number;
}

export type BindingTable = readonly BindingSlot[];

/**
 * Inputs first, then outputs, each in declaration order. Slot i is binding i.
 */
export function buildBindingTable(inputs: readonly DeviceBuffer[], outputs: readonly DeviceBuffer[]): BindingTable {
  const slotFor = (role: SlotRole) => (b: DeviceBuffer, index: number) => ({ role, index, buffer: b.buffer, length: b.size });
  const table = [...inputs.map(slotFor('input')), ...outputs.map(slotFor('output'))]
    .map((entry, slot): BindingSlot => Object.freeze({ slot, offset: 0, ...entry }));
  assertSlotOrder(table, inputs.length + outputs.length);
  return Object.freeze(table);
}

export function assertSlotOrder(table: BindingTable, slotCount: number): void {
  if (table.length !== slotCount) {
    throw new BindingOrderError(`Binding table has ${table.length} slots, layout expects ${slotCount}`);
  }
  table.forEach((entry, position) => {
    if (entry.slot !== position) {
      throw new BindingOrderError(`Binding table entry ${position} claims slot ${entry.slot}`);
    }
  });
}

export function createBindingSetLayout(device: DeviceInterface, scope: ResourceScope, slotCount: number): BindingLayoutHandle {
  const entries = Array.from({ length: slotCount }, (_, binding) => ({
    binding,
    kind: 'storage-buffer' as const,
    stage: 'compute' as const,
  }));
  return scope.own('binding layout', device.createBindingLayout({ entries }), l => device.destroyBindingLayout(l));
}

/** One-shot pool sized for exactly one set of `slotCount` storage buffers. */
export function createBindingPool(device: DeviceInterface, scope: ResourceScope, slotCount: number): BindingPoolHandle {
  const pool = device.createBindingPool({
    maxSets: 1,
    sizes: [{ kind: 'storage-buffer', count: slotCount }],
    oneShot: true,
  });
  return scope.own('binding pool', pool, p => device.destroyBindingPool(p));
}

/**
 * Allocates the set from `pool` and writes slot i to binding i. The set is
 * released with its pool.
 */
export function createBindingSet(
  device: DeviceInterface,
  pool: BindingPoolHandle,
  layout: BindingLayoutHandle,
  slotCount: number,
  table: BindingTable,
): BindingSetHandle {
  assertSlotOrder(table, slotCount);
  const set = device.allocateBindingSet(pool, layout);
  const writes = table.map((entry): BindingWrite => ({
    set,
    binding: entry.slot,
    kind: 'storage-buffer',
    range: { buffer: entry.buffer, offset: entry.offset, length: entry.length },
  }));
  device.updateBindingSet(writes);
  return set;
}
