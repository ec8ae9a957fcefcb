import { describe, it, expect } from 'vitest';
import { BindingOrderError } from '../errors/harness-error';
import { ReferenceDevice } from '../device/reference-device';
import { FaultInjectingDevice } from '../tests/helpers/fault-injecting-device';
import { allocateBuffer } from './buffer-resource';
import { BindingTable, buildBindingTable, createBindingPool, createBindingSet, createBindingSetLayout } from './binding-set';
import { ResourceScope } from './resource-scope';

describe('Binding Set Builder', () => {
  const setup = () => {
    const device = new FaultInjectingDevice(new ReferenceDevice());
    const scope = new ResourceScope();
    const inputs = [allocateBuffer(device, scope, 4), allocateBuffer(device, scope, 8)];
    const outputs = [allocateBuffer(device, scope, 12)];
    return { device, scope, inputs, outputs };
  };

  it('puts inputs before outputs in declaration order', () => {
    const { inputs, outputs } = setup();
    const table = buildBindingTable(inputs, outputs);
    expect(table.map(s => [s.slot, s.role, s.index, s.buffer, s.length])).toEqual([
      [0, 'input', 0, inputs[0].buffer, 4],
      [1, 'input', 1, inputs[1].buffer, 8],
      [2, 'output', 0, outputs[0].buffer, 12],
    ]);
    expect(table.every(s => s.offset === 0)).toBe(true);
  });

  it('writes binding i from slot i', () => {
    const { device, scope, inputs, outputs } = setup();
    const table = buildBindingTable(inputs, outputs);
    const layout = createBindingSetLayout(device, scope, 3);
    const pool = createBindingPool(device, scope, 3);
    createBindingSet(device, pool, layout, 3, table);

    expect(device.bindingWrites.map(w => [w.binding, w.range.buffer])).toEqual([
      [0, inputs[0].buffer],
      [1, inputs[1].buffer],
      [2, outputs[0].buffer],
    ]);
  });

  it('refuses a table that does not fit the layout', () => {
    const { device, scope, inputs, outputs } = setup();
    const table = buildBindingTable(inputs, outputs);
    const layout = createBindingSetLayout(device, scope, 2);
    const pool = createBindingPool(device, scope, 2);
    expect(() => createBindingSet(device, pool, layout, 2, table)).toThrow(BindingOrderError);
    expect(device.callCount('allocateBindingSet')).toBe(0);
  });

  it('refuses slots out of order', () => {
    const { device, scope, inputs, outputs } = setup();
    const [a, b, c] = buildBindingTable(inputs, outputs);
    const shuffled: BindingTable = [a, c, b];
    const layout = createBindingSetLayout(device, scope, 3);
    const pool = createBindingPool(device, scope, 3);
    expect(() => createBindingSet(device, pool, layout, 3, shuffled)).toThrow('Binding table entry 1 claims slot 2');
  });

  it('releases layout and pool through the scope', () => {
    const { device, scope, inputs, outputs } = setup();
    const layout = createBindingSetLayout(device, scope, 3);
    const pool = createBindingPool(device, scope, 3);
    createBindingSet(device, pool, layout, 3, buildBindingTable(inputs, outputs));
    scope.releaseAll();
    expect(device.calls.filter(c => c.startsWith('destroyBinding'))).toEqual(['destroyBindingPool', 'destroyBindingLayout']);
  });
});
