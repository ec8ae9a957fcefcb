import { describe, it, expect } from 'vitest';
import { ReferenceDevice } from './reference-device';
import { TrackingDevice } from './tracking-device';

describe('Tracking Device', () => {
  it('counts live objects per kind', () => {
    const device = new TrackingDevice(new ReferenceDevice());
    const buffer = device.createBuffer({ size: 4, usage: 'storage' });
    device.allocateMemory({ size: 4, memoryClass: 'host-visible' });
    device.createBuffer({ size: 8, usage: 'storage' });

    expect(device.liveObjects()).toEqual(new Map([['memory', 1], ['buffer', 2]]));
    device.destroyBuffer(buffer);
    expect(device.liveObjects().get('buffer')).toBe(1);
    expect(device.liveCount).toBe(2);
  });

  it('retires sets and command units with their pools', () => {
    const device = new TrackingDevice(new ReferenceDevice());
    const layout = device.createBindingLayout({ entries: [{ binding: 0, kind: 'storage-buffer', stage: 'compute' }] });
    const pool = device.createBindingPool({ maxSets: 1, sizes: [{ kind: 'storage-buffer', count: 1 }], oneShot: true });
    device.allocateBindingSet(pool, layout);
    const commandPool = device.createCommandPool({ queueFamilyIndex: 0 });
    device.createCommandUnit({ pool: commandPool, level: 'primary' });
    device.createCommandUnit({ pool: commandPool, level: 'primary' });
    expect(device.liveCount).toBe(6);

    device.destroyBindingPool(pool);
    device.destroyCommandPool(commandPool);
    expect(device.liveHandles()).toEqual([layout]);
  });

  it('keeps counting an object whose destruction failed', () => {
    const device = new TrackingDevice(new ReferenceDevice());
    const buffer = device.createBuffer({ size: 4, usage: 'storage' });
    const memory = device.allocateMemory({ size: 4, memoryClass: 'host-visible' });
    device.bindBufferMemory(buffer, memory, 0);

    expect(() => device.freeMemory(memory)).toThrow();
    expect(device.liveObjects().get('memory')).toBe(1);
  });

  it('forwards identity from the wrapped device', () => {
    const device = new TrackingDevice(new ReferenceDevice());
    expect(device.name).toBe('reference');
    expect(device.programFormat).toBe('reference-asm');
  });
});
