import { log } from '../debug/log';
import { BufferHandle, DeviceInterface, MemoryHandle } from '../device/types';
import { ResourceScope } from './resource-scope';

/**
 * A storage buffer bound to its own host-visible allocation, with the
 * persistent mapped view of that allocation.
 */
export interface DeviceBuffer {
  readonly buffer: BufferHandle;
  readonly memory: MemoryHandle;
  readonly size: number;
  readonly hostView: Uint8Array;
}

/**
 * Creates a buffer of exactly `sizeBytes`, backs it with host-visible memory
 * and maps it. Both objects go into `scope`; the memory is freed after the
 * buffer is destroyed.
 */
export function allocateBuffer(device: DeviceInterface, scope: ResourceScope, sizeBytes: number): DeviceBuffer {
  const buffer = scope.own('buffer', device.createBuffer({ size: sizeBytes, usage: 'storage' }), b => device.destroyBuffer(b));
  const requirements = device.getBufferMemoryRequirements(buffer);
  const memory = scope.ownBeneath(
    buffer,
    'memory',
    device.allocateMemory({ size: requirements.size, memoryClass: 'host-visible' }),
    m => device.freeMemory(m),
  );
  device.bindBufferMemory(buffer, memory, 0);
  const hostView = device.mapMemory(memory);
  log.debug('BufferResource', `Allocated ${sizeBytes}-byte buffer (${requirements.size} bytes of memory)`);
  return { buffer, memory, size: sizeBytes, hostView };
}

/** Copies `bytes` into the mapped view and flushes them to the device. */
export function writeBuffer(device: DeviceInterface, target: DeviceBuffer, bytes: Uint8Array): void {
  if (bytes.length > target.size) {
    throw new RangeError(`Cannot write ${bytes.length} bytes into a ${target.size}-byte buffer`);
  }
  target.hostView.set(bytes, 0);
  device.flushMappedRange(target.memory, 0, bytes.length);
}

/** Clears the first `sizeBytes` bytes and flushes them, whatever the view held before. */
export function zeroBuffer(device: DeviceInterface, target: DeviceBuffer, sizeBytes: number): void {
  target.hostView.fill(0, 0, sizeBytes);
  device.flushMappedRange(target.memory, 0, sizeBytes);
}

/** Pulls the device's contents into the host view and returns a copy. */
export async function readBuffer(device: DeviceInterface, source: DeviceBuffer): Promise<Uint8Array> {
  await device.invalidateMappedRange(source.memory, 0, source.size);
  return source.hostView.slice(0, source.size);
}
