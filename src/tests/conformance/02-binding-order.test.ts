import { describe, it, expect } from 'vitest';
import { parseHarnessConfig } from '../../config/harness-config';
import { executeComputeTest } from '../../case/compute-shader-case';
import { ReferenceDevice } from '../../device/reference-device';
import { BufferData } from '../../spec/buffer-data';
import { createTestSpecification } from '../../spec/test-spec';
import { FaultInjectingDevice } from '../helpers/fault-injecting-device';
import { loadKernelSource, runComputeCaseTest } from './test-runner';

describe('Conformance: Binding Order', () => {
  // Binding i must be the i-th buffer of inputs ++ outputs
  runComputeCaseTest('routes each slot to its declared buffer', {
    kernel: 'slot-tag',
    inputs: [BufferData.fromUint32([1]), BufferData.fromUint32([2]), BufferData.fromUint32([3])],
    outputs: [BufferData.fromUint32([3001]), BufferData.fromUint32([4002]), BufferData.fromUint32([5003])],
    dispatch: [1, 1, 1],
  }, { kind: 'pass', message: 'Output match with expected' });

  runComputeCaseTest('notices outputs listed in the wrong order', {
    kernel: 'slot-tag',
    inputs: [BufferData.fromUint32([1]), BufferData.fromUint32([2]), BufferData.fromUint32([3])],
    outputs: [BufferData.fromUint32([4002]), BufferData.fromUint32([3001]), BufferData.fromUint32([5003])],
    dispatch: [1, 1, 1],
  }, { kind: 'fail', message: "Output doesn't match with expected" });

  it('writes binding i with the i-th buffer created', async () => {
    const device = new FaultInjectingDevice(new ReferenceDevice());
    const created: number[] = [];
    const createBuffer = device.createBuffer.bind(device);
    device.createBuffer = (info) => {
      const handle = createBuffer(info);
      created.push(handle.id);
      return handle;
    };

    const spec = createTestSpecification({
      kernelSource: loadKernelSource('add', 'reference-asm'),
      inputs: [BufferData.fromUint32([2, 0, 0, 0]), BufferData.fromUint32([3, 0, 0, 0])],
      outputs: [BufferData.fromUint32([5, 0, 0, 0])],
      dispatchDimensions: [4, 1, 1],
    });
    const env = { config: parseHarnessConfig({ logLevel: 'silent' }), device, tracker: null };
    const outcome = await executeComputeTest(env, spec);

    expect(outcome.kind).toBe('pass');
    expect(device.bindingWrites.map(w => w.binding)).toEqual([0, 1, 2]);
    expect(device.bindingWrites.map(w => w.range.buffer.id)).toEqual(created);
    expect(device.bindingWrites.every(w => w.kind === 'storage-buffer' && w.range.offset === 0 && w.range.length === 16)).toBe(true);
  });
});
