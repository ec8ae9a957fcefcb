import { describe } from 'vitest';
import { BufferData } from '../../spec/buffer-data';
import { runComputeCaseTest } from './test-runner';

const PASS = { kind: 'pass', message: 'Output match with expected' } as const;
const FAIL = { kind: 'fail', message: "Output doesn't match with expected" } as const;

describe('Conformance: Scenarios', () => {
  runComputeCaseTest('copies input to output', {
    kernel: 'copy',
    inputs: [BufferData.fromUint32([1, 2, 3, 4])],
    outputs: [BufferData.fromUint32([1, 2, 3, 4])],
    dispatch: [4, 1, 1],
  }, PASS);

  runComputeCaseTest('reports a mismatch when the expected output differs', {
    kernel: 'copy',
    inputs: [BufferData.fromUint32([1, 2, 3, 4])],
    outputs: [BufferData.fromUint32([9, 9, 9, 9])],
    dispatch: [4, 1, 1],
  }, FAIL);

  runComputeCaseTest('adds two inputs', {
    kernel: 'add',
    inputs: [BufferData.fromUint32([2, 0, 0, 0]), BufferData.fromUint32([3, 0, 0, 0])],
    outputs: [BufferData.fromUint32([5, 0, 0, 0])],
    dispatch: [4, 1, 1],
  }, PASS);

  runComputeCaseTest('copies a single 4-byte word', {
    kernel: 'copy',
    inputs: [BufferData.fromBytes([1, 2, 3, 4])],
    outputs: [BufferData.fromBytes([1, 2, 3, 4])],
    dispatch: [1, 1, 1],
  }, PASS);

  runComputeCaseTest('fails a single 4-byte word copy against other bytes', {
    kernel: 'copy',
    inputs: [BufferData.fromBytes([1, 2, 3, 4])],
    outputs: [BufferData.fromBytes([9, 9, 9, 9])],
    dispatch: [1, 1, 1],
  }, FAIL);

  runComputeCaseTest('adds two single 4-byte words', {
    kernel: 'add',
    inputs: [BufferData.fromBytes([2, 0, 0, 0]), BufferData.fromBytes([3, 0, 0, 0])],
    outputs: [BufferData.fromBytes([5, 0, 0, 0])],
    dispatch: [1, 1, 1],
  }, PASS);

  runComputeCaseTest('scales floats with a multi-invocation work-group', {
    kernel: 'scale-float',
    inputs: [BufferData.fromFloat32([1, 2, -4, 0.5, 8, 10, 0, 3])],
    outputs: [BufferData.fromFloat32([2.5, 5, -10, 1.25, 20, 25, 0, 7.5])],
    dispatch: [2, 1, 1],
  }, PASS);

  runComputeCaseTest('fails a partial dispatch that leaves outputs untouched', {
    kernel: 'copy',
    inputs: [BufferData.fromUint32([1, 2, 3, 4])],
    outputs: [BufferData.fromUint32([1, 2, 3, 4])],
    dispatch: [2, 1, 1],
  }, FAIL);

  runComputeCaseTest('passes a zero-sized dispatch when zeroed outputs are expected', {
    kernel: 'copy',
    inputs: [BufferData.fromUint32([1, 2, 3, 4])],
    outputs: [BufferData.fromUint32([0, 0, 0, 0])],
    dispatch: [0, 1, 1],
  }, PASS);

  runComputeCaseTest('sees zeroed outputs when the kernel writes nothing', {
    kernel: 'write-nothing',
    inputs: [BufferData.fromUint32([7])],
    outputs: [BufferData.fromUint32([0])],
    dispatch: [1, 1, 1],
  }, PASS);
});
