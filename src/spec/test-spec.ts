import { SpecificationError } from '../errors/harness-error';
import { BufferData } from './buffer-data';

export type DispatchDimensions = readonly [number, number, number];

/**
 * Replaces the byte comparison. Receives the inputs, the bytes the device
 * produced for each output, and the expected outputs.
 */
export type OutputVerifier = (
  inputs: readonly BufferData[],
  produced: readonly Uint8Array[],
  expected: readonly BufferData[],
) => boolean;

export interface TestSpecification {
  readonly kernelSource: string;
  readonly inputs: readonly BufferData[];
  /** Expected contents; always at least one. */
  readonly outputs: readonly BufferData[];
  readonly dispatchDimensions: DispatchDimensions;
  readonly verifyOutputs?: OutputVerifier;
  readonly failMessage?: string;
}

export interface TestSpecificationInit {
  kernelSource: string;
  inputs?: readonly BufferData[];
  outputs: readonly BufferData[];
  dispatchDimensions: readonly number[];
  verifyOutputs?: OutputVerifier;
  failMessage?: string;
}

export function createTestSpecification(init: TestSpecificationInit): TestSpecification {
  if (init.outputs.length === 0) {
    throw new SpecificationError('A compute test needs at least one output buffer');
  }
  const dims = init.dispatchDimensions;
  if (dims.length !== 3) {
    throw new SpecificationError(`Dispatch needs three dimensions, got ${dims.length}`);
  }
  dims.forEach((d, i) => {
    if (!Number.isInteger(d) || d < 0) {
      throw new SpecificationError(`Dispatch dimension ${'xyz'[i]} must be a non-negative integer, got ${d}`);
    }
  });

  return Object.freeze({
    kernelSource: init.kernelSource,
    inputs: Object.freeze([...(init.inputs ?? [])]),
    outputs: Object.freeze([...init.outputs]),
    dispatchDimensions: Object.freeze([dims[0], dims[1], dims[2]] as const),
    verifyOutputs: init.verifyOutputs,
    failMessage: init.failMessage,
  });
}

export function bindingCount(spec: TestSpecification): number {
  return spec.inputs.length + spec.outputs.length;
}
