import { log } from '../debug/log';
import { BufferData } from '../spec/buffer-data';
import { OutputVerifier } from '../spec/test-spec';

export const MISMATCH_MESSAGE = "Output doesn't match with expected";
export const MATCH_MESSAGE = 'Output match with expected';

export type VerifyResult = { ok: true } | { ok: false; outputIndex: number };

/** Exact byte comparison; stops at the first output that differs. */
export function verifyOutputs(expected: readonly BufferData[], produced: readonly Uint8Array[]): VerifyResult {
  for (let i = 0; i < expected.length; i++) {
    const bytes = produced[i];
    if (!bytes || !expected[i].equals(bytes)) {
      log.debug('Verifier', `Output ${i} differs from expected`);
      return { ok: false, outputIndex: i };
    }
  }
  return { ok: true };
}

/** Runs a custom verifier in place of the byte comparison. */
export function verifyWith(
  verifier: OutputVerifier,
  inputs: readonly BufferData[],
  expected: readonly BufferData[],
  produced: readonly Uint8Array[],
): VerifyResult {
  if (verifier(inputs, produced, expected)) return { ok: true };
  log.debug('Verifier', 'Custom output verifier rejected the outputs');
  return { ok: false, outputIndex: -1 };
}
