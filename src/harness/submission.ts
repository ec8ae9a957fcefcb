import { log } from '../debug/log';
import { DeviceInterface, WaitResult } from '../device/types';
import { RecordedCommandUnit } from './command-sequencer';
import { ResourceScope } from './resource-scope';

export const SUBMIT_QUEUE = 0;

export type SubmissionResult = 'completed' | 'timed-out';

export interface SubmitOptions {
  /** null waits without bound. */
  timeoutMs: number | null;
}

/**
 * Submits `unit` to queue 0 behind a fresh completion signal and waits on it.
 * Resolves to `completed` once the signal is raised, or `timed-out`.
 */
export async function submitAndWait(
  device: DeviceInterface,
  scope: ResourceScope,
  unit: RecordedCommandUnit,
  options: SubmitOptions,
): Promise<SubmissionResult> {
  const signal = scope.own('completion signal', device.createCompletionSignal({ signaled: false }), s => device.destroyCompletionSignal(s));
  device.submit(SUBMIT_QUEUE, [unit.take()], signal);
  log.debug('Submission', `Submitted; waiting ${options.timeoutMs === null ? 'without bound' : `up to ${options.timeoutMs}ms`}`);

  const result: WaitResult = await device.waitOnSignal(signal, options.timeoutMs);
  if (result === 'timeout') {
    log.warn('Submission', `Completion signal not raised within ${options.timeoutMs}ms`);
    return 'timed-out';
  }
  return 'completed';
}
