import { HarnessError } from '../errors/harness-error';

export type TestStatusCode = 'pass' | 'fail' | 'timeout';

export interface TestStatus {
  readonly code: TestStatusCode;
  readonly message: string;
}

export const TestStatus = {
  pass: (message: string): TestStatus => ({ code: 'pass', message }),
  fail: (message: string): TestStatus => ({ code: 'fail', message }),
  timeout: (message: string): TestStatus => ({ code: 'timeout', message }),
};

export type TestOutcome =
  | { kind: 'pass'; message: string }
  | { kind: 'fail'; message: string }
  | { kind: 'timeout'; message: string }
  | { kind: 'fatal'; error: HarnessError };

export function outcomeOf(status: TestStatus): TestOutcome {
  return { kind: status.code, message: status.message };
}
