/**
 * @file harness-error.ts
 * @description Error hierarchy for the conformance harness.
 *
 * Anything extending `HarnessError` is an infrastructure failure: it aborts the
 * current test iteration and is reported as fatal, never as an ordinary test
 * failure. Output mismatches are not errors at all; they become a `fail` status.
 */

export class HarnessError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type DeviceErrorCode =
  | 'out-of-memory'
  | 'invalid-argument'
  | 'invalid-program'
  | 'device-lost'
  | 'not-ready'
  | 'unsupported';

/**
 * Uniform "operation failed" signal raised by every device entry point.
 */
export class DeviceError extends HarnessError {
  constructor(
    readonly operation: string,
    readonly code: DeviceErrorCode,
    detail?: string,
    options?: { cause?: unknown },
  ) {
    super(`${operation} failed (${code})${detail ? `: ${detail}` : ''}`, options);
  }
}

export class SpecificationError extends HarnessError {}

export class BindingOrderError extends HarnessError {}

export class ProgramNotFoundError extends HarnessError {
  constructor(readonly programName: string) {
    super(`Program '${programName}' not found in binary collection`);
  }
}

export class CommandUnitConsumedError extends HarnessError {
  constructor() {
    super('Command unit has already been submitted');
  }
}

export class ResourceReleaseError extends HarnessError {
  constructor(readonly label: string, cause: unknown) {
    super(`Failed to release ${label}`, { cause });
  }
}

export class ResourceLeakError extends HarnessError {
  constructor(readonly leaked: ReadonlyMap<string, number>) {
    super(`Iteration leaked device objects: ${[...leaked].map(([kind, count]) => `${kind}=${count}`).join(', ')}`);
  }
}

export class ConfigError extends HarnessError {
  constructor(readonly issues: string[]) {
    super(`Invalid harness configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
  }
}

export function isHarnessError(err: unknown): err is HarnessError {
  return err instanceof HarnessError;
}
