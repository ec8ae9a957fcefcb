/**
 * @file resource-scope.ts
 * @description Ownership stack for the device objects of one test iteration.
 *
 * Objects are released in reverse acquisition order. Every release runs even
 * when an earlier one throws.
 *
 * @pitfalls
 * - When the scope closes because the body threw, release failures are only
 *   logged; the body's error is the one that propagates.
 * - Memory must be freed after the buffer bound to it, although it is
 *   allocated later. Use `ownBeneath` for that.
 */
import { ResourceReleaseError } from '../errors/harness-error';
import { log } from '../debug/log';

interface ScopeEntry {
  label: string;
  value: unknown;
  release: () => void;
}

export class ResourceScope {
  private readonly entries: ScopeEntry[] = [];
  private closed = false;

  get size(): number {
    return this.entries.length;
  }

  /** Registers `value` and returns it. `release` runs when the scope unwinds. */
  own<T>(label: string, value: T, release: (value: T) => void): T {
    this.assertOpen(label);
    this.entries.push({ label, value, release: () => release(value) });
    return value;
  }

  /**
   * Registers `value` so that it is released right after `owner`, which must
   * already be owned by this scope.
   */
  ownBeneath<T>(owner: unknown, label: string, value: T, release: (value: T) => void): T {
    this.assertOpen(label);
    const index = this.entries.findIndex(e => e.value === owner);
    if (index < 0) throw new Error(`Cannot place ${label}: owner is not in this scope`);
    this.entries.splice(index, 0, { label, value, release: () => release(value) });
    return value;
  }

  private assertOpen(label: string) {
    if (this.closed) throw new Error(`Cannot own ${label}: scope already released`);
  }

  /**
   * Releases everything, newest first. With `propagating` set the caller is
   * already unwinding an error, so release failures are logged and swallowed.
   * Otherwise the first failure is rethrown once the stack is empty.
   */
  releaseAll(propagating = false): void {
    this.closed = true;
    let first: ResourceReleaseError | undefined;
    for (let entry = this.entries.pop(); entry; entry = this.entries.pop()) {
      try {
        entry.release();
        log.debug('ResourceScope', `Released ${entry.label}`);
      } catch (err) {
        const failure = new ResourceReleaseError(entry.label, err);
        log.error('ResourceScope', failure.message, err);
        if (!propagating) first ??= failure;
      }
    }
    if (first) throw first;
  }
}

export async function withResourceScope<R>(body: (scope: ResourceScope) => Promise<R>): Promise<R> {
  const scope = new ResourceScope();
  let result: R;
  try {
    result = await body(scope);
  } catch (err) {
    scope.releaseAll(true);
    throw err;
  }
  scope.releaseAll();
  return result;
}
