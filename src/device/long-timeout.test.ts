import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { MAX_TIMER_DELAY_MS, setLongTimeout } from './long-timeout';

describe('setLongTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fires short delays once', () => {
    const callback = vi.fn();
    setLongTimeout(callback, 50);
    vi.advanceTimersByTime(49);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('holds delays past the 32-bit timer limit for their full length', () => {
    const callback = vi.fn();
    setLongTimeout(callback, 3_000_000_000);
    vi.advanceTimersByTime(MAX_TIMER_DELAY_MS);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(3_000_000_000 - MAX_TIMER_DELAY_MS - 1);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('cancels across chained steps', () => {
    const callback = vi.fn();
    const cancel = setLongTimeout(callback, 3_000_000_000);
    vi.advanceTimersByTime(MAX_TIMER_DELAY_MS + 10);
    cancel();
    vi.advanceTimersByTime(3_000_000_000);
    expect(callback).not.toHaveBeenCalled();
  });
});
