/** Largest delay a single `setTimeout` honours; Node fires anything longer after 1ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * `setTimeout` for delays of any length, chained in steps of at most
 * `MAX_TIMER_DELAY_MS`. Returns a cancel function.
 */
export function setLongTimeout(callback: () => void, delayMs: number): () => void {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const schedule = (remaining: number) => {
    const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
    timer = setTimeout(() => {
      if (remaining > step) schedule(remaining - step);
      else callback();
    }, step);
  };
  schedule(Math.max(0, delayMs));
  return () => clearTimeout(timer);
}
