/**
 * Millisecond clock that never returns the same value twice and never goes
 * backwards, even when the wall clock does.
 */
export interface MonotonicClock {
  /** Epoch milliseconds, strictly greater than the previous call */
  now(): number;
}

export function createMonotonicClock(source: () => number = Date.now): MonotonicClock {
  let last = Number.NEGATIVE_INFINITY;
  return {
    now() {
      const current = Math.floor(source());
      last = current > last ? current : last + 1;
      return last;
    },
  };
}
