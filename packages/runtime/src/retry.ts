// Bounded retry with exponential backoff
//
// Used for every transient dependency: store writes, queue enqueue,
// escalation publication.

export type RetryOptions = {
  /** Total attempts including the first (>= 1) */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;

  /** Jitter as a fraction of the computed delay (default 0.3) */
  jitterRatio?: number;

  /** Whether an error is worth another attempt. Defaults to always. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;

  /** Called before sleeping ahead of the next attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;

  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

/**
 * Retry settings a component is configured with; the component supplies
 * its own retry predicate and logging.
 */
export type RetrySettings = Omit<RetryOptions, 'shouldRetry' | 'onRetry'>;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff delay for the given retry index (0 = first retry),
 * capped at `maxDelayMs`, plus jitter.
 */
export function calculateBackoffDelay(
  retryIndex: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterRatio = 0.3,
  random: () => number = Math.random
): number {
  const delay = Math.min(baseDelayMs * Math.pow(2, retryIndex), maxDelayMs);
  const jitter = random() * jitterRatio * delay;
  return Math.floor(delay + jitter);
}

/**
 * Retries a function with exponential backoff.
 * Rethrows the last error once attempts are exhausted or `shouldRetry` declines.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const sleep = options.sleep ?? defaultSleep;
  const shouldRetry = options.shouldRetry ?? (() => true);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        throw error;
      }

      const delay = calculateBackoffDelay(
        attempt - 1,
        options.baseDelayMs,
        options.maxDelayMs,
        options.jitterRatio,
        options.random
      );
      options.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}
