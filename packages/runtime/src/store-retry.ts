import { StoreUnavailableError } from '@carechain/repositories';
import type { Logger } from './logger.js';
import { describeError } from './logger.js';
import { retryWithBackoff, type RetrySettings } from './retry.js';

/**
 * Run a store operation, retrying only StoreUnavailableError.
 * Anything else (integrity violations, validation) fails on the first attempt.
 */
export function withStoreRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  settings: RetrySettings,
  logger: Logger
): Promise<T> {
  return retryWithBackoff(fn, {
    ...settings,
    shouldRetry: (error) => error instanceof StoreUnavailableError,
    onRetry: (error, attempt, delayMs) => {
      logger.warn('Store unavailable, retrying', {
        operation,
        attempt,
        delayMs,
        ...describeError(error),
      });
    },
  });
}
