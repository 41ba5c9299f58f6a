import { describe, it, expect } from 'vitest';
import { StoreUnavailableError } from '@carechain/repositories';
import { calculateBackoffDelay, retryWithBackoff } from './retry.js';
import { withStoreRetry } from './store-retry.js';
import { createCapturingLogger } from './logger.js';

describe('calculateBackoffDelay', () => {
  const half = () => 0.5;

  it('doubles per retry and adds jitter', () => {
    expect(calculateBackoffDelay(0, 100, 2000, 0.3, half)).toBe(115);
    expect(calculateBackoffDelay(1, 100, 2000, 0.3, half)).toBe(230);
  });

  it('caps the delay before jitter', () => {
    expect(calculateBackoffDelay(5, 100, 2000, 0.3, half)).toBe(2300);
    expect(calculateBackoffDelay(5, 100, 2000, 0, half)).toBe(2000);
  });
});

describe('retryWithBackoff', () => {
  it('returns the first success', async () => {
    const sleeps: number[] = [];
    let calls = 0;

    const result = await retryWithBackoff(
      async (attempt) => {
        calls++;
        if (attempt < 3) throw new Error('not yet');
        return 'done';
      },
      {
        maxAttempts: 5,
        baseDelayMs: 10,
        maxDelayMs: 100,
        jitterRatio: 0,
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      }
    );

    expect(result).toBe('done');
    expect(calls).toBe(3);
    expect(sleeps).toEqual([10, 20]);
  });

  it('rethrows the last error after the final attempt', async () => {
    let calls = 0;

    await expect(
      retryWithBackoff(
        async (attempt) => {
          calls++;
          throw new Error(`failure ${attempt}`);
        },
        { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, sleep: async () => {} }
      )
    ).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
  });

  it('stops when shouldRetry declines', async () => {
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          throw new TypeError('terminal');
        },
        {
          maxAttempts: 5,
          baseDelayMs: 0,
          maxDelayMs: 0,
          sleep: async () => {},
          shouldRetry: (error) => !(error instanceof TypeError),
        }
      )
    ).rejects.toBeInstanceOf(TypeError);
    expect(calls).toBe(1);
  });
});

describe('withStoreRetry', () => {
  const settings = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, sleep: async () => {} };

  it('retries only an unavailable store', async () => {
    const logger = createCapturingLogger();
    let calls = 0;

    const result = await withStoreRetry(
      'analyses.append',
      async () => {
        calls++;
        if (calls === 1) throw new StoreUnavailableError('processing');
        return 'ok';
      },
      settings,
      logger
    );

    expect(result).toBe('ok');
    expect(logger.entries.map((e) => e.data)).toEqual([
      {
        operation: 'analyses.append',
        attempt: 1,
        delayMs: 0,
        errorName: 'StoreUnavailableError',
        errorCode: 'STORE_UNAVAILABLE',
      },
    ]);
  });

  it('does not retry other errors', async () => {
    let calls = 0;

    await expect(
      withStoreRetry(
        'analyses.append',
        async () => {
          calls++;
          throw new Error('constraint');
        },
        settings,
        createCapturingLogger()
      )
    ).rejects.toThrow('constraint');
    expect(calls).toBe(1);
  });
});
