/**
 * Tests for bounded retry and transient error classification
 */

import {
  DEFAULT_RETRY_CONFIG,
  isRetryableError,
  RetryConfig,
  RetryExhaustedError,
  RetryLog,
  withRetry,
} from '../src/utils/retry.js';

const fast: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 5,
  maxDelayMs: 5,
  multiplier: 1,
  timeoutMs: 0,
};

describe('withRetry', () => {
  describe('success cases', () => {
    it('should succeed on first attempt', async () => {
      const fn = jest.fn<Promise<string>, []>().mockResolvedValue('success');

      await expect(withRetry(fn, fast)).resolves.toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry on failure and eventually succeed', async () => {
      const fn = jest
        .fn<Promise<string>, []>()
        .mockRejectedValueOnce(new Error('Temporary failure'))
        .mockRejectedValueOnce(new Error('Temporary failure'))
        .mockResolvedValueOnce('success');

      await expect(withRetry(fn, fast)).resolves.toBe('success');
      expect(fn).toHaveBeenCalledTimes(3);
    });
  });

  describe('failure cases', () => {
    it('should throw RetryExhaustedError after max attempts', async () => {
      const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('Always fails'));

      const error = await withRetry(fn, fast).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetryExhaustedError);
      if (error instanceof RetryExhaustedError) {
        expect(error.message).toBe('Failed after 3 attempts. Last error: Always fails');
        expect(error.attempts).toBe(3);
      }
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should rethrow at once when the predicate refuses a retry', async () => {
      const fatal = new Error('Invalid descriptor');
      const fn = jest.fn<Promise<string>, []>().mockRejectedValue(fatal);

      await expect(withRetry(fn, { ...fast, shouldRetry: isRetryableError })).rejects.toBe(fatal);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should log every attempt', async () => {
      const logs: RetryLog[] = [];
      const fn = jest
        .fn<Promise<string>, []>()
        .mockRejectedValueOnce(new Error('Fail 1'))
        .mockResolvedValueOnce('success');

      await withRetry(fn, fast, (log) => logs.push(log));

      expect(logs.map((log) => [log.attempt, log.success, log.error, log.nextRetryInMs])).toEqual([
        [1, false, 'Fail 1', 5],
        [2, true, undefined, undefined],
      ]);
    });
  });

  describe('delays', () => {
    it('should wait between attempts', async () => {
      const startTime = Date.now();
      const fn = jest.fn<Promise<string>, []>().mockRejectedValueOnce(new Error('Fail')).mockResolvedValueOnce('ok');

      await withRetry(fn, { ...fast, maxAttempts: 2, initialDelayMs: 100, maxDelayMs: 100 });

      expect(Date.now() - startTime).toBeGreaterThanOrEqual(90);
    });

    it('should default to ten attempts one second apart', () => {
      expect(DEFAULT_RETRY_CONFIG).toEqual({
        maxAttempts: 10,
        initialDelayMs: 1000,
        maxDelayMs: 1000,
        multiplier: 1,
        timeoutMs: 0,
      });
    });
  });

  describe('timeout handling', () => {
    it('should time out an attempt that takes too long', async () => {
      const fn = jest.fn(
        () =>
          new Promise<string>((resolve) => {
            setTimeout(() => resolve('slow'), 500);
          })
      );

      await expect(withRetry(fn, { ...fast, maxAttempts: 1, timeoutMs: 50 })).rejects.toThrow(
        'Last error: Timeout after 50ms'
      );
    });
  });
});

describe('isRetryableError', () => {
  it('should identify transient transport errors', () => {
    expect(isRetryableError(new Error('Connection timeout'))).toBe(true);
    expect(isRetryableError(new Error('ECONNREFUSED'))).toBe(true);
    expect(isRetryableError(new Error('14 UNAVAILABLE: No connection established'))).toBe(true);
    expect(isRetryableError('socket hang up')).toBe(true);
  });

  it('should identify non-retryable errors', () => {
    expect(isRetryableError(new Error('Invalid request'))).toBe(false);
    expect(isRetryableError(new Error('Not found'))).toBe(false);
  });
});
