/**
 * Unit tests for the retry helpers
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { backoffDelay, sleep, withRetry } from '../../src/utils/retry.js';

describe('retry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('backoffDelay', () => {
    it('should grow exponentially up to the ceiling', () => {
      const options = { baseDelayMs: 100, maxDelayMs: 1000 };

      expect([0, 1, 2, 3, 4].map((attempt) => backoffDelay(attempt, options))).toEqual([100, 200, 400, 800, 1000]);
      expect(backoffDelay(2, { ...options, multiplier: 3 })).toBe(900);
    });
  });

  describe('sleep', () => {
    it('should resolve early when aborted', async () => {
      vi.useFakeTimers();
      const controller = new AbortController();
      const done = vi.fn();

      const sleeping = sleep(10000, controller.signal).then(done);
      controller.abort();
      await sleeping;

      expect(done).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe('withRetry', () => {
    it('should return the first success', async () => {
      const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok');

      await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 1 })).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1]);
    });

    it('should rethrow the last error once retries are used up', async () => {
      vi.useFakeTimers();
      const onRetry = vi.fn();
      let calls = 0;
      const fn = async (): Promise<never> => {
        calls++;
        throw new Error(`failure ${calls}`);
      };

      const result = withRetry(fn, { maxRetries: 2, baseDelayMs: 100, maxDelayMs: 1000, onRetry });
      const assertion = expect(result).rejects.toThrow('failure 3');
      await vi.runAllTimersAsync();
      await assertion;

      expect(calls).toBe(3);
      expect(onRetry.mock.calls.map(([, attempt, delayMs]) => [attempt, delayMs])).toEqual([
        [1, 100],
        [2, 200],
      ]);
    });

    it('should not retry errors that are not retryable', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('bad request'));

      await expect(
        withRetry(fn, { maxRetries: 5, baseDelayMs: 1, maxDelayMs: 1, isRetryable: () => false })
      ).rejects.toThrow('bad request');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should stop retrying when aborted during the wait', async () => {
      const controller = new AbortController();
      const fn = vi.fn().mockRejectedValue(new Error('down'));

      const result = withRetry(fn, {
        maxRetries: 5,
        baseDelayMs: 10000,
        maxDelayMs: 10000,
        signal: controller.signal,
        onRetry: () => controller.abort(),
      });

      await expect(result).rejects.toThrow('down');
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });
});
