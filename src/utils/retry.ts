/**
 * Exponential backoff retry helper
 */

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before the first retry */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  /** Growth factor between consecutive delays */
  multiplier?: number;
  /** Errors for which this returns false are rethrown immediately */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each retry sleep */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

/**
 * Delay before retry number `attempt` (0-based)
 */
export function backoffDelay(attempt: number, options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'multiplier'>): number {
  const multiplier = options.multiplier ?? 2;
  return Math.min(options.maxDelayMs, options.baseDelayMs * Math.pow(multiplier, attempt));
}

/**
 * Sleep that resolves early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` until it resolves, a non-retryable error is thrown, the retries
 * are used up, or the signal aborts. The last error is rethrown.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const isRetryable = options.isRetryable ?? (() => true);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.maxRetries || !isRetryable(error) || options.signal?.aborted) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs, options.signal);

      if (options.signal?.aborted) {
        throw error;
      }
    }
  }
}
