import { sleep } from './sleep.util';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Calls `fn` until it resolves, `shouldRetry` refuses the error or the attempt
 * budget is spent. Backoff doubles from `baseDelayMs` up to `maxDelayMs`.
 * Never throws: the final error comes back in the result.
 */
export const retry = async <T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = { attempts: 3, baseDelayMs: 500 },
): Promise<RetryResult<T>> => {
  const { attempts, baseDelayMs, maxDelayMs = 30_000, shouldRetry, onRetry, signal } = options;
  const maxAttempts = Math.max(1, attempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return { ok: true, value: await fn(attempt), attempts: attempt };
    } catch (error) {
      const allowRetry =
        attempt < maxAttempts &&
        !signal?.aborted &&
        (shouldRetry ? shouldRetry(error) : true);
      if (!allowRetry) {
        return { ok: false, error, attempts: attempt };
      }
      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      onRetry?.(error, attempt, delay);
      try {
        await sleep(delay, signal);
      } catch (sleepError) {
        return { ok: false, error: sleepError, attempts: attempt };
      }
    }
  }
};
