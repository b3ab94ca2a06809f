import { setTimeout as sleep } from 'node:timers/promises';
import { TimeoutError } from '../core/monitor/errors.js';

export interface RetryOptions {
  /** Total attempts including the first one. */
  attempts: number;
  /** Delay before the second attempt; doubles on each further attempt. */
  baseDelayMs: number;
  retryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** attempt;
}

/**
 * Runs `fn` until it succeeds, a non-retryable error is thrown, or the
 * attempts run out. The last error is rethrown unchanged.
 */
export async function withRetries<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt + 1 >= attempts || !options.retryable(error)) {
        throw error;
      }
      const delayMs = backoffDelay(options.baseDelayMs, attempt);
      options.onRetry?.(error, attempt + 1, delayMs);
      attempt++;
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}

/**
 * Rejects with a TimeoutError when `promise` does not settle within `ms`.
 * The timer is always cleared, so nothing is left pending.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
