import { describe, expect, it, vi } from 'vitest';
import { TimeoutError } from '../../core/monitor/errors.js';
import { backoffDelay, withRetries, withTimeout } from '../retry.js';

class Flaky extends Error {}

describe('backoffDelay', () => {
  it('doubles per attempt', () => {
    expect([0, 1, 2].map((attempt) => backoffDelay(100, attempt))).toEqual([100, 200, 400]);
  });
});

describe('withRetries', () => {
  it('retries retryable failures until success', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Flaky('first')).mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(
      withRetries(fn, { attempts: 3, baseDelayMs: 0, retryable: (e) => e instanceof Flaky, onRetry }),
    ).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Flaky), 1, 0);
  });

  it('rethrows the last error once attempts run out', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Flaky('first')).mockRejectedValueOnce(new Flaky('second'));

    await expect(withRetries(fn, { attempts: 2, baseDelayMs: 0, retryable: () => true })).rejects.toThrow('second');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry other errors', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));

    await expect(withRetries(fn, { attempts: 5, baseDelayMs: 0, retryable: (e) => e instanceof Flaky })).rejects.toThrow(
      'fatal',
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('resolves with the value when it settles in time', async () => {
    await expect(withTimeout(Promise.resolve(5), 100, 'fast')).resolves.toBe(5);
  });

  it('rejects with a TimeoutError otherwise', async () => {
    const never = new Promise<never>(() => {});
    const result = withTimeout(never, 10, 'slow op');

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow('slow op timed out after 10ms');
  });
});
