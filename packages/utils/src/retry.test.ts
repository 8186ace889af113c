import { describe, it, expect, vi } from 'vitest';
import { retry, backoffDelay } from './retry.js';

describe('backoffDelay', () => {
  it('doubles from the initial delay and caps at maxDelay', () => {
    const opts = { initialDelay: 5000, backoffMultiplier: 2, maxDelay: 60000 };
    expect(backoffDelay(1, opts)).toBe(5000);
    expect(backoffDelay(2, opts)).toBe(10000);
    expect(backoffDelay(4, opts)).toBe(40000);
    expect(backoffDelay(5, opts)).toBe(60000);
  });
});

describe('retry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce('ok');

    const result = await retry(fn, { maxAttempts: 3, initialDelay: 1 });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('throws the last error once attempts are exhausted', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValue(new Error('down'));

    await expect(retry(fn, { maxAttempts: 3, initialDelay: 1, onRetry })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(2, expect.any(Error), 2, 2);
  });

  it('stops immediately when retryIf rejects the error', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));

    await expect(retry(fn, { maxAttempts: 5, initialDelay: 1, retryIf: () => false })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('passes the attempt number to the task', async () => {
    const seen: number[] = [];
    await retry(async (attempt) => {
      seen.push(attempt);
      if (attempt < 3) throw new Error('again');
      return attempt;
    }, { maxAttempts: 3, initialDelay: 1 });

    expect(seen).toEqual([1, 2, 3]);
  });
});
