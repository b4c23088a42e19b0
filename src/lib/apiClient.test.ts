import { describe, it, expect, vi } from 'vitest';
import { exponentialDelay, isRetryable, withRetry } from './apiClient';

function httpError(code: number): Error {
  return Object.assign(new Error(`HTTP ${code}`), { code });
}

describe('isRetryable', () => {
  it('retries rate limits, server errors and network failures', () => {
    expect(isRetryable(httpError(429))).toBe(true);
    expect(isRetryable(httpError(503))).toBe(true);
    expect(isRetryable(new Error('socket hang up'))).toBe(true);
    expect(isRetryable(new Error('ETIMEDOUT while reading'))).toBe(true);
  });

  it('does not retry client errors or unknown failures', () => {
    expect(isRetryable(httpError(400))).toBe(false);
    expect(isRetryable(httpError(401))).toBe(false);
    expect(isRetryable(httpError(403))).toBe(false);
    expect(isRetryable(httpError(404))).toBe(false);
    expect(isRetryable(new Error('bad input'))).toBe(false);
    expect(isRetryable('nope')).toBe(false);
  });
});

describe('exponentialDelay', () => {
  it('doubles from one second with jitter and caps at fifteen', () => {
    const first = exponentialDelay(1);
    expect(first).toBeGreaterThanOrEqual(500);
    expect(first).toBeLessThanOrEqual(1000);
    const late = exponentialDelay(10);
    expect(late).toBeGreaterThanOrEqual(7500);
    expect(late).toBeLessThanOrEqual(15000);
  });
});

describe('withRetry', () => {
  it('retries retryable failures until success', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const onRetry = vi.fn();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { delayMs: (n) => n * 10, sleep, onRetry })).resolves.toBe('ok');
    expect(fn.mock.calls).toEqual([[1], [2], [3]]);
    expect(sleep.mock.calls).toEqual([[10], [20]]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][1]).toBe(1);
    expect(onRetry.mock.calls[0][2]).toBe(10);
  });

  it('stops at the first non-retryable failure', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const err = httpError(401);
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(err);

    await expect(withRetry(fn, { sleep })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('rethrows the last error when attempts run out', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const err = httpError(429);
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(err);

    await expect(withRetry(fn, { maxAttempts: 2, delayMs: () => 5, sleep })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[5]]);
  });

  it('uses a custom retry predicate', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('done');

    await expect(withRetry(fn, { shouldRetry: () => true, delayMs: () => 0, sleep })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
