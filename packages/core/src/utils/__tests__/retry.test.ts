/**
 * Tests for withRetry
 */

import { describe, it, expect, vi } from 'vitest';
import { TransportError } from '../errors.js';
import { sleep, withRetry } from '../retry.js';

const timeout = () => new TransportError(
  { kind: 'Timeout', message: 'Request timed out after 5ms', timeoutMs: 5 },
  { operation: 'lookup' }
);

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { initialDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry retryable errors until an attempt succeeds', async () => {
    const fn = vi.fn<[], Promise<string>>()
      .mockRejectedValueOnce(timeout())
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(withRetry(fn, { initialDelayMs: 0, jitter: false, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(TransportError), 0);
  });

  it('should stop after maxAttempts and rethrow the last error', async () => {
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(timeout());

    await expect(withRetry(fn, { maxAttempts: 3, initialDelayMs: 0, jitter: false }))
      .rejects.toThrow('Request timed out after 5ms');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should not retry errors that are not retryable', async () => {
    const rejected = new TransportError({ kind: 'HttpError', message: 'HTTP 400', status: 400 }, { operation: 'lookup' });
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(rejected);

    await expect(withRetry(fn, { initialDelayMs: 0 })).rejects.toBe(rejected);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should let retryOn override the default policy', async () => {
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(timeout());

    await expect(withRetry(fn, { initialDelayMs: 0, retryOn: () => false })).rejects.toThrow();
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should stop waiting and make no further attempt once the signal aborts', async () => {
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(timeout());
    const controller = new AbortController();

    const pending = withRetry(fn, { initialDelayMs: 60000, jitter: false, signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toThrow('Request timed out after 5ms');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('sleep', () => {
  it('should resolve early when aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();

    const pending = sleep(60000, controller.signal);
    controller.abort();
    await pending;

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('should resolve at once for an already aborted signal', async () => {
    await expect(sleep(60000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
