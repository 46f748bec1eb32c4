/**
 * Retry Utilities
 *
 * Bounded retry with exponential backoff for transient Core failures.
 */

import { GroundCheckError } from './errors.js';

export interface RetryConfig {
  /** Total attempts, including the first one */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Add up to 100ms of random jitter between attempts */
  jitter: boolean;
  retryOn?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Cuts the wait between attempts short; no further attempt is made */
  signal?: AbortSignal;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  jitter: true,
};

/**
 * Execute a function with retry logic
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  let lastError: Error = new Error('withRetry: no attempts were made');
  let delay = cfg.initialDelayMs;

  for (let attempt = 1; attempt <= cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const shouldRetry = cfg.retryOn
        ? cfg.retryOn(lastError)
        : isRetryable(lastError);

      if (!shouldRetry || attempt === cfg.maxAttempts) {
        break;
      }

      cfg.onRetry?.(attempt, lastError, delay);

      await sleep(delay, cfg.signal);
      if (cfg.signal?.aborted) {
        break;
      }

      delay = Math.min(
        delay * cfg.backoffMultiplier + (cfg.jitter ? Math.random() * 100 : 0),
        cfg.maxDelayMs
      );
    }
  }

  throw lastError;
}

function isRetryable(error: Error): boolean {
  if (error instanceof GroundCheckError) {
    return error.retryable;
  }

  const retryablePatterns = [
    /ECONNRESET/i,
    /ETIMEDOUT/i,
    /ECONNREFUSED/i,
    /network/i,
    /timeout/i,
    /503/,
    /502/,
  ];

  return retryablePatterns.some(p => p.test(error.message));
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts. The timer is cleared on
 * abort so it cannot keep the process alive.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
