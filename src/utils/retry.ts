/**
 * withRetry — exponential backoff retry wrapper
 */

import { abortableSleep } from '../kernel/clock.js';

export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Initial delay in ms (default: 500) */
  initialDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffFactor?: number;
  /** Max delay cap in ms (default: 30_000) */
  maxDelayMs?: number;
  /** Retry only if this returns true for the error */
  retryIf?: (error: unknown) => boolean;
  /** Called before each wait with the attempt that just failed */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Aborting stops further attempts; the last error is re-thrown */
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Retry an async function with exponential backoff.
 * On final failure, the last error is re-thrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 500,
    backoffFactor = 2,
    maxDelayMs = 30_000,
    retryIf,
    onRetry,
    signal,
    sleep = abortableSleep,
  } = options;

  let lastError: unknown;
  let delayMs = initialDelayMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === maxAttempts) break;
      if (retryIf && !retryIf(error)) break;
      if (signal?.aborted) break;

      onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, signal);
      delayMs = Math.min(delayMs * backoffFactor, maxDelayMs);
    }
  }

  throw lastError;
}
