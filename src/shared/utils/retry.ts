/**
 * Retry utilities for recoverable operations
 *
 * Provides backoff retry logic for transient failures: SQLITE_BUSY on
 * concurrent writers, and span server readiness polling.
 */

import { DatabaseBusyError } from '../errors/index.js';
import { DATABASE_RETRY_CONFIG } from '../config/timeouts.js';
import * as logger from '../logging/logger.js';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxAttempts?: number;
  /** Initial delay in ms (default: 50) */
  initialDelayMs?: number;
  /** Maximum delay in ms (default: 2000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Jitter fraction applied to each delay (default: 0.25) */
  jitter?: number;
  /** Hard deadline in ms measured from the first attempt */
  deadlineMs?: number;
  /** Custom check for retryable errors */
  isRetryable?: (error: unknown) => boolean;
  /** Called on each retry attempt */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'isRetryable' | 'onRetry' | 'deadlineMs'>> = {
  maxAttempts: 3,
  initialDelayMs: 50,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
  jitter: 0.25,
};

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Block the current thread for a given number of milliseconds
 */
function sleepSync(ms: number): void {
  const view = new Int32Array(new SharedArrayBuffer(4));
  Atomics.wait(view, 0, 0, ms);
}

/**
 * Calculate delay with exponential backoff and jitter
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  multiplier: number,
  jitter: number = DEFAULT_OPTIONS.jitter
): number {
  const exponentialDelay = initialDelayMs * Math.pow(multiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const offset = cappedDelay * jitter * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(cappedDelay + offset));
}

/**
 * Retry an async operation with exponential backoff
 *
 * With `deadlineMs` set, no attempt starts after the deadline and the last
 * wait is shortened to end on it.
 *
 * @example
 * const ready = await withRetry(() => probe(url), {
 *   maxAttempts: Infinity,
 *   backoffMultiplier: 1,
 *   deadlineMs: 30_000,
 *   isRetryable: () => true,
 * });
 */
export async function withRetry<T>(
  operation: () => T | Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const {
    maxAttempts,
    initialDelayMs,
    maxDelayMs,
    backoffMultiplier,
    jitter,
  } = { ...DEFAULT_OPTIONS, ...options };

  const isRetryable = options?.isRetryable ?? (() => false);
  const onRetry = options?.onRetry;
  const deadline = options?.deadlineMs !== undefined ? Date.now() + options.deadlineMs : Infinity;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      const remainingMs = deadline - Date.now();
      const shouldRetry = attempt < maxAttempts && remainingMs > 0 && isRetryable(error);

      if (!shouldRetry) {
        throw error;
      }

      const delayMs = Math.min(
        calculateDelay(attempt, initialDelayMs, maxDelayMs, backoffMultiplier, jitter),
        remainingMs
      );

      onRetry?.(attempt, error, delayMs);

      await sleep(delayMs);
    }
  }

  throw lastError;
}

/**
 * Synchronous retry for SQLite operations
 *
 * Retries only SQLITE_BUSY / SQLITE_LOCKED failures; anything else
 * (constraint violations, disk full, permissions) propagates at once.
 * Blocks the thread between attempts.
 */
export function withDatabaseRetrySync<T>(
  operation: () => T,
  label: string,
  options?: Omit<RetryOptions, 'isRetryable' | 'onRetry' | 'deadlineMs'>
): T {
  const {
    maxAttempts,
    initialDelayMs,
    maxDelayMs,
    backoffMultiplier,
    jitter,
  } = { ...DEFAULT_OPTIONS, ...DATABASE_RETRY_CONFIG, ...options };

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return operation();
    } catch (error) {
      lastError = error;

      if (attempt < maxAttempts && DatabaseBusyError.isBusyError(error)) {
        const delayMs = calculateDelay(
          attempt,
          initialDelayMs,
          maxDelayMs,
          backoffMultiplier,
          jitter
        );
        logger.debug(`Database busy during ${label}, retry ${attempt} in ${delayMs}ms`);
        sleepSync(delayMs);
        continue;
      }

      throw error;
    }
  }

  throw lastError;
}
