/**
 * Span Scopes
 *
 * Shared span behaviour and the scope that opens a span, makes it current,
 * and closes it on every exit path.
 */

import { createChildLogger } from '../logging/structured.js';
import type { JsonObject } from '../utils/json.js';
import { runInSpan } from './context.js';
import { END_TIME_KEY, START_TIME_KEY } from './constants.js';
import type { SpanId } from './ids.js';
import type { Span, SpanRef } from './types.js';

const log = createChildLogger({ component: 'span-scope' });

/**
 * Timestamp format written to `start_time` / `end_time`
 */
export function spanTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}

/**
 * Base class for store-backed spans
 *
 * Records `start_time` when a scope opens the span and `end_time` when
 * it closes.
 */
export abstract class BaseSpan implements Span {
  abstract readonly id: SpanId;

  abstract getName(): Promise<string>;
  abstract getData(): Promise<JsonObject>;
  abstract newChild(name?: string, data?: JsonObject): Promise<Span>;
  abstract updateData(patch: JsonObject): Promise<void>;
  abstract toRef(): SpanRef;

  async open(): Promise<void> {
    await this.updateData({ [START_TIME_KEY]: spanTimestamp() });
  }

  async close(): Promise<void> {
    await this.updateData({ [END_TIME_KEY]: spanTimestamp() });
  }
}

/**
 * Run `cleanup` while an error from user code is in flight
 *
 * A cleanup failure is logged, never thrown, so the caller can rethrow
 * the original error.
 */
export async function runCleanupAfterFailure(what: string, cleanup: () => Promise<void>): Promise<void> {
  try {
    await cleanup();
  } catch (cleanupError) {
    log.warn(
      `Failed to ${what} after an error`,
      undefined,
      cleanupError instanceof Error ? cleanupError : new Error(String(cleanupError))
    );
  }
}

/**
 * Open `span`, run `fn` with it as the current span, then close it
 *
 * Errors from `fn` propagate unchanged after the span is closed. A failing
 * `close()` is thrown only when `fn` succeeded.
 */
export async function withSpanScope<S extends Span, T>(
  span: S,
  fn: (span: S) => Promise<T> | T
): Promise<T> {
  await span.open();
  let result: T;
  try {
    result = await runInSpan(span, () => fn(span));
  } catch (error) {
    await runCleanupAfterFailure('close span', () => span.close());
    throw error;
  }
  await span.close();
  return result;
}
