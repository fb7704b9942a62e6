/**
 * Current-Span Context
 *
 * Holds "the span new children attach to" per async execution context.
 * Uses AsyncLocalStorage, so the value follows promises, timers and
 * callbacks created inside a scope, and every concurrent chain sees its
 * own value.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { NoCurrentSpanError, SpanTypeMismatchError } from '../errors/index.js';
import type { Span } from './types.js';

/**
 * Async local storage for the current span
 */
const spanStorage = new AsyncLocalStorage<Span | undefined>();

/**
 * Constructor of a concrete span class, for typed lookups
 */
export type SpanClass<S extends Span> = abstract new (...args: never[]) => S;

/**
 * Get the current span, if any
 */
export function getCurrentSpan(): Span | undefined {
  return spanStorage.getStore();
}

/**
 * Get the current span
 *
 * @throws NoCurrentSpanError outside an active Tracing
 */
export function getCurrentSpanSafe(): Span {
  const span = spanStorage.getStore();
  if (span === undefined) {
    throw new NoCurrentSpanError();
  }
  return span;
}

/**
 * Get the current span as a specific implementation
 *
 * @throws NoCurrentSpanError outside an active Tracing
 * @throws SpanTypeMismatchError when the current span is another class
 */
export function getCurrentSpanSafeTyped<S extends Span>(spanClass: SpanClass<S>): S {
  const span = getCurrentSpanSafe();
  if (!(span instanceof spanClass)) {
    throw new SpanTypeMismatchError(spanClass.name, span.constructor.name);
  }
  return span;
}

/**
 * Run a function with `span` as the current span
 *
 * The previous value is back in place once `fn` returns or throws; for an
 * async `fn` the span stays current across its awaits. Passing `undefined`
 * runs `fn` untraced.
 */
export function runInSpan<T>(span: Span | undefined, fn: () => T): T {
  return spanStorage.run(span, fn);
}
