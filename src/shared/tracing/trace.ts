/**
 * Trace Scopes
 *
 * `withTrace` runs a callback in a new child of the current span;
 * `trace` wraps a function so every call does so and records its
 * arguments and result. Outside a Tracing both run the callback untraced.
 */

import { toJsonValue, type JsonObject } from '../utils/json.js';
import { getCurrentSpan } from './context.js';
import {
  DEFAULT_SPAN_NAME,
  EXCEPTION_KEY,
  EXCEPTION_MESSAGE_KEY,
  EXCEPTION_STACKTRACE_KEY,
  EXCEPTION_TYPE_KEY,
  FUNCTION_ARGS_KEY,
  FUNCTION_DECORATOR_KEY,
  FUNCTION_NAME_KEY,
  FUNCTION_RETURNED_KEY,
  LOG_WITH_TRACE_NAME,
} from './constants.js';
import { runCleanupAfterFailure, withSpanScope } from './span.js';
import type { Span } from './types.js';

export interface TraceOptions {
  /** Span name; defaults to the function name, else 'no-name' */
  name?: string;
  /** Initial span data */
  data?: JsonObject;
  /** Record call arguments under trace_function.args (default: true) */
  recordArgs?: boolean;
  /** Record the resolved result under trace_function.returned (default: true) */
  recordResult?: boolean;
}

/**
 * Describe a thrown value for span data
 */
export function describeException(error: unknown): JsonObject {
  if (error instanceof Error) {
    return {
      [EXCEPTION_TYPE_KEY]: error.name,
      [EXCEPTION_MESSAGE_KEY]: error.message,
      [EXCEPTION_STACKTRACE_KEY]: error.stack ?? null,
    };
  }
  return {
    [EXCEPTION_TYPE_KEY]: typeof error,
    [EXCEPTION_MESSAGE_KEY]: String(error),
    [EXCEPTION_STACKTRACE_KEY]: null,
  };
}

/**
 * Run `fn` inside a new child of the current span
 *
 * The span receives `start_time`/`end_time`, and `exception` when `fn`
 * throws; the error is rethrown unchanged. Without a current span `fn`
 * receives `undefined` and runs untraced.
 */
export async function withTrace<T>(
  nameOrOptions: string | TraceOptions,
  fn: (span: Span | undefined) => Promise<T> | T
): Promise<T> {
  const options = typeof nameOrOptions === 'string' ? { name: nameOrOptions } : nameOrOptions;
  const parent = getCurrentSpan();
  if (parent === undefined) {
    return fn(undefined);
  }

  const child = await parent.newChild(options.name ?? DEFAULT_SPAN_NAME, options.data);
  return withSpanScope(child, async (span) => {
    try {
      return await fn(span);
    } catch (error) {
      await runCleanupAfterFailure('record exception', () =>
        span.updateData({ [EXCEPTION_KEY]: describeException(error) })
      );
      throw error;
    }
  });
}

/**
 * Wrap a function so each call runs in its own child span
 *
 * The wrapper always returns a promise. Records
 * `trace_function: { name, args, returned }` using best-effort JSON
 * encoding of the arguments and result.
 *
 * @example
 * const fetchUser = trace(async function fetchUser(id: string) { ... });
 * await tracing.run(() => fetchUser('u1'));
 */
export function trace<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: TraceOptions = {}
): (...args: A) => Promise<Awaited<R>> {
  const functionName = fn.name || DEFAULT_SPAN_NAME;
  const spanName = options.name ?? functionName;
  const recordArgs = options.recordArgs ?? true;
  const recordResult = options.recordResult ?? true;

  const traced = async function (this: unknown, ...args: A): Promise<Awaited<R>> {
    return withTrace({ name: spanName, data: options.data }, async (span): Promise<Awaited<R>> => {
      const info: JsonObject = { [FUNCTION_NAME_KEY]: functionName };
      if (span && recordArgs) {
        info[FUNCTION_ARGS_KEY] = toJsonValue(args);
        await span.updateData({ [FUNCTION_DECORATOR_KEY]: info });
      }

      const result = await fn.apply(this, args);

      if (span && recordResult) {
        await span.updateData({
          [FUNCTION_DECORATOR_KEY]: { ...info, [FUNCTION_RETURNED_KEY]: toJsonValue(result) },
        });
      }
      return result;
    });
  };

  Object.defineProperty(traced, 'name', { value: functionName });
  return traced;
}

/**
 * Write `data` as a new, immediately closed child of the current span
 */
export async function logWithTrace(data: JsonObject, name: string = LOG_WITH_TRACE_NAME): Promise<void> {
  await withTrace({ name, data }, () => undefined);
}
