/**
 * Task Execution inside a Worker
 *
 * Shared by the thread and process bootstraps: rebuild the parent's span
 * from its reference, load the task's module and call the export with the
 * span as current.
 */

import { isAbsolute } from 'node:path';
import { pathToFileURL } from 'node:url';
import { runInSpan, resolveSpanRef, type Span, type SpanRef } from '../../shared/tracing/index.js';
import { toJsonValue, type JsonValue } from '../../shared/utils/json.js';
import { ValidationError, isRecord, unwrapResult, validateSpanRef } from '../../shared/validation/index.js';
import type { TaskSpec } from './protocol.js';

/**
 * Import specifier for a task module: file URLs and bare specifiers pass
 * through, absolute paths become file URLs
 */
export function toModuleSpecifier(modulePath: string): string {
  return isAbsolute(modulePath) ? pathToFileURL(modulePath).href : modulePath;
}

async function loadTaskFunction(task: TaskSpec): Promise<(...args: JsonValue[]) => unknown> {
  const exportName = task.exportName ?? 'default';
  const mod: unknown = await import(toModuleSpecifier(task.modulePath));
  const fn: unknown = isRecord(mod) ? mod[exportName] : undefined;
  if (typeof fn !== 'function') {
    throw new ValidationError(`Export '${exportName}' of ${task.modulePath} is not a function`, 'exportName', exportName);
  }
  return (...args: JsonValue[]): unknown => Reflect.apply(fn, undefined, args);
}

/**
 * Resolve the span a task runs under; undefined for a null reference
 */
export async function resolveTaskSpan(spanRef: SpanRef | null): Promise<Span | undefined> {
  if (spanRef === null) return undefined;
  return resolveSpanRef(unwrapResult(validateSpanRef(spanRef), 'span reference'));
}

/**
 * Run a task with the referenced span as current
 *
 * The result is converted to JSON best effort; errors propagate unchanged.
 */
export async function executeTask(task: TaskSpec, spanRef: SpanRef | null): Promise<JsonValue> {
  const [span, fn] = await Promise.all([resolveTaskSpan(spanRef), loadTaskFunction(task)]);
  const result = await runInSpan(span, () => fn(...(task.args ?? [])));
  return toJsonValue(result);
}
