/**
 * Task functions run in worker threads and child processes by the tests
 */

import { getCurrentSpan, newSpanId, spanIdToString, withTrace } from '../../src/shared/tracing/index.js';

/**
 * Display id of the span current in the worker, or null when untraced
 */
export function currentSpanId(): string | null {
  const span = getCurrentSpan();
  return span ? spanIdToString(span.id) : null;
}

/**
 * Create a child of the current span and record the worker's pid in it
 */
export async function recordChild(name: string): Promise<string | null> {
  return withTrace(name, async (span) => {
    if (!span) return null;
    await span.updateData({ pid: process.pid });
    return spanIdToString(span.id);
  });
}

/**
 * Write `count` keys into the current span's data, one update each
 */
export async function writeKeys(prefix: string, count: number): Promise<number> {
  const span = getCurrentSpan();
  if (!span) return 0;
  for (let n = 0; n < count; n++) {
    await span.updateData({ [`${prefix}_${n}`]: n });
  }
  return count;
}

/**
 * Display forms of `count` ids generated in the worker
 */
export function newSpanIds(count: number): string[] {
  return Array.from({ length: count }, () => spanIdToString(newSpanId()));
}

export function add(a: number, b: number): number {
  return a + b;
}

export async function failWith(message: string): Promise<never> {
  throw new TypeError(message);
}

export async function exitWorker(code: number): Promise<void> {
  process.exit(code);
}

export const notAFunction = 42;

export default function double(value: number): number {
  return value * 2;
}
