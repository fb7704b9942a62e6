/**
 * JSON value types and best-effort encoding
 *
 * Span data is restricted to JSON-compatible values. `toJsonValue` turns
 * arbitrary runtime values (function arguments, return values, errors)
 * into such values without throwing.
 */

import { MAX_ENCODE_DEPTH } from '../config/limits.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Check for a JSON object (non-null, non-array)
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep check that an unknown value only contains JSON-compatible data
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      return false;
    }
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

/**
 * Deep check for a JSON object
 */
export function isJsonObjectValue(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
}

/**
 * Parse text that must hold a JSON object
 *
 * @throws SyntaxError when the text is not JSON or not an object
 */
export function parseJsonObject(text: string): JsonObject {
  const parsed: unknown = JSON.parse(text);
  if (!isJsonObjectValue(parsed)) {
    throw new SyntaxError('Expected a JSON object');
  }
  return parsed;
}

/**
 * Convert any value into a JSON value, best effort
 *
 * Non-finite numbers and bigints become strings, dates become ISO strings,
 * errors become `{ type, message }`, maps become objects, sets become
 * arrays, functions become `"[Function name]"`, cycles become
 * `"[Circular]"` and anything deeper than the depth limit `"[Truncated]"`.
 */
export function toJsonValue(value: unknown): JsonValue {
  return encode(value, new WeakSet<object>(), 0);
}

function encode(value: unknown, seen: WeakSet<object>, depth: number): JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : String(value);
    case 'bigint':
      return value.toString();
    case 'undefined':
      return null;
    case 'symbol':
      return value.toString();
    case 'function':
      return `[Function ${value.name || 'anonymous'}]`;
  }

  if (value === null || typeof value !== 'object') {
    return null;
  }
  if (depth >= MAX_ENCODE_DEPTH) {
    return '[Truncated]';
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);
  try {
    if (value instanceof Error) {
      return { type: value.name, message: value.message };
    }
    if (Array.isArray(value)) {
      return value.map((item) => encode(item, seen, depth + 1));
    }
    if (value instanceof Set) {
      return Array.from(value, (item) => encode(item, seen, depth + 1));
    }
    const result: JsonObject = {};
    const entries: Iterable<[unknown, unknown]> = value instanceof Map ? value.entries() : Object.entries(value);
    for (const [key, item] of entries) {
      result[String(key)] = encode(item, seen, depth + 1);
    }
    return result;
  } finally {
    seen.delete(value);
  }
}
