/**
 * Input Validators
 *
 * Checks for values arriving from the wire, from span references, from CLI
 * options and from the environment. Each returns a ValidationResult; call
 * `unwrapResult` at the boundary to throw instead.
 */

import { ValidationError, type ValidationResult, validResult, invalidResult } from './errors.js';

/** Display form of a 16-byte span id: unpadded base64url */
const SPAN_ID_PATTERN = /^[A-Za-z0-9_-]{21}[AQgw]$/;

const DIGITS = /^\d+$/;

function describeType(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateString(value: unknown, fieldName: string): ValidationResult<string> {
  return typeof value === 'string'
    ? validResult(value)
    : invalidResult([ValidationError.invalidType(fieldName, 'string', describeType(value))]);
}

/**
 * Accepts a string with non-whitespace content and returns it trimmed
 */
export function validateNonEmptyString(value: unknown, fieldName: string): ValidationResult<string> {
  const result = validateString(value, fieldName);
  if (!result.valid) return result;

  const trimmed = result.value.trim();
  return trimmed.length > 0
    ? validResult(trimmed)
    : invalidResult([ValidationError.invalidValue(fieldName, value, 'cannot be empty')]);
}

export function validateSpanIdString(value: unknown, fieldName: string = 'id'): ValidationResult<string> {
  const result = validateString(value, fieldName);
  if (!result.valid) return result;

  return SPAN_ID_PATTERN.test(result.value)
    ? result
    : invalidResult([ValidationError.invalidValue(fieldName, value, 'must match 22-character base64url span id')]);
}

export function validateIntegerRange(
  value: unknown,
  fieldName: string,
  { min = -Infinity, max = Infinity }: { min?: number; max?: number }
): ValidationResult<number> {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    return invalidResult([ValidationError.invalidType(fieldName, 'integer', describeType(value))]);
  }
  if (value < min) {
    return invalidResult([ValidationError.invalidValue(fieldName, value, `must be at least ${min}`)]);
  }
  if (value > max) {
    return invalidResult([ValidationError.invalidValue(fieldName, value, `must be at most ${max}`)]);
  }
  return validResult(value);
}

export function validatePositiveInteger(value: unknown, fieldName: string): ValidationResult<number> {
  return validateIntegerRange(value, fieldName, { min: 1 });
}

/**
 * TCP port as a number or a string of digits; 0 asks for any free port
 */
export function validatePort(value: unknown, fieldName: string = 'port'): ValidationResult<number> {
  const numeric = typeof value === 'string' && DIGITS.test(value.trim()) ? Number(value.trim()) : value;
  return validateIntegerRange(numeric, fieldName, { min: 0, max: 65535 });
}

export function validateObject(value: unknown, fieldName: string): ValidationResult<Record<string, unknown>> {
  return isRecord(value)
    ? validResult(value)
    : invalidResult([ValidationError.invalidType(fieldName, 'object', describeType(value))]);
}

/**
 * Run `validator` unless the value is absent (undefined or null)
 */
export function validateOptional<T>(
  value: unknown,
  validator: (v: unknown) => ValidationResult<T>
): ValidationResult<T | undefined> {
  return value === undefined || value === null ? validResult(undefined) : validator(value);
}
