/**
 * Validation Error Classes
 */

import { TreetraceError } from '../errors/base.js';

/**
 * Base validation error
 */
export class ValidationError extends TreetraceError {
  readonly code = 'VALIDATION_ERROR';
  override readonly recoverable = false;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    cause?: Error
  ) {
    super(message, { cause });
  }

  static invalidType(field: string, expected: string, received: string): ValidationError {
    return new ValidationError(
      `Invalid type for '${field}': expected ${expected}, received ${received}`,
      field
    );
  }

  static invalidValue(field: string, value: unknown, reason: string): ValidationError {
    return new ValidationError(
      `Invalid value for '${field}': ${reason}`,
      field,
      value
    );
  }

  /**
   * Fold the errors of a failed result into one throwable error
   */
  static fromErrors(context: string, errors: ValidationError[]): ValidationError {
    if (errors.length === 1) {
      return errors[0];
    }
    return new ValidationError(
      `Invalid ${context}:\n${errors.map((e) => `  - ${e.message}`).join('\n')}`
    );
  }
}

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: ValidationError[] };

/**
 * Create a successful validation result
 */
export function validResult<T>(value: T): ValidationResult<T> {
  return { valid: true, value, errors: [] };
}

/**
 * Create a failed validation result
 */
export function invalidResult<T>(errors: ValidationError[]): ValidationResult<T> {
  return { valid: false, errors };
}

/**
 * Return the value of a result or throw its errors
 */
export function unwrapResult<T>(result: ValidationResult<T>, context: string): T {
  if (!result.valid) {
    throw ValidationError.fromErrors(context, result.errors);
  }
  return result.value;
}
