/**
 * Payload Schemas
 *
 * Validators for the structured values that cross process boundaries:
 * span references and span data objects.
 */

import { isJsonObjectValue, type JsonObject } from '../utils/json.js';
import type { SpanRef } from '../tracing/types.js';
import { validateNonEmptyString, validateObject, validateSpanIdString } from './validators.js';
import { ValidationError, type ValidationResult, validResult, invalidResult } from './errors.js';

/**
 * Validate that a value is a JSON object (plain objects, finite numbers)
 */
export function validateJsonObject(value: unknown, fieldName: string): ValidationResult<JsonObject> {
  const objResult = validateObject(value, fieldName);
  if (!objResult.valid) {
    return invalidResult(objResult.errors);
  }
  if (!isJsonObjectValue(value)) {
    return invalidResult([
      ValidationError.invalidValue(fieldName, value, 'must contain only JSON values'),
    ]);
  }
  return validResult(value);
}

/**
 * Validate a serialized span reference
 */
export function validateSpanRef(value: unknown, path: string = 'spanRef'): ValidationResult<SpanRef> {
  const objResult = validateObject(value, path);
  if (!objResult.valid) {
    return invalidResult(objResult.errors);
  }

  const obj = objResult.value;
  const errors: ValidationError[] = [];

  const kindResult = validateNonEmptyString(obj.kind, `${path}.kind`);
  if (!kindResult.valid) errors.push(...kindResult.errors);

  const idResult = validateSpanIdString(obj.id, `${path}.id`);
  if (!idResult.valid) errors.push(...idResult.errors);

  const locatorResult = validateJsonObject(obj.locator, `${path}.locator`);
  if (!locatorResult.valid) errors.push(...locatorResult.errors);

  if (!kindResult.valid || !idResult.valid || !locatorResult.valid) {
    return invalidResult(errors);
  }

  return validResult({ kind: kindResult.value, id: idResult.value, locator: locatorResult.value });
}
