/**
 * Span Server Wire Protocol
 *
 * JSON over HTTP. Span ids travel as their 22-character base64url form;
 * span data travels as JSON text in `data_json`.
 */

import { isJsonObjectValue } from '../../../shared/utils/json.js';
import {
  ValidationError,
  invalidResult,
  validResult,
  validateObject,
  validateOptional,
  validateSpanIdString,
  validateString,
  type ValidationResult,
} from '../../../shared/validation/index.js';

export const READINESS_PATH = '/api/status/ready';
export const SPAN_PATH_PREFIX = '/api/span/';
export const ROOT_IDS_PATH = '/api/tracing/root';
export const CHILDREN_SUFFIX = '/children';

export function spanPath(id: string): string {
  return `${SPAN_PATH_PREFIX}${id}`;
}

export function childrenPath(id: string): string {
  return `${SPAN_PATH_PREFIX}${id}${CHILDREN_SUFFIX}`;
}

/**
 * Body of `PUT /api/span/{id}` and response of `GET /api/span/{id}`
 */
export interface SpanPayload {
  name: string;
  data_json: string;
  parent_id: string | null;
}

/**
 * Body of `PATCH /api/span/{id}`
 */
export interface SpanDataPayload {
  data_json: string;
}

export interface ErrorPayload {
  error: string;
}

export type SpanRoute =
  | { kind: 'ready' }
  | { kind: 'roots' }
  | { kind: 'span'; id: string }
  | { kind: 'children'; id: string };

/**
 * Match a request path to a route; undefined when nothing matches
 *
 * The id segment is returned as-is; validating it is the handler's job.
 */
export function matchRoute(pathname: string): SpanRoute | undefined {
  if (pathname === READINESS_PATH) return { kind: 'ready' };
  if (pathname === ROOT_IDS_PATH) return { kind: 'roots' };
  if (!pathname.startsWith(SPAN_PATH_PREFIX)) return undefined;

  const rest = pathname.slice(SPAN_PATH_PREFIX.length);
  if (rest.endsWith(CHILDREN_SUFFIX)) {
    const id = rest.slice(0, -CHILDREN_SUFFIX.length);
    return id.length > 0 && !id.includes('/') ? { kind: 'children', id } : undefined;
  }
  return rest.length > 0 && !rest.includes('/') ? { kind: 'span', id: rest } : undefined;
}

function validateDataJson(value: unknown, fieldName: string): ValidationResult<string> {
  const textResult = validateString(value, fieldName);
  if (!textResult.valid) return textResult;

  let parsed: unknown;
  try {
    parsed = JSON.parse(textResult.value);
  } catch {
    return invalidResult([ValidationError.invalidValue(fieldName, value, 'must be JSON text')]);
  }
  if (!isJsonObjectValue(parsed)) {
    return invalidResult([ValidationError.invalidValue(fieldName, value, 'must encode a JSON object')]);
  }
  return textResult;
}

export function validateSpanPayload(value: unknown): ValidationResult<SpanPayload> {
  const objResult = validateObject(value, 'body');
  if (!objResult.valid) return invalidResult(objResult.errors);
  const obj = objResult.value;

  const nameResult = validateString(obj.name, 'name');
  const dataResult = validateDataJson(obj.data_json, 'data_json');
  const parentResult = validateOptional(obj.parent_id, (v) => validateSpanIdString(v, 'parent_id'));

  if (!nameResult.valid || !dataResult.valid || !parentResult.valid) {
    return invalidResult([...nameResult.errors, ...dataResult.errors, ...parentResult.errors]);
  }
  return validResult({
    name: nameResult.value,
    data_json: dataResult.value,
    parent_id: parentResult.value ?? null,
  });
}

export function validateSpanDataPayload(value: unknown): ValidationResult<SpanDataPayload> {
  const objResult = validateObject(value, 'body');
  if (!objResult.valid) return invalidResult(objResult.errors);

  const dataResult = validateDataJson(objResult.value.data_json, 'data_json');
  if (!dataResult.valid) return invalidResult(dataResult.errors);
  return validResult({ data_json: dataResult.value });
}

export function validateIdList(value: unknown): ValidationResult<string[]> {
  if (!Array.isArray(value)) {
    return invalidResult([ValidationError.invalidType('ids', 'array', typeof value)]);
  }
  const ids: string[] = [];
  const errors: ValidationError[] = [];
  value.forEach((item: unknown, index) => {
    const result = validateSpanIdString(item, `ids[${index}]`);
    if (result.valid) ids.push(result.value);
    else errors.push(...result.errors);
  });
  return errors.length > 0 ? invalidResult(errors) : validResult(ids);
}
