/**
 * JSON Merge Patch (RFC 7396)
 *
 * A patch object is merged key by key into the target: `null` members
 * delete the key, object members merge recursively, any other member
 * replaces the target's value. A patch that is not an object replaces the
 * target as a whole.
 */

import { isJsonObject, type JsonObject, type JsonValue } from './json.js';

/**
 * Apply a merge patch to a target value
 *
 * @example
 * mergePatch({ a: 'b', c: { d: 'e', f: 'g' } }, { a: 'z', c: { f: null } });
 * // => { a: 'z', c: { d: 'e' } }
 */
export function mergePatch(target: JsonValue | undefined, patch: JsonValue): JsonValue {
  if (!isJsonObject(patch)) {
    return patch;
  }
  return mergeObjectPatch(isJsonObject(target) ? target : {}, patch);
}

/**
 * Apply an object patch to an object target
 *
 * Neither argument is modified.
 */
export function mergeObjectPatch(target: JsonObject, patch: JsonObject): JsonObject {
  const result: JsonObject = { ...target };
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete result[key];
    } else {
      result[key] = mergePatch(result[key], value);
    }
  }
  return result;
}
