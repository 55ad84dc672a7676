/**
 * Plain JSON value types.
 *
 * Everything the engine diffs, hashes or ships across replicas is reduced to
 * one of these first, so paths in patches always address a {@link JsonObject}.
 */

export type JsonPrimitive = string | number | boolean | null;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonArray = JsonValue[];

export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/** Check whether a JSON value is a record (not an array or primitive) */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Structural equality over JSON values.
 *
 * Key order is irrelevant; array order is significant.
 */
export function jsonEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== typeof b) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    return a.every((item, index) => {
      const other = b[index];
      return other !== undefined && jsonEqual(item, other);
    });
  }

  if (typeof a === 'object' && typeof b === 'object') {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((key) => {
      const left = a[key];
      const right = b[key];
      return left !== undefined && right !== undefined && jsonEqual(left, right);
    });
  }

  return false;
}

/** Deep-clone a JSON value */
export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}
