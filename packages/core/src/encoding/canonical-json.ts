import { DriftError } from '../errors/drift-error.js';
import type { JsonObject, JsonValue } from '../types/json.js';

interface HasToJSON {
  toJSON(): unknown;
}

function hasToJSON(value: object): value is HasToJSON {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function isPlainRecord(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function invalid(reason: string, path: string[]): DriftError {
  return new DriftError({
    code: 'DRIFT_V400',
    message: `Cannot encode value at ${path.length > 0 ? path.join('.') : '<root>'}: ${reason}`,
    context: { path },
  });
}

function normalize(value: unknown, path: string[], seen: Set<object>): JsonValue {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (!Number.isFinite(value)) {
        throw invalid(`non-finite number ${String(value)}`, path);
      }
      // -0 encodes as 0 in JSON
      return value === 0 ? 0 : value;
    case 'object':
      break;
    default:
      throw invalid(`unsupported type ${typeof value}`, path);
  }

  if (seen.has(value)) {
    throw invalid('circular reference', path);
  }

  if (Array.isArray(value)) {
    seen.add(value);
    const result = value.map((item, index) => {
      if (item === undefined) {
        throw invalid('undefined array element', [...path, String(index)]);
      }
      return normalize(item, [...path, String(index)], seen);
    });
    seen.delete(value);
    return result;
  }

  if (hasToJSON(value)) {
    return normalize(value.toJSON(), path, seen);
  }

  if (!isPlainRecord(value)) {
    throw invalid(`unsupported object ${value.constructor.name}`, path);
  }

  seen.add(value);
  const result: JsonObject = {};
  for (const key of Object.keys(value).sort()) {
    const field: unknown = Reflect.get(value, key);
    if (field === undefined) continue;
    result[key] = normalize(field, [...path, key], seen);
  }
  seen.delete(value);
  return result;
}

/**
 * Reduce any encodable value to a plain JSON value with sorted keys.
 *
 * - `undefined` record fields are dropped
 * - objects exposing `toJSON()` (vector clocks, CRDTs) are encoded through it
 * - non-finite numbers, functions, symbols, bigints, cycles and class
 *   instances without `toJSON()` are rejected with `DRIFT_V400`
 */
export function toJsonValue(value: unknown): JsonValue {
  return normalize(value, [], new Set());
}

/**
 * Deterministic JSON serialization.
 *
 * Two logically equal values always produce the same string, which is what
 * makes checksum comparison a valid equality test.
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(toJsonValue(value));
}

/**
 * Parse JSON text into a {@link JsonValue}.
 */
export function parseJson(text: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DriftError({
      code: 'DRIFT_V400',
      message: 'Malformed JSON',
      cause: error instanceof Error ? error : undefined,
    });
  }
  return toJsonValue(parsed);
}
