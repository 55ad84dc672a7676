/**
 * Field-level diff and patch over nested JSON records.
 *
 * Records are diffed key by key and recursed into. Arrays are diffed as
 * multisets: unmatched old items are removed by index and unmatched new
 * items are appended. When that cannot reproduce the target (reordering,
 * or an item moving between equal neighbours), the whole array is set.
 *
 * @module delta/json-diff
 */

import {
  DriftError,
  cloneJson,
  isJsonObject,
  jsonEqual,
  type JsonObject,
  type JsonValue,
} from '@driftsync/core';
import type { FieldPatchOperation, FieldPath } from './types.js';

/**
 * Diff two records into field operations, keys visited in sorted order.
 */
export function diffRecords(
  oldRecord: JsonObject,
  newRecord: JsonObject,
  path: FieldPath = []
): FieldPatchOperation[] {
  const operations: FieldPatchOperation[] = [];
  const keys = [...new Set([...Object.keys(oldRecord), ...Object.keys(newRecord)])].sort();

  for (const key of keys) {
    const fieldPath = [...path, key];
    const oldValue = oldRecord[key];
    const newValue = newRecord[key];

    if (newValue === undefined) {
      operations.push({ type: 'deleteField', path: fieldPath });
    } else if (oldValue === undefined) {
      operations.push({ type: 'setField', path: fieldPath, value: newValue });
    } else if (isJsonObject(oldValue) && isJsonObject(newValue)) {
      operations.push(...diffRecords(oldValue, newValue, fieldPath));
    } else if (Array.isArray(oldValue) && Array.isArray(newValue)) {
      operations.push(...diffArrays(oldValue, newValue, fieldPath));
    } else if (
      typeof oldValue === 'number' &&
      typeof newValue === 'number' &&
      Number.isSafeInteger(oldValue) &&
      Number.isSafeInteger(newValue) &&
      Number.isSafeInteger(newValue - oldValue)
    ) {
      if (newValue !== oldValue) {
        operations.push({ type: 'incrementField', path: fieldPath, amount: newValue - oldValue });
      }
    } else if (!jsonEqual(oldValue, newValue)) {
      operations.push({ type: 'setField', path: fieldPath, value: newValue });
    }
  }

  return operations;
}

/**
 * Diff two arrays by membership, falling back to a whole-array set.
 */
export function diffArrays(
  oldItems: JsonValue[],
  newItems: JsonValue[],
  path: FieldPath
): FieldPatchOperation[] {
  const matched = new Array<boolean>(newItems.length).fill(false);
  const indices: number[] = [];

  oldItems.forEach((item, index) => {
    const match = newItems.findIndex((candidate, i) => !matched[i] && jsonEqual(candidate, item));
    if (match === -1) {
      indices.push(index);
    } else {
      matched[match] = true;
    }
  });

  const values = newItems.filter((_, i) => !matched[i]);
  const operations: FieldPatchOperation[] = [];
  if (indices.length > 0) operations.push({ type: 'removeArrayItems', path, indices });
  if (values.length > 0) operations.push({ type: 'appendArray', path, values });

  const simulated = [...removeIndices(oldItems, indices), ...values];
  if (jsonEqual(simulated, newItems)) {
    return operations;
  }
  return [{ type: 'setField', path, value: newItems }];
}

function removeIndices(items: JsonValue[], indices: number[]): JsonValue[] {
  const drop = new Set(indices);
  return items.filter((_, index) => !drop.has(index));
}

function cannotApply(reason: string, path: FieldPath): DriftError {
  return new DriftError({
    code: 'DRIFT_V404',
    message: `Cannot apply patch at ${path.join('.')}: ${reason}`,
    context: { path },
  });
}

/**
 * Walk to the record holding the last path segment.
 */
function parentOf(root: JsonObject, path: FieldPath): { parent: JsonObject; key: string } {
  const key = path[path.length - 1];
  if (key === undefined) {
    throw cannotApply('empty path', path);
  }

  let parent: JsonObject = root;
  for (const segment of path.slice(0, -1)) {
    const next = parent[segment];
    if (!isJsonObject(next)) {
      throw cannotApply(`"${segment}" is not a record`, path);
    }
    parent = next;
  }
  return { parent, key };
}

function arrayAt(root: JsonObject, path: FieldPath): JsonValue[] {
  const { parent, key } = parentOf(root, path);
  const value = parent[key];
  if (!Array.isArray(value)) {
    throw cannotApply('field is not an array', path);
  }
  return value;
}

/**
 * Apply field operations to a copy of a record, in order.
 *
 * @throws DriftError DRIFT_V404 when an operation does not fit the data
 */
export function applyFieldOperations(
  record: JsonObject,
  operations: readonly FieldPatchOperation[]
): JsonObject {
  const root = cloneJson(record);

  for (const operation of operations) {
    switch (operation.type) {
      case 'setField': {
        const { parent, key } = parentOf(root, operation.path);
        parent[key] = cloneJson(operation.value);
        break;
      }
      case 'deleteField': {
        const { parent, key } = parentOf(root, operation.path);
        delete parent[key];
        break;
      }
      case 'incrementField': {
        const { parent, key } = parentOf(root, operation.path);
        const current = parent[key];
        if (typeof current !== 'number') {
          throw cannotApply('field is not a number', operation.path);
        }
        parent[key] = current + operation.amount;
        break;
      }
      case 'appendArray': {
        arrayAt(root, operation.path).push(...operation.values.map((value) => cloneJson(value)));
        break;
      }
      case 'removeArrayItems': {
        const items = arrayAt(root, operation.path);
        const indices = [...new Set(operation.indices)].sort((a, b) => b - a);
        for (const index of indices) {
          if (index >= items.length) {
            throw cannotApply(`index ${index} is out of range`, operation.path);
          }
          items.splice(index, 1);
        }
        break;
      }
    }
  }

  return root;
}
