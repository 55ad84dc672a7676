/**
 * Chunked binary diff for data that is not a nested record.
 *
 * The target is cut into `chunkSize` windows. Each window is looked up in
 * the source, first at or after the cursor (emitting `delete` + `retain`)
 * and then anywhere before it (emitting `copy`); windows with no match are
 * inserted literally.
 *
 * @module delta/binary-diff
 */

import { DriftError, decodeBase64, encodeBase64 } from '@driftsync/core';
import type { BinaryPatchOperation } from './types.js';

function indexOf(haystack: Uint8Array, needle: Uint8Array, from: number): number {
  return Buffer.from(haystack.buffer, haystack.byteOffset, haystack.byteLength).indexOf(needle, from);
}

function concat(parts: Uint8Array[]): Uint8Array {
  return new Uint8Array(Buffer.concat(parts));
}

/**
 * Generate binary operations turning `source` into `target`.
 */
export function generateBinaryPatch(
  source: Uint8Array,
  target: Uint8Array,
  chunkSize: number
): BinaryPatchOperation[] {
  const operations: BinaryPatchOperation[] = [];
  let pendingInsert: Uint8Array[] = [];
  let cursor = 0;

  const flushInsert = () => {
    if (pendingInsert.length === 0) return;
    operations.push({ type: 'insert', bytes: encodeBase64(concat(pendingInsert)) });
    pendingInsert = [];
  };

  for (let start = 0; start < target.length; start += chunkSize) {
    const chunk = target.subarray(start, Math.min(start + chunkSize, target.length));

    const ahead = indexOf(source, chunk, cursor);
    if (ahead !== -1) {
      flushInsert();
      if (ahead > cursor) operations.push({ type: 'delete', count: ahead - cursor });
      operations.push({ type: 'retain', count: chunk.length });
      cursor = ahead + chunk.length;
      continue;
    }

    const behind = indexOf(source.subarray(0, cursor), chunk, 0);
    if (behind !== -1) {
      flushInsert();
      operations.push({ type: 'copy', offset: behind, length: chunk.length });
      cursor = behind + chunk.length;
      continue;
    }

    pendingInsert.push(chunk);
  }

  flushInsert();
  return operations;
}

/**
 * A single insert of the whole target, used when binary diffing is off.
 */
export function literalBinaryPatch(target: Uint8Array): BinaryPatchOperation[] {
  return target.length === 0 ? [] : [{ type: 'insert', bytes: encodeBase64(target) }];
}

function outOfRange(operation: BinaryPatchOperation, size: number): DriftError {
  return new DriftError({
    code: 'DRIFT_V404',
    message: `Binary ${operation.type} reaches past the end of ${size} source bytes`,
    context: { operation },
  });
}

/**
 * Apply binary operations to source bytes.
 *
 * - `retain(n)` copies the next n source bytes
 * - `delete(n)` skips the next n source bytes
 * - `copy(offset, length)` copies from anywhere and moves the cursor after it
 * - `insert(bytes)` appends literal bytes
 *
 * Source bytes after the last operation are dropped.
 */
export function applyBinaryPatch(
  source: Uint8Array,
  operations: readonly BinaryPatchOperation[]
): Uint8Array {
  const output: Uint8Array[] = [];
  let cursor = 0;

  for (const operation of operations) {
    switch (operation.type) {
      case 'retain':
        if (cursor + operation.count > source.length) throw outOfRange(operation, source.length);
        output.push(source.subarray(cursor, cursor + operation.count));
        cursor += operation.count;
        break;
      case 'delete':
        if (cursor + operation.count > source.length) throw outOfRange(operation, source.length);
        cursor += operation.count;
        break;
      case 'copy':
        if (operation.offset + operation.length > source.length) {
          throw outOfRange(operation, source.length);
        }
        output.push(source.subarray(operation.offset, operation.offset + operation.length));
        cursor = operation.offset + operation.length;
        break;
      case 'insert':
        output.push(decodeBase64(operation.bytes));
        break;
    }
  }

  return concat(output);
}
