import {
  bytesToUtf8,
  deltaChangeSchema,
  encodeCanonical,
  parseJson,
  parseWire,
} from '@driftsync/core';
import type { DeltaChange } from './types.js';

const deltaChangeListSchema = deltaChangeSchema.array();

/**
 * Encode changes as canonical JSON bytes
 */
export function encodeChanges(changes: readonly DeltaChange[]): Uint8Array {
  return encodeCanonical(changes);
}

/**
 * Decode and validate changes.
 *
 * @throws DriftError DRIFT_V400 for malformed JSON or an invalid change
 */
export function decodeChanges(bytes: Uint8Array): DeltaChange[] {
  return parseWire(deltaChangeListSchema, parseJson(bytesToUtf8(bytes)), 'delta changes');
}
