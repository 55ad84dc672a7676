import type { JsonValue, Logger, VectorClockState } from '@driftsync/core';

/**
 * Kind of mutation a change describes
 */
export type DeltaOperation = 'create' | 'update' | 'delete' | 'move' | 'restore';

/**
 * Key segments from the root record to a field. Segments may contain dots.
 */
export type FieldPath = string[];

/** Byte-level operations, applied with a cursor over the source bytes */
export type BinaryPatchOperation =
  | { type: 'retain'; count: number }
  /** `bytes` is base64 */
  | { type: 'insert'; bytes: string }
  | { type: 'delete'; count: number }
  | { type: 'copy'; offset: number; length: number };

/** Field-level operations over nested records */
export type FieldPatchOperation =
  | { type: 'setField'; path: FieldPath; value: JsonValue }
  | { type: 'deleteField'; path: FieldPath }
  | { type: 'incrementField'; path: FieldPath; amount: number }
  | { type: 'appendArray'; path: FieldPath; values: JsonValue[] }
  | { type: 'removeArrayItems'; path: FieldPath; indices: number[] };

export type PatchOperation = BinaryPatchOperation | FieldPatchOperation;

/**
 * An ordered list of operations that turns data matching `sourceChecksum`
 * into data matching `targetChecksum`.
 */
export interface DeltaPatch {
  operations: PatchOperation[];
  sourceChecksum: string;
  targetChecksum: string;
  /** `1 - patchSize / targetSize`, clamped to [0, 1] */
  sizeReduction: number;
}

/**
 * One detected mutation of an entity
 */
export interface DeltaChange {
  id: string;
  entityId: string;
  entityType: string;
  operation: DeltaOperation;
  timestamp: number;
  /** Strictly increasing per entity within one change log */
  version: number;
  previousVersion?: number;
  /** Hash of the entity after the change, or before it for deletes */
  checksum: string;
  patch?: DeltaPatch;
  metadata: Record<string, string>;
  /** Present when the engine has a replica id */
  vectorClock?: VectorClockState;
}

/**
 * Anything with a stable identity that can be diffed
 */
export interface SyncEntity {
  id: string | number;
}

export interface DeltaSyncConfig {
  /** Largest serialized patch, in bytes, that a change may carry */
  maxDeltaSize?: number;
  /** Smallest `sizeReduction` for which a patch is worth sending */
  minChangeThreshold?: number;
  /** Search for matching chunks in non-record data */
  enableBinaryDiff?: boolean;
  /** Window size for the binary chunk search */
  chunkSize?: number;
  /** Change log capacity; the oldest entries are evicted first */
  maxHistoryCount?: number;
  /** When set, every detected change carries a vector clock */
  replicaId?: string;
  logger?: Logger;
  now?: () => number;
}

export interface DeltaSyncDefaults {
  maxDeltaSize: number;
  minChangeThreshold: number;
  enableBinaryDiff: boolean;
  chunkSize: number;
  maxHistoryCount: number;
}

export const DEFAULT_DELTA_SYNC_CONFIG: Readonly<DeltaSyncDefaults> = Object.freeze({
  maxDeltaSize: 1_048_576,
  minChangeThreshold: 0.1,
  enableBinaryDiff: true,
  chunkSize: 4096,
  maxHistoryCount: 100,
});
