export { applyBinaryPatch, generateBinaryPatch } from './binary-diff.js';
export { decodeChanges, encodeChanges } from './codec.js';
export { DeltaSyncEngine, createDeltaSyncEngine } from './delta-sync-engine.js';
export { applyFieldOperations, diffArrays, diffRecords } from './json-diff.js';
export {
  DEFAULT_DELTA_SYNC_CONFIG,
  type BinaryPatchOperation,
  type DeltaChange,
  type DeltaOperation,
  type DeltaPatch,
  type DeltaSyncConfig,
  type DeltaSyncDefaults,
  type FieldPatchOperation,
  type FieldPath,
  type PatchOperation,
  type SyncEntity,
} from './types.js';
