/**
 * DeltaSyncEngine - change detection, patching and the per-entity change log.
 *
 * @example
 * ```typescript
 * const engine = createDeltaSyncEngine({ replicaId: 'laptop' });
 *
 * const change = engine.track(before, after, 'note');
 * if (change?.patch) {
 *   const updated = remoteEngine.applyPatch(change.patch, remoteCopy);
 * }
 * ```
 */

import {
  CausalityError,
  DriftError,
  IntegrityError,
  VectorClock,
  bytesToUtf8,
  canonicalStringify,
  decodeBase64,
  generateId,
  isJsonObject,
  noopLogger,
  parseJson,
  sha256Hex,
  toJsonValue,
  utf8ToBytes,
  type JsonValue,
  type Logger,
} from '@driftsync/core';
import { applyBinaryPatch, generateBinaryPatch, literalBinaryPatch } from './binary-diff.js';
import { applyFieldOperations, diffRecords } from './json-diff.js';
import {
  DEFAULT_DELTA_SYNC_CONFIG,
  type BinaryPatchOperation,
  type DeltaChange,
  type DeltaOperation,
  type DeltaPatch,
  type DeltaSyncConfig,
  type DeltaSyncDefaults,
  type FieldPatchOperation,
  type PatchOperation,
  type SyncEntity,
} from './types.js';

type ResolvedDeltaSyncConfig = DeltaSyncDefaults & { replicaId?: string };

/** Flat size charged for operations that carry no payload */
const OPERATION_OVERHEAD = 8;

function isBinaryOperation(operation: PatchOperation): operation is BinaryPatchOperation {
  return (
    operation.type === 'retain' ||
    operation.type === 'insert' ||
    operation.type === 'delete' ||
    operation.type === 'copy'
  );
}

function isFieldOperation(operation: PatchOperation): operation is FieldPatchOperation {
  return !isBinaryOperation(operation);
}

function byteLength(value: JsonValue): number {
  return utf8ToBytes(JSON.stringify(value)).length;
}

function estimatePatchSize(operations: readonly PatchOperation[]): number {
  return operations.reduce((size, operation) => {
    switch (operation.type) {
      case 'insert':
        return size + decodeBase64(operation.bytes).length;
      case 'setField':
        return size + byteLength(operation.value);
      case 'appendArray':
        return size + operation.values.reduce<number>((sum, value) => sum + byteLength(value), 0);
      default:
        return size + OPERATION_OVERHEAD;
    }
  }, 0);
}

function validateConfig(config: ResolvedDeltaSyncConfig): void {
  const positive: ('maxDeltaSize' | 'chunkSize' | 'maxHistoryCount')[] = [
    'maxDeltaSize',
    'chunkSize',
    'maxHistoryCount',
  ];
  for (const key of positive) {
    const value = config[key];
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new DriftError({
        code: 'DRIFT_V401',
        message: `${key} must be a positive integer, got ${String(value)}`,
        context: { [key]: value },
      });
    }
  }
  if (!(config.minChangeThreshold >= 0 && config.minChangeThreshold <= 1)) {
    throw new DriftError({
      code: 'DRIFT_V401',
      message: `minChangeThreshold must be between 0 and 1, got ${String(config.minChangeThreshold)}`,
    });
  }
}

export class DeltaSyncEngine {
  private readonly config: ResolvedDeltaSyncConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly versionTracker = new Map<string, number>();
  private changeLog: DeltaChange[] = [];
  private clock = VectorClock.empty();

  constructor(config: DeltaSyncConfig = {}) {
    this.config = {
      maxDeltaSize: config.maxDeltaSize ?? DEFAULT_DELTA_SYNC_CONFIG.maxDeltaSize,
      minChangeThreshold: config.minChangeThreshold ?? DEFAULT_DELTA_SYNC_CONFIG.minChangeThreshold,
      enableBinaryDiff: config.enableBinaryDiff ?? DEFAULT_DELTA_SYNC_CONFIG.enableBinaryDiff,
      chunkSize: config.chunkSize ?? DEFAULT_DELTA_SYNC_CONFIG.chunkSize,
      maxHistoryCount: config.maxHistoryCount ?? DEFAULT_DELTA_SYNC_CONFIG.maxHistoryCount,
      replicaId: config.replicaId,
    };
    validateConfig(this.config);
    this.logger = (config.logger ?? noopLogger).child('DeltaSyncEngine');
    this.now = config.now ?? Date.now;
  }

  /**
   * Causal clock stamped on detected changes, when a replica id is set
   */
  get vectorClock(): VectorClock | undefined {
    return this.config.replicaId === undefined ? undefined : this.clock;
  }

  /**
   * Describe the difference between two snapshots of one entity.
   *
   * Returns `undefined` when both are absent or their content is identical.
   * A returned change has already reserved its version, even if it is
   * never recorded.
   *
   * @throws DriftError DRIFT_V401 when the two snapshots have different ids
   */
  detectChanges<T extends SyncEntity>(
    oldEntity: T | undefined,
    newEntity: T | undefined,
    entityType: string
  ): DeltaChange | undefined {
    if (newEntity === undefined) {
      if (oldEntity === undefined) return undefined;
      return this.issue(String(oldEntity.id), entityType, 'delete', this.checksum(oldEntity));
    }

    const entityId = String(newEntity.id);
    const newChecksum = this.checksum(newEntity);

    if (oldEntity === undefined) {
      return this.issue(entityId, entityType, 'create', newChecksum);
    }

    if (String(oldEntity.id) !== entityId) {
      throw new DriftError({
        code: 'DRIFT_V401',
        message: `Cannot diff entity "${String(oldEntity.id)}" against "${entityId}"`,
        context: { oldId: oldEntity.id, newId: newEntity.id },
      });
    }

    if (this.checksum(oldEntity) === newChecksum) {
      return undefined;
    }

    const patch = this.generatePatch(oldEntity, newEntity);
    const patchBytes = utf8ToBytes(canonicalStringify(patch)).length;

    if (patchBytes <= this.config.maxDeltaSize && patch.sizeReduction >= this.config.minChangeThreshold) {
      return this.issue(entityId, entityType, 'update', newChecksum, patch);
    }

    this.logger.debug('Patch not worth sending, falling back to full snapshot', {
      entityId,
      patchBytes,
      sizeReduction: patch.sizeReduction,
    });
    return this.issue(entityId, entityType, 'update', newChecksum, undefined, { fullSnapshot: 'true' });
  }

  /**
   * Diff two collections keyed by id.
   *
   * Creates and updates come first in `newEntities` order, then deletes in
   * `oldEntities` order; the result is stable-sorted by timestamp.
   *
   * @throws DriftError DRIFT_V402 when an id appears twice in one list
   */
  detectBatchChanges<T extends SyncEntity>(
    oldEntities: readonly T[],
    newEntities: readonly T[],
    entityType: string
  ): DeltaChange[] {
    const oldById = this.indexById(oldEntities, 'old');
    const newById = this.indexById(newEntities, 'new');
    const changes: DeltaChange[] = [];

    for (const [id, entity] of newById) {
      const change = this.detectChanges(oldById.get(id), entity, entityType);
      if (change) changes.push(change);
    }

    for (const [id, entity] of oldById) {
      if (newById.has(id)) continue;
      const change = this.detectChanges<T>(entity, undefined, entityType);
      if (change) changes.push(change);
    }

    return changes.sort((a, b) => a.timestamp - b.timestamp);
  }

  /**
   * Generate a patch from one value to another.
   *
   * Records get field operations; anything else gets binary operations over
   * the canonical encoding.
   *
   * @throws DriftError DRIFT_V403 when either side cannot be encoded
   */
  generatePatch(from: unknown, to: unknown): DeltaPatch {
    let source: JsonValue;
    let target: JsonValue;
    try {
      source = toJsonValue(from);
      target = toJsonValue(to);
    } catch (error) {
      throw new DriftError({
        code: 'DRIFT_V403',
        message: error instanceof Error ? error.message : String(error),
        cause: error instanceof Error ? error : undefined,
      });
    }

    const sourceText = JSON.stringify(source);
    const targetText = JSON.stringify(target);
    const targetBytes = utf8ToBytes(targetText);

    let operations: PatchOperation[];
    if (isJsonObject(source) && isJsonObject(target)) {
      operations = diffRecords(source, target);
    } else if (this.config.enableBinaryDiff) {
      operations = generateBinaryPatch(utf8ToBytes(sourceText), targetBytes, this.config.chunkSize);
    } else {
      operations = literalBinaryPatch(targetBytes);
    }

    const sizeReduction = 1 - estimatePatchSize(operations) / targetBytes.length;

    return {
      operations,
      sourceChecksum: this.checksumOfText(sourceText),
      targetChecksum: this.checksumOfText(targetText),
      sizeReduction: Math.min(1, Math.max(0, sizeReduction)),
    };
  }

  /**
   * Apply a patch to data.
   *
   * @throws CausalityError DRIFT_C200 when `data` is not the patch source;
   *   the entity changed faster than it could sync and needs a full resync
   * @throws IntegrityError DRIFT_I101 when the result is not the patch target;
   *   the patch or data is corrupted and must be replaced
   * @throws DriftError DRIFT_V404 when an operation does not fit the data
   */
  applyPatch<T>(patch: DeltaPatch, data: T): T {
    const source = toJsonValue(data);
    const sourceText = JSON.stringify(source);
    const actualSource = this.checksumOfText(sourceText);

    if (actualSource !== patch.sourceChecksum) {
      this.logger.warn('Patch source checksum mismatch', {
        expected: patch.sourceChecksum,
        actual: actualSource,
      });
      throw new CausalityError('DRIFT_C200', {
        expected: patch.sourceChecksum,
        actual: actualSource,
      });
    }

    const result = this.applyOperations(source, sourceText, patch.operations);
    const actualTarget = this.checksum(result);

    if (actualTarget !== patch.targetChecksum) {
      this.logger.warn('Patch target checksum mismatch', {
        expected: patch.targetChecksum,
        actual: actualTarget,
      });
      throw new IntegrityError('DRIFT_I101', {
        expected: patch.targetChecksum,
        actual: actualTarget,
      });
    }

    // The target checksum matched, so result is the exact encoding of a T
    return result as T;
  }

  /**
   * Append a change to the log and raise the entity's version
   */
  recordChange(change: DeltaChange): void {
    this.changeLog.push(change);
    const current = this.versionTracker.get(change.entityId) ?? 0;
    this.versionTracker.set(change.entityId, Math.max(current, change.version));

    const overflow = this.changeLog.length - this.config.maxHistoryCount;
    if (overflow > 0) {
      const evicted = this.changeLog.splice(0, overflow);
      this.logger.debug('Evicted changes from log', {
        count: evicted.length,
        ids: evicted.map((c) => c.id),
      });
    }
  }

  /**
   * Detect and record in one step
   */
  track<T extends SyncEntity>(
    oldEntity: T | undefined,
    newEntity: T | undefined,
    entityType: string
  ): DeltaChange | undefined {
    const change = this.detectChanges(oldEntity, newEntity, entityType);
    if (change) this.recordChange(change);
    return change;
  }

  changesSince(version: number, entityType?: string): DeltaChange[] {
    return this.changeLog.filter(
      (change) =>
        change.version > version && (entityType === undefined || change.entityType === entityType)
    );
  }

  pendingChanges(): DeltaChange[] {
    return [...this.changeLog];
  }

  /**
   * Drop acknowledged changes up to and including a version
   */
  clearSyncedChanges(uptoVersion: number): void {
    this.changeLog = this.changeLog.filter((change) => change.version > uptoVersion);
  }

  /** Last version issued for an entity, 0 when none */
  currentVersion(entityId: string): number {
    return this.versionTracker.get(entityId) ?? 0;
  }

  /**
   * Content hash of a value's canonical encoding
   */
  checksum(value: unknown): string {
    return this.checksumOfText(canonicalStringify(value));
  }

  private checksumOfText(text: string): string {
    return sha256Hex(utf8ToBytes(text));
  }

  private applyOperations(
    source: JsonValue,
    sourceText: string,
    operations: readonly PatchOperation[]
  ): JsonValue {
    if (operations.length === 0) return source;

    const binary = operations.filter(isBinaryOperation);
    const fields = operations.filter(isFieldOperation);

    if (binary.length > 0 && fields.length > 0) {
      throw new DriftError({
        code: 'DRIFT_V404',
        message: 'Patch mixes binary and field operations',
      });
    }

    if (fields.length > 0) {
      if (!isJsonObject(source)) {
        throw new DriftError({
          code: 'DRIFT_V404',
          message: 'Field operations need a record to apply to',
        });
      }
      return applyFieldOperations(source, fields);
    }

    const bytes = applyBinaryPatch(utf8ToBytes(sourceText), binary);
    try {
      return parseJson(bytesToUtf8(bytes));
    } catch (error) {
      throw new IntegrityError(
        'DRIFT_I101',
        { reason: error instanceof Error ? error.message : String(error) },
        'Binary patch produced malformed data'
      );
    }
  }

  private issue(
    entityId: string,
    entityType: string,
    operation: DeltaOperation,
    checksum: string,
    patch?: DeltaPatch,
    metadata: Record<string, string> = {}
  ): DeltaChange {
    const previousVersion = this.versionTracker.get(entityId);
    const version = (previousVersion ?? 0) + 1;
    this.versionTracker.set(entityId, version);

    const change: DeltaChange = {
      id: generateId(),
      entityId,
      entityType,
      operation,
      timestamp: this.now(),
      version,
      previousVersion,
      checksum,
      patch,
      metadata,
    };

    if (this.config.replicaId !== undefined) {
      this.clock = this.clock.increment(this.config.replicaId);
      change.vectorClock = this.clock.toJSON();
    }

    this.logger.debug('Detected change', { entityId, entityType, operation, version });
    return change;
  }

  private indexById<T extends SyncEntity>(entities: readonly T[], side: string): Map<string, T> {
    const byId = new Map<string, T>();
    for (const entity of entities) {
      const id = String(entity.id);
      if (byId.has(id)) {
        throw new DriftError({
          code: 'DRIFT_V402',
          message: `Entity "${id}" appears more than once in the ${side} snapshot`,
          context: { entityId: id },
        });
      }
      byId.set(id, entity);
    }
    return byId;
  }
}

export function createDeltaSyncEngine(config?: DeltaSyncConfig): DeltaSyncEngine {
  return new DeltaSyncEngine(config);
}
