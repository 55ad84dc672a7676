/**
 * Conflict detection and deterministic resolution.
 *
 * A conflict exists only when two clocks are concurrent. A remote edit that
 * causally follows the local one is an ordinary update.
 *
 * @module device/conflict
 */

import { DriftError, generateId, type VectorClock } from '@driftsync/core';
import { ManualResolutionRequiredError } from './errors.js';
import type { ConflictResolution, ConflictStrategy, DeviceConflict } from './types.js';

export interface ConflictCandidate<T> {
  entityId: string;
  entityType: string;
  localDeviceId: string;
  remoteDeviceId: string;
  localVectorClock: VectorClock;
  remoteVectorClock: VectorClock;
  localData: T;
  remoteData: T;
  timestamp: number;
}

/**
 * Build a conflict when the two edits are concurrent, otherwise `undefined`.
 */
export function findConflict<T>(candidate: ConflictCandidate<T>): DeviceConflict<T> | undefined {
  if (!candidate.localVectorClock.isConcurrent(candidate.remoteVectorClock)) {
    return undefined;
  }
  return { id: generateId(), ...candidate };
}

type Side = 'local' | 'remote';

/**
 * Pick the winning side for a write-wins strategy.
 *
 * Causal order decides first. Concurrent or equal clocks fall back to the
 * device ids, so both replicas pick the same side: the greater id for
 * last-write-wins, the smaller for first-write-wins.
 */
export function pickWinner<T>(
  conflict: DeviceConflict<T>,
  strategy: 'last-write-wins' | 'first-write-wins'
): Side {
  const order = conflict.localVectorClock.compare(conflict.remoteVectorClock);
  const later: Side | undefined = order === 'before' ? 'remote' : order === 'after' ? 'local' : undefined;

  if (later !== undefined) {
    if (strategy === 'last-write-wins') return later;
    return later === 'local' ? 'remote' : 'local';
  }

  const localIsGreater = conflict.localDeviceId > conflict.remoteDeviceId;
  if (strategy === 'last-write-wins') {
    return localIsGreater ? 'local' : 'remote';
  }
  return localIsGreater ? 'remote' : 'local';
}

/**
 * Settle a conflict under a strategy.
 *
 * @throws DriftError DRIFT_R301 when either side has no data
 * @throws ManualResolutionRequiredError for merge, ask-user and device-priority
 */
export function resolveConflict<T>(
  conflict: DeviceConflict<T>,
  strategy: ConflictStrategy
): ConflictResolution<T> {
  if (conflict.localData === undefined || conflict.remoteData === undefined) {
    throw new DriftError({
      code: 'DRIFT_R301',
      context: { conflictId: conflict.id, entityId: conflict.entityId },
    });
  }

  switch (strategy) {
    case 'last-write-wins':
    case 'first-write-wins': {
      const winner = pickWinner(conflict, strategy);
      return {
        conflictId: conflict.id,
        entityId: conflict.entityId,
        entityType: conflict.entityType,
        resolution: strategy,
        resolvedData: winner === 'local' ? conflict.localData : conflict.remoteData,
        resolvedVectorClock: conflict.localVectorClock.merge(conflict.remoteVectorClock),
      };
    }
    case 'merge':
    case 'ask-user':
    case 'device-priority':
      throw new ManualResolutionRequiredError(conflict, strategy);
  }
}
