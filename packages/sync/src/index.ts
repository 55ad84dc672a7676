/**
 * @driftsync/sync - delta patching and multi-device synchronization.
 *
 * Two layers:
 *
 * - `DeltaSyncEngine` turns entity edits into versioned, checksummed
 *   changes with compact patches, and applies patches with causality and
 *   integrity checks.
 * - `MultiDeviceSyncManager` keeps a registry of peer devices, exchanges
 *   vector-clocked messages over a pluggable transport and settles
 *   concurrent edits.
 *
 * ```typescript
 * import { createDeltaSyncEngine, createMultiDeviceSyncManager } from '@driftsync/sync';
 *
 * const engine = createDeltaSyncEngine({ replicaId: manager.deviceId });
 * engine.track(before, after, 'note');
 * await manager.sendDelta(engine.pendingChanges());
 * ```
 *
 * @packageDocumentation
 */

export * from './delta/index.js';
export * from './device/index.js';
