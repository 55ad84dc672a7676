import { DriftError } from '@driftsync/core';
import type { DeviceConflict } from './types.js';

/**
 * The configured strategy cannot settle a conflict on its own.
 *
 * Not a failure: the conflict stays open until
 * `MultiDeviceSyncManager.submitResolution()` is called with a chosen value.
 */
export class ManualResolutionRequiredError<T = unknown> extends DriftError {
  readonly conflict: DeviceConflict<T>;

  constructor(conflict: DeviceConflict<T>, strategy: string) {
    super({
      code: 'DRIFT_R300',
      context: { conflictId: conflict.id, entityId: conflict.entityId, strategy },
    });
    this.name = 'ManualResolutionRequiredError';
    this.conflict = conflict;
  }
}
