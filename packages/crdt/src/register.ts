import { VectorClock } from '@driftsync/core';
import { compareWrites, encodeKey, sameSnapshot, type LwwWrite } from './lww.js';
import type { CRDTValue, LWWRegisterSnapshot, Now, ReplicaId } from './types.js';

/**
 * Last-Writer-Wins Register (LWW-Register).
 *
 * Holds a single value. On merge, the write whose clock causally dominates
 * wins; concurrent writes fall back to wall-clock time, then writer id.
 *
 * @example
 * ```typescript
 * let title = createLWWRegister('replica-a', 'Draft');
 * title = title.update('Final');
 *
 * const merged = title.merge(remoteTitle);
 * console.log(merged.value);
 * ```
 *
 * @see {@link compareWrites} for the exact tiebreak
 */
export class LWWRegister<T> implements CRDTValue<LWWRegister<T>, T> {
  private constructor(
    readonly replicaId: ReplicaId,
    readonly value: T,
    readonly writerId: ReplicaId,
    readonly wallClockTime: number,
    readonly timestamp: VectorClock
  ) {}

  /**
   * Create a register holding an initial write by `replicaId`.
   */
  static create<T>(replicaId: ReplicaId, value: T, now: Now = Date.now): LWWRegister<T> {
    return new LWWRegister(replicaId, value, replicaId, now(), VectorClock.empty().increment(replicaId));
  }

  /**
   * Restore a register for a replica from a snapshot
   */
  static fromJSON<T>(snapshot: LWWRegisterSnapshot<T>, replicaId: ReplicaId): LWWRegister<T> {
    return new LWWRegister(
      replicaId,
      snapshot.value,
      snapshot.writerId,
      snapshot.wallClockTime,
      VectorClock.from(snapshot.clock)
    );
  }

  get state(): T {
    return this.value;
  }

  /**
   * Write a new value as a local event
   */
  update(value: T, now: Now = Date.now): LWWRegister<T> {
    return new LWWRegister(
      this.replicaId,
      value,
      this.replicaId,
      now(),
      this.timestamp.increment(this.replicaId)
    );
  }

  /**
   * Keep the winning write and the union of both causal histories.
   */
  merge(other: LWWRegister<T>): LWWRegister<T> {
    const winner = compareWrites(this.asWrite(), other.asWrite()) >= 0 ? this : other;
    return new LWWRegister(
      this.replicaId,
      winner.value,
      winner.writerId,
      winner.wallClockTime,
      this.timestamp.merge(other.timestamp)
    );
  }

  equals(other: LWWRegister<T>): boolean {
    return sameSnapshot(this.toJSON(), other.toJSON());
  }

  toJSON(): LWWRegisterSnapshot<T> {
    return {
      type: 'lww-register',
      value: this.value,
      writerId: this.writerId,
      wallClockTime: this.wallClockTime,
      clock: this.timestamp.toJSON(),
    };
  }

  private asWrite(): LwwWrite {
    return {
      clock: this.timestamp,
      wallClockTime: this.wallClockTime,
      writerId: this.writerId,
      payload: encodeKey(this.value),
    };
  }
}

/**
 * Create an LWW-Register
 */
export function createLWWRegister<T>(replicaId: ReplicaId, value: T, now?: Now): LWWRegister<T> {
  return LWWRegister.create(replicaId, value, now);
}
