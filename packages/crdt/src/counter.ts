import { DriftError, VectorClock } from '@driftsync/core';
import { byKey, sameSnapshot } from './lww.js';
import type { CRDTValue, GCounterSnapshot, PNCounterSnapshot, ReplicaId } from './types.js';

function assertAmount(amount: number, operation: string): void {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new DriftError({
      code: 'DRIFT_V401',
      message: `${operation} amount must be a non-negative integer, got ${String(amount)}`,
      context: { amount },
    });
  }
}

/**
 * Grow-only Counter (G-Counter) for distributed counting.
 *
 * Each replica only ever raises its own slot, and the value is the sum of
 * all slots. Merging takes the maximum of each slot, so concurrent
 * increments on different replicas are never lost.
 *
 * @example
 * ```typescript
 * const a = createGCounter('replica-a').increment(10);
 * const b = createGCounter('replica-b').increment(5);
 *
 * a.merge(b).value; // 15
 * ```
 *
 * @see {@link PNCounter} - Counter that supports decrement
 */
export class GCounter implements CRDTValue<GCounter, number> {
  private constructor(
    readonly replicaId: ReplicaId,
    private readonly counts: ReadonlyMap<ReplicaId, number>,
    readonly timestamp: VectorClock
  ) {}

  static create(replicaId: ReplicaId): GCounter {
    return new GCounter(replicaId, new Map(), VectorClock.empty());
  }

  static fromJSON(snapshot: GCounterSnapshot, replicaId: ReplicaId): GCounter {
    const counts = new Map<ReplicaId, number>();
    for (const [replica, count] of Object.entries(snapshot.counts)) {
      assertAmount(count, 'Stored count');
      if (count > 0) counts.set(replica, count);
    }
    return new GCounter(replicaId, counts, VectorClock.from(snapshot.clock));
  }

  /** Sum of every replica's count */
  get value(): number {
    let total = 0;
    for (const count of this.counts.values()) total += count;
    return total;
  }

  get state(): number {
    return this.value;
  }

  /** This replica's contribution to the count */
  get localCount(): number {
    return this.countFor(this.replicaId);
  }

  countFor(replicaId: ReplicaId): number {
    return this.counts.get(replicaId) ?? 0;
  }

  /**
   * Add to this replica's slot.
   *
   * @throws DriftError DRIFT_V401 for negative or fractional amounts
   */
  increment(amount = 1): GCounter {
    assertAmount(amount, 'Increment');
    const counts = new Map(this.counts);
    const next = this.localCount + amount;
    if (next > 0) counts.set(this.replicaId, next);
    return new GCounter(this.replicaId, counts, this.timestamp.increment(this.replicaId));
  }

  merge(other: GCounter): GCounter {
    const counts = new Map(this.counts);
    for (const [replica, count] of other.counts) {
      counts.set(replica, Math.max(counts.get(replica) ?? 0, count));
    }
    return new GCounter(this.replicaId, counts, this.timestamp.merge(other.timestamp));
  }

  equals(other: GCounter): boolean {
    return sameSnapshot(this.toJSON(), other.toJSON());
  }

  toJSON(): GCounterSnapshot {
    const counts: Record<ReplicaId, number> = {};
    for (const replica of [...this.counts.keys()].sort(byKey)) {
      counts[replica] = this.countFor(replica);
    }
    return { type: 'g-counter', counts, clock: this.timestamp.toJSON() };
  }
}

/**
 * Positive-Negative Counter (PN-Counter).
 *
 * A pair of G-Counters: increments raise the positive half, decrements
 * raise the negative half, and the value is their difference.
 *
 * @example
 * ```typescript
 * const a = createPNCounter('replica-a').increment(5);
 * const b = createPNCounter('replica-b').decrement(2);
 *
 * a.merge(b).value; // 3
 * ```
 */
export class PNCounter implements CRDTValue<PNCounter, number> {
  private constructor(
    readonly replicaId: ReplicaId,
    readonly positive: GCounter,
    readonly negative: GCounter,
    readonly timestamp: VectorClock
  ) {}

  static create(replicaId: ReplicaId): PNCounter {
    return new PNCounter(
      replicaId,
      GCounter.create(replicaId),
      GCounter.create(replicaId),
      VectorClock.empty()
    );
  }

  static fromJSON(snapshot: PNCounterSnapshot, replicaId: ReplicaId): PNCounter {
    return new PNCounter(
      replicaId,
      GCounter.fromJSON(snapshot.positive, replicaId),
      GCounter.fromJSON(snapshot.negative, replicaId),
      VectorClock.from(snapshot.clock)
    );
  }

  get value(): number {
    return this.positive.value - this.negative.value;
  }

  get state(): number {
    return this.value;
  }

  // One clock for the counter as a whole; every operation is one event.
  increment(amount = 1): PNCounter {
    return new PNCounter(
      this.replicaId,
      this.positive.increment(amount),
      this.negative,
      this.timestamp.increment(this.replicaId)
    );
  }

  decrement(amount = 1): PNCounter {
    assertAmount(amount, 'Decrement');
    return new PNCounter(
      this.replicaId,
      this.positive,
      this.negative.increment(amount),
      this.timestamp.increment(this.replicaId)
    );
  }

  merge(other: PNCounter): PNCounter {
    return new PNCounter(
      this.replicaId,
      this.positive.merge(other.positive),
      this.negative.merge(other.negative),
      this.timestamp.merge(other.timestamp)
    );
  }

  equals(other: PNCounter): boolean {
    return sameSnapshot(this.toJSON(), other.toJSON());
  }

  toJSON(): PNCounterSnapshot {
    return {
      type: 'pn-counter',
      positive: this.positive.toJSON(),
      negative: this.negative.toJSON(),
      clock: this.timestamp.toJSON(),
    };
  }
}

export function createGCounter(replicaId: ReplicaId): GCounter {
  return GCounter.create(replicaId);
}

export function createPNCounter(replicaId: ReplicaId): PNCounter {
  return PNCounter.create(replicaId);
}
