import { DriftError } from '../errors/drift-error.js';

/**
 * Serialized vector clock state: replica id to counter
 */
export type VectorClockState = Record<string, number>;

/**
 * Causal relation between two clocks
 */
export type ClockOrdering = 'before' | 'after' | 'concurrent' | 'equal';

/**
 * Vector clock for partial ordering of events across replicas.
 *
 * Instances are immutable: {@link increment} and {@link merge} return new
 * clocks, and a missing replica counts as 0 in every comparison.
 *
 * @example
 * ```typescript
 * const a = VectorClock.empty().increment('A');
 * const b = VectorClock.empty().increment('B');
 *
 * a.isConcurrent(b); // true
 * a.merge(b).happenedAfter(a); // true
 * ```
 */
export class VectorClock {
  private readonly counters: ReadonlyMap<string, number>;

  private constructor(counters: ReadonlyMap<string, number>) {
    this.counters = counters;
  }

  /**
   * Create a clock with no events
   */
  static empty(): VectorClock {
    return new VectorClock(new Map());
  }

  /**
   * Restore a clock from serialized state.
   *
   * @throws DriftError DRIFT_V400 when a counter is not a non-negative safe integer
   */
  static from(state: VectorClockState): VectorClock {
    const counters = new Map<string, number>();
    for (const [replica, counter] of Object.entries(state)) {
      if (!Number.isSafeInteger(counter) || counter < 0) {
        throw new DriftError({
          code: 'DRIFT_V400',
          message: `Invalid vector clock counter for replica "${replica}": ${String(counter)}`,
          context: { replica, counter },
        });
      }
      if (counter > 0) counters.set(replica, counter);
    }
    return new VectorClock(counters);
  }

  /**
   * Record a local event on a replica
   */
  increment(replica: string): VectorClock {
    const next = new Map(this.counters);
    next.set(replica, this.timestamp(replica) + 1);
    return new VectorClock(next);
  }

  /**
   * Counter for a replica, 0 when unknown
   */
  timestamp(replica: string): number {
    return this.counters.get(replica) ?? 0;
  }

  /**
   * Pointwise maximum over the union of replicas
   */
  merge(other: VectorClock): VectorClock {
    const next = new Map(this.counters);
    for (const [replica, counter] of other.counters) {
      next.set(replica, Math.max(next.get(replica) ?? 0, counter));
    }
    return new VectorClock(next);
  }

  /**
   * Compare two clocks under the causal partial order
   */
  compare(other: VectorClock): ClockOrdering {
    let less = false;
    let greater = false;

    for (const replica of new Set([...this.counters.keys(), ...other.counters.keys()])) {
      const mine = this.timestamp(replica);
      const theirs = other.timestamp(replica);
      if (mine < theirs) less = true;
      if (mine > theirs) greater = true;
    }

    if (less && greater) return 'concurrent';
    if (less) return 'before';
    if (greater) return 'after';
    return 'equal';
  }

  happenedBefore(other: VectorClock): boolean {
    return this.compare(other) === 'before';
  }

  happenedAfter(other: VectorClock): boolean {
    return this.compare(other) === 'after';
  }

  /**
   * Neither clock happened before the other and they differ
   */
  isConcurrent(other: VectorClock): boolean {
    return this.compare(other) === 'concurrent';
  }

  equals(other: VectorClock): boolean {
    return this.compare(other) === 'equal';
  }

  /**
   * Replica ids with a non-zero counter, sorted
   */
  replicas(): string[] {
    return [...this.counters.keys()].sort();
  }

  toJSON(): VectorClockState {
    const state: VectorClockState = {};
    for (const replica of this.replicas()) {
      state[replica] = this.timestamp(replica);
    }
    return state;
  }

  toString(): string {
    return this.replicas()
      .map((replica) => `${replica}:${this.timestamp(replica)}`)
      .join(',');
  }
}
