import { canonicalStringify, type VectorClock } from '@driftsync/core';
import type { CRDTSnapshot, ReplicaId } from './types.js';

/**
 * A single last-writer-wins write, as seen by the tiebreak.
 */
export interface LwwWrite {
  readonly clock: VectorClock;
  readonly wallClockTime: number;
  readonly writerId: ReplicaId;
  /** Canonical encoding of what was written */
  readonly payload: string;
}

/**
 * Order two writes: positive when `a` wins, negative when `b` wins.
 *
 * Causal order decides first. Only when the clocks are concurrent (or
 * equal) does the wall clock decide, then the writer id, then the payload
 * encoding, so every replica picks the same winner.
 *
 * The wall-clock step is a non-causal last resort. With skewed device
 * clocks it can let an older concurrent write win, and merges of three or
 * more concurrent writes are only associative while wall clocks agree with
 * causal order. This is an accepted, bounded inconsistency.
 */
export function compareWrites(a: LwwWrite, b: LwwWrite): number {
  switch (a.clock.compare(b.clock)) {
    case 'after':
      return 1;
    case 'before':
      return -1;
    default:
      break;
  }

  if (a.wallClockTime !== b.wallClockTime) {
    return a.wallClockTime > b.wallClockTime ? 1 : -1;
  }
  if (a.writerId !== b.writerId) {
    return a.writerId > b.writerId ? 1 : -1;
  }
  if (a.payload !== b.payload) {
    return a.payload > b.payload ? 1 : -1;
  }
  return 0;
}

/** Identity of an element or key: its canonical encoding */
export function encodeKey(value: unknown): string {
  return canonicalStringify(value);
}

/** Deterministic comparison for sorting by encoded key */
export function byKey(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sameSnapshot(a: CRDTSnapshot, b: CRDTSnapshot): boolean {
  return canonicalStringify(a) === canonicalStringify(b);
}
