import type { VectorClock, VectorClockState } from '@driftsync/core';

/**
 * Unique identifier for a replica (a device, or one offline copy on a device).
 */
export type ReplicaId = string;

/**
 * Common contract of every mergeable value.
 *
 * `merge` is total, commutative, associative and idempotent: any two states
 * of the same type can be merged, in any order and any number of times, and
 * every replica converges on the same result. Values are immutable; every
 * operation returns a new instance owned by the same replica.
 *
 * @typeParam TSelf - The concrete CRDT type
 * @typeParam TState - The plain value the CRDT represents
 */
export interface CRDTValue<TSelf, TState> {
  /** Replica that owns this copy and stamps its local operations */
  readonly replicaId: ReplicaId;

  /** Causal history of the operations folded into this value */
  readonly timestamp: VectorClock;

  /** Plain value reconstructed from the internal representation */
  readonly state: TState;

  merge(other: TSelf): TSelf;

  /** Compare replicated state; the owning replica id is ignored */
  equals(other: TSelf): boolean;

  toJSON(): CRDTSnapshot;
}

export interface LWWRegisterSnapshot<T> {
  type: 'lww-register';
  value: T;
  writerId: ReplicaId;
  wallClockTime: number;
  clock: VectorClockState;
}

export interface GCounterSnapshot {
  type: 'g-counter';
  counts: Record<ReplicaId, number>;
  clock: VectorClockState;
}

export interface PNCounterSnapshot {
  type: 'pn-counter';
  positive: GCounterSnapshot;
  negative: GCounterSnapshot;
  clock: VectorClockState;
}

export interface GSetSnapshot<T> {
  type: 'g-set';
  elements: T[];
  clock: VectorClockState;
}

/**
 * One add of an element to an OR-Set. The tag is unique per add, so two
 * adds of the same element are distinct tagged instances.
 */
export interface TaggedElement<T> {
  element: T;
  tag: string;
  replicaId: ReplicaId;
}

export interface ORSetSnapshot<T> {
  type: 'or-set';
  added: TaggedElement<T>[];
  removed: TaggedElement<T>[];
  clock: VectorClockState;
}

export interface LWWMapEntrySnapshot<K, V> {
  key: K;
  value: V;
  writerId: ReplicaId;
  wallClockTime: number;
  clock: VectorClockState;
  isDeleted: boolean;
}

export interface LWWMapSnapshot<K, V> {
  type: 'lww-map';
  entries: LWWMapEntrySnapshot<K, V>[];
  clock: VectorClockState;
}

/**
 * Serialized state of any CRDT value
 */
export type CRDTSnapshot =
  | LWWRegisterSnapshot<unknown>
  | GCounterSnapshot
  | PNCounterSnapshot
  | GSetSnapshot<unknown>
  | ORSetSnapshot<unknown>
  | LWWMapSnapshot<unknown, unknown>;

/**
 * Wall clock source, injectable for deterministic tests
 */
export type Now = () => number;
