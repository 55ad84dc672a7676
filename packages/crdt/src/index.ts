/**
 * Conflict-free replicated data types for driftsync.
 *
 * @module @driftsync/crdt
 */

export type {
  CRDTSnapshot,
  CRDTValue,
  GCounterSnapshot,
  GSetSnapshot,
  LWWMapEntrySnapshot,
  LWWMapSnapshot,
  LWWRegisterSnapshot,
  Now,
  ORSetSnapshot,
  PNCounterSnapshot,
  ReplicaId,
  TaggedElement,
} from './types.js';

export { compareWrites, type LwwWrite } from './lww.js';
export { LWWRegister, createLWWRegister } from './register.js';
export { GCounter, PNCounter, createGCounter, createPNCounter } from './counter.js';
export { GSet, ORSet, createGSet, createORSet } from './set.js';
export { LWWMap, createLWWMap, type LWWMapEntry } from './map.js';
