import { VectorClock } from '@driftsync/core';
import { byKey, compareWrites, encodeKey, sameSnapshot, type LwwWrite } from './lww.js';
import type {
  CRDTValue,
  LWWMapEntrySnapshot,
  LWWMapSnapshot,
  Now,
  ReplicaId,
} from './types.js';

/**
 * One key's latest write, possibly a tombstone
 */
export interface LWWMapEntry<K, V> {
  readonly key: K;
  readonly value: V;
  readonly writerId: ReplicaId;
  readonly wallClockTime: number;
  readonly clock: VectorClock;
  readonly isDeleted: boolean;
}

function asWrite<K, V>(entry: LWWMapEntry<K, V>): LwwWrite {
  return {
    clock: entry.clock,
    wallClockTime: entry.wallClockTime,
    writerId: entry.writerId,
    payload: encodeKey({ value: entry.value, isDeleted: entry.isDeleted }),
  };
}

/**
 * Last-Writer-Wins Map (LWW-Map).
 *
 * Each key behaves like an LWW-Register. Removal writes a tombstone that
 * competes with concurrent sets under the same rule, so a delete is never
 * silently undone by merging an older copy.
 *
 * Keys may be any JSON value; they are matched by canonical encoding.
 *
 * @example
 * ```typescript
 * let prefs = createLWWMap<string, string>('replica-a');
 * prefs = prefs.set('theme', 'dark').set('lang', 'en').remove('lang');
 *
 * prefs.get('theme'); // 'dark'
 * prefs.has('lang');  // false
 * ```
 */
export class LWWMap<K, V> implements CRDTValue<LWWMap<K, V>, Map<K, V>> {
  private constructor(
    readonly replicaId: ReplicaId,
    private readonly entryMap: ReadonlyMap<string, LWWMapEntry<K, V>>,
    readonly timestamp: VectorClock
  ) {}

  static create<K, V>(replicaId: ReplicaId): LWWMap<K, V> {
    return new LWWMap<K, V>(replicaId, new Map(), VectorClock.empty());
  }

  static fromJSON<K, V>(snapshot: LWWMapSnapshot<K, V>, replicaId: ReplicaId): LWWMap<K, V> {
    const entries = new Map<string, LWWMapEntry<K, V>>();
    for (const entry of snapshot.entries) {
      entries.set(encodeKey(entry.key), { ...entry, clock: VectorClock.from(entry.clock) });
    }
    return new LWWMap(replicaId, entries, VectorClock.from(snapshot.clock));
  }

  set(key: K, value: V, now: Now = Date.now): LWWMap<K, V> {
    return this.write(key, value, false, now);
  }

  /**
   * Tombstone a key. Unknown or already removed keys are left alone.
   */
  remove(key: K, now: Now = Date.now): LWWMap<K, V> {
    const existing = this.entryMap.get(encodeKey(key));
    if (!existing || existing.isDeleted) return this;
    return this.write(key, existing.value, true, now);
  }

  get(key: K): V | undefined {
    const entry = this.entryMap.get(encodeKey(key));
    return entry && !entry.isDeleted ? entry.value : undefined;
  }

  has(key: K): boolean {
    const entry = this.entryMap.get(encodeKey(key));
    return entry !== undefined && !entry.isDeleted;
  }

  keys(): K[] {
    return this.live().map((entry) => entry.key);
  }

  values(): V[] {
    return this.live().map((entry) => entry.value);
  }

  /** Raw entries including tombstones, in key encoding order */
  entries(): LWWMapEntry<K, V>[] {
    return [...this.entryMap.keys()].sort(byKey).flatMap((encoded) => {
      const entry = this.entryMap.get(encoded);
      return entry ? [entry] : [];
    });
  }

  get size(): number {
    return this.live().length;
  }

  /** Live key/value pairs; tombstones are filtered out */
  get state(): Map<K, V> {
    return new Map(this.live().map((entry) => [entry.key, entry.value]));
  }

  merge(other: LWWMap<K, V>): LWWMap<K, V> {
    const merged = new Map(this.entryMap);
    for (const [encoded, theirs] of other.entryMap) {
      const mine = merged.get(encoded);
      if (!mine || compareWrites(asWrite(theirs), asWrite(mine)) > 0) {
        merged.set(encoded, theirs);
      }
    }
    return new LWWMap(this.replicaId, merged, this.timestamp.merge(other.timestamp));
  }

  equals(other: LWWMap<K, V>): boolean {
    return sameSnapshot(this.toJSON(), other.toJSON());
  }

  toJSON(): LWWMapSnapshot<K, V> {
    const entries: LWWMapEntrySnapshot<K, V>[] = this.entries().map((entry) => ({
      key: entry.key,
      value: entry.value,
      writerId: entry.writerId,
      wallClockTime: entry.wallClockTime,
      clock: entry.clock.toJSON(),
      isDeleted: entry.isDeleted,
    }));
    return { type: 'lww-map', entries, clock: this.timestamp.toJSON() };
  }

  private live(): LWWMapEntry<K, V>[] {
    return this.entries().filter((entry) => !entry.isDeleted);
  }

  private write(key: K, value: V, isDeleted: boolean, now: Now): LWWMap<K, V> {
    const clock = this.timestamp.increment(this.replicaId);
    const entries = new Map(this.entryMap);
    entries.set(encodeKey(key), {
      key,
      value,
      writerId: this.replicaId,
      wallClockTime: now(),
      clock,
      isDeleted,
    });
    return new LWWMap(this.replicaId, entries, clock);
  }
}

export function createLWWMap<K, V>(replicaId: ReplicaId): LWWMap<K, V> {
  return LWWMap.create<K, V>(replicaId);
}
