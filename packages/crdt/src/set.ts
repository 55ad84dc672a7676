import { VectorClock, generateId } from '@driftsync/core';
import { byKey, encodeKey, sameSnapshot } from './lww.js';
import type {
  CRDTValue,
  GSetSnapshot,
  ORSetSnapshot,
  ReplicaId,
  TaggedElement,
} from './types.js';

/**
 * G-Set (Grow-only Set).
 *
 * Merge is union, so an element once added is present forever. Elements
 * are identified by their canonical JSON encoding, which makes two
 * structurally equal records the same element.
 */
export class GSet<T> implements CRDTValue<GSet<T>, T[]> {
  private constructor(
    readonly replicaId: ReplicaId,
    private readonly elements: ReadonlyMap<string, T>,
    readonly timestamp: VectorClock
  ) {}

  static create<T>(replicaId: ReplicaId): GSet<T> {
    return new GSet<T>(replicaId, new Map(), VectorClock.empty());
  }

  static fromJSON<T>(snapshot: GSetSnapshot<T>, replicaId: ReplicaId): GSet<T> {
    const elements = new Map<string, T>();
    for (const element of snapshot.elements) {
      elements.set(encodeKey(element), element);
    }
    return new GSet(replicaId, elements, VectorClock.from(snapshot.clock));
  }

  add(element: T): GSet<T> {
    const elements = new Map(this.elements);
    elements.set(encodeKey(element), element);
    return new GSet(this.replicaId, elements, this.timestamp.increment(this.replicaId));
  }

  has(element: T): boolean {
    return this.elements.has(encodeKey(element));
  }

  /** Elements in canonical encoding order */
  values(): T[] {
    return [...this.elements.keys()].sort(byKey).flatMap((key) => {
      const element = this.elements.get(key);
      return element === undefined ? [] : [element];
    });
  }

  get size(): number {
    return this.elements.size;
  }

  get state(): T[] {
    return this.values();
  }

  merge(other: GSet<T>): GSet<T> {
    const elements = new Map(this.elements);
    for (const [key, element] of other.elements) {
      elements.set(key, element);
    }
    return new GSet(this.replicaId, elements, this.timestamp.merge(other.timestamp));
  }

  equals(other: GSet<T>): boolean {
    return sameSnapshot(this.toJSON(), other.toJSON());
  }

  toJSON(): GSetSnapshot<T> {
    return { type: 'g-set', elements: this.values(), clock: this.timestamp.toJSON() };
  }
}

function sortedByTag<T>(tagged: ReadonlyMap<string, TaggedElement<T>>): TaggedElement<T>[] {
  return [...tagged.keys()].sort(byKey).flatMap((tag) => {
    const entry = tagged.get(tag);
    return entry ? [entry] : [];
  });
}

/**
 * OR-Set (Observed-Remove Set).
 *
 * Every add creates a uniquely tagged instance; a remove tombstones only the
 * instances the removing replica has observed. An add that is concurrent
 * with a remove therefore survives the merge.
 *
 * @example
 * ```typescript
 * const base = createORSet<string>('replica-a').add('milk');
 * const removed = base.remove('milk');
 * const readded = ORSet.fromJSON(base.toJSON(), 'replica-b').add('milk');
 *
 * removed.merge(readded).has('milk'); // true
 * ```
 */
export class ORSet<T> implements CRDTValue<ORSet<T>, T[]> {
  private constructor(
    readonly replicaId: ReplicaId,
    private readonly addedByTag: ReadonlyMap<string, TaggedElement<T>>,
    private readonly removedByTag: ReadonlyMap<string, TaggedElement<T>>,
    readonly timestamp: VectorClock
  ) {}

  static create<T>(replicaId: ReplicaId): ORSet<T> {
    return new ORSet<T>(replicaId, new Map(), new Map(), VectorClock.empty());
  }

  static fromJSON<T>(snapshot: ORSetSnapshot<T>, replicaId: ReplicaId): ORSet<T> {
    return new ORSet(
      replicaId,
      new Map(snapshot.added.map((entry) => [entry.tag, entry])),
      new Map(snapshot.removed.map((entry) => [entry.tag, entry])),
      VectorClock.from(snapshot.clock)
    );
  }

  /** Every tagged add ever observed, in tag order */
  get added(): TaggedElement<T>[] {
    return sortedByTag(this.addedByTag);
  }

  /** Every tombstoned tagged add, in tag order */
  get removed(): TaggedElement<T>[] {
    return sortedByTag(this.removedByTag);
  }

  add(element: T): ORSet<T> {
    const tagged: TaggedElement<T> = { element, tag: generateId(), replicaId: this.replicaId };
    const added = new Map(this.addedByTag);
    added.set(tagged.tag, tagged);
    return new ORSet(this.replicaId, added, this.removedByTag, this.timestamp.increment(this.replicaId));
  }

  /**
   * Tombstone every visible instance of the element.
   *
   * Removing an element that is not present is a no-op.
   */
  remove(element: T): ORSet<T> {
    const key = encodeKey(element);
    const visible = this.visible().filter((entry) => encodeKey(entry.element) === key);
    if (visible.length === 0) return this;

    const removed = new Map(this.removedByTag);
    for (const entry of visible) {
      removed.set(entry.tag, entry);
    }
    return new ORSet(this.replicaId, this.addedByTag, removed, this.timestamp.increment(this.replicaId));
  }

  has(element: T): boolean {
    const key = encodeKey(element);
    return this.visible().some((entry) => encodeKey(entry.element) === key);
  }

  /** Distinct visible elements in canonical encoding order */
  values(): T[] {
    const distinct = new Map<string, T>();
    for (const entry of this.visible()) {
      distinct.set(encodeKey(entry.element), entry.element);
    }
    return [...distinct.keys()].sort(byKey).flatMap((key) => {
      const element = distinct.get(key);
      return element === undefined ? [] : [element];
    });
  }

  get size(): number {
    return this.values().length;
  }

  get state(): T[] {
    return this.values();
  }

  merge(other: ORSet<T>): ORSet<T> {
    return new ORSet(
      this.replicaId,
      new Map([...this.addedByTag, ...other.addedByTag]),
      new Map([...this.removedByTag, ...other.removedByTag]),
      this.timestamp.merge(other.timestamp)
    );
  }

  equals(other: ORSet<T>): boolean {
    return sameSnapshot(this.toJSON(), other.toJSON());
  }

  toJSON(): ORSetSnapshot<T> {
    return {
      type: 'or-set',
      added: this.added,
      removed: this.removed,
      clock: this.timestamp.toJSON(),
    };
  }

  private visible(): TaggedElement<T>[] {
    return [...this.addedByTag.values()].filter((entry) => !this.removedByTag.has(entry.tag));
  }
}

export function createGSet<T>(replicaId: ReplicaId): GSet<T> {
  return GSet.create<T>(replicaId);
}

export function createORSet<T>(replicaId: ReplicaId): ORSet<T> {
  return ORSet.create<T>(replicaId);
}
