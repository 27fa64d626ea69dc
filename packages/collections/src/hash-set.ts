/**
 * HashSet<K>: A set backed by hash bucketing using Eq<K> + Hash<K>.
 *
 * API mirrors native Set<K>. Iteration follows insertion order, which is
 * the order distinct and union emit their output in.
 */

import type { Eq, Hash } from "./typeclasses.js";

interface Slot<K> {
  readonly key: K;
  removed: boolean;
}

export class HashSet<K> {
  private readonly _eq: Eq<K>;
  private readonly _hash: Hash<K>;
  private readonly _buckets = new Map<number, Slot<K>[]>();
  private _order: Slot<K>[] = [];
  private _size = 0;

  constructor(eq: Eq<K>, hash: Hash<K>) {
    this._eq = eq;
    this._hash = hash;
  }

  get size(): number {
    return this._size;
  }

  has(k: K): boolean {
    return this.find(k) !== undefined;
  }

  add(k: K): this {
    this.tryAdd(k);
    return this;
  }

  /**
   * Add `k` unless an equal key is already present.
   * @returns true when the key was added
   */
  tryAdd(k: K): boolean {
    const h = this._hash.hash(k);
    let bucket = this._buckets.get(h);
    if (!bucket) {
      bucket = [];
      this._buckets.set(h, bucket);
    } else {
      for (let i = 0; i < bucket.length; i++) {
        if (this._eq.equals(k, bucket[i].key)) return false;
      }
    }
    const slot: Slot<K> = { key: k, removed: false };
    bucket.push(slot);
    this._order.push(slot);
    this._size++;
    return true;
  }

  delete(k: K): boolean {
    const h = this._hash.hash(k);
    const bucket = this._buckets.get(h);
    if (!bucket) return false;
    for (let i = 0; i < bucket.length; i++) {
      if (this._eq.equals(k, bucket[i].key)) {
        bucket[i].removed = true;
        bucket.splice(i, 1);
        if (bucket.length === 0) this._buckets.delete(h);
        this._size--;
        if (this._order.length > 2 * this._size + 8) {
          this._order = this._order.filter((slot) => !slot.removed);
        }
        return true;
      }
    }
    return false;
  }

  clear(): void {
    for (const slot of this._order) slot.removed = true;
    this._buckets.clear();
    this._order = [];
    this._size = 0;
  }

  *[Symbol.iterator](): IterableIterator<K> {
    const order = this._order;
    for (let i = 0; i < order.length; i++) {
      if (!order[i].removed) yield order[i].key;
    }
  }

  values(): IterableIterator<K> {
    return this[Symbol.iterator]();
  }

  forEach(fn: (value: K) => void): void {
    for (const k of this) fn(k);
  }

  toArray(): K[] {
    const result: K[] = [];
    for (const k of this) result.push(k);
    return result;
  }

  private find(k: K): Slot<K> | undefined {
    const bucket = this._buckets.get(this._hash.hash(k));
    if (!bucket) return undefined;
    for (let i = 0; i < bucket.length; i++) {
      if (this._eq.equals(k, bucket[i].key)) return bucket[i];
    }
    return undefined;
  }
}
