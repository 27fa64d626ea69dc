/**
 * HashMap<K, V>: A map backed by hash bucketing using Eq<K> + Hash<K>.
 *
 * API mirrors native Map<K, V>. Keys iterate in the order they were first
 * set, so groupBy and countBy report groups by first occurrence.
 */

import type { Eq, Hash } from "./typeclasses.js";

interface Entry<K, V> {
  readonly key: K;
  value: V;
  removed: boolean;
}

export class HashMap<K, V> {
  private readonly _eq: Eq<K>;
  private readonly _hash: Hash<K>;
  private readonly _buckets = new Map<number, Entry<K, V>[]>();
  private _order: Entry<K, V>[] = [];
  private _size = 0;

  constructor(eq: Eq<K>, hash: Hash<K>) {
    this._eq = eq;
    this._hash = hash;
  }

  get size(): number {
    return this._size;
  }

  private _findEntry(k: K): Entry<K, V> | undefined {
    const bucket = this._buckets.get(this._hash.hash(k));
    if (!bucket) return undefined;
    for (let i = 0; i < bucket.length; i++) {
      if (this._eq.equals(k, bucket[i].key)) return bucket[i];
    }
    return undefined;
  }

  get(k: K): V | undefined {
    return this._findEntry(k)?.value;
  }

  has(k: K): boolean {
    return this._findEntry(k) !== undefined;
  }

  set(k: K, v: V): this {
    const h = this._hash.hash(k);
    let bucket = this._buckets.get(h);
    if (!bucket) {
      bucket = [];
      this._buckets.set(h, bucket);
    } else {
      for (let i = 0; i < bucket.length; i++) {
        if (this._eq.equals(k, bucket[i].key)) {
          bucket[i].value = v;
          return this;
        }
      }
    }
    const entry: Entry<K, V> = { key: k, value: v, removed: false };
    bucket.push(entry);
    this._order.push(entry);
    this._size++;
    return this;
  }

  /**
   * Return the value stored under `k`, storing `create()` first when absent.
   */
  getOrInsert(k: K, create: () => V): V {
    const entry = this._findEntry(k);
    if (entry) return entry.value;
    const value = create();
    this.set(k, value);
    return value;
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
          this._order = this._order.filter((entry) => !entry.removed);
        }
        return true;
      }
    }
    return false;
  }

  clear(): void {
    for (const entry of this._order) entry.removed = true;
    this._buckets.clear();
    this._order = [];
    this._size = 0;
  }

  *entries(): IterableIterator<[K, V]> {
    const order = this._order;
    for (let i = 0; i < order.length; i++) {
      if (!order[i].removed) yield [order[i].key, order[i].value];
    }
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) yield key;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) yield value;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  forEach(fn: (value: V, key: K) => void): void {
    for (const [k, v] of this) fn(v, k);
  }

  getOrElse(k: K, fallback: V): V {
    const entry = this._findEntry(k);
    return entry ? entry.value : fallback;
  }
}
