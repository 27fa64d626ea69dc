/**
 * Fluent wrapper over a fused Sequence.
 *
 * Chain operations compose stage factories onto the underlying sequence;
 * nothing runs until a terminal operation is called. Terminal operations
 * drive the source once in push mode, with adjacent map/filter stages
 * merged into single consumers.
 */

import { naturalCompare } from "@seqfuse/collections";
import { EmptySequenceError } from "@seqfuse/core";
import type { ConsList } from "./list.js";
import * as Seq from "./seq/index.js";
import type { Sequence } from "./sequence.js";
import { NO_VALUE, type NoValue } from "./signal.js";

/**
 * A lazy, fused sequence pipeline.
 *
 * @example
 * ```typescript
 * const result = new LazySeq(Seq.ofArray([1, 2, 3, 4, 5]))
 *   .filter(x => x % 2 === 0)
 *   .map(x => x * 10)
 *   .toArray(); // [20, 40]
 * ```
 */
export class LazySeq<T> implements Iterable<T> {
  constructor(readonly source: Sequence<T>) {}

  private chain<U>(next: Sequence<U>): LazySeq<U> {
    return new LazySeq(next);
  }

  /** Transform each element */
  map<U>(f: (value: T) => U): LazySeq<U> {
    return this.chain(Seq.map(f, this.source));
  }

  /** Transform each element together with its position */
  mapi<U>(f: (index: number, value: T) => U): LazySeq<U> {
    return this.chain(Seq.mapi(f, this.source));
  }

  /** Keep only elements that satisfy the predicate */
  filter(predicate: (value: T) => boolean): LazySeq<T> {
    return this.chain(Seq.filter(predicate, this.source));
  }

  /** Map and keep the results that are not undefined */
  choose<U>(chooser: (value: T) => U | undefined): LazySeq<U> {
    return this.chain(Seq.choose(chooser, this.source));
  }

  /** Map each element to an iterable and flatten */
  flatMap<U>(f: (value: T) => Iterable<U>): LazySeq<U> {
    return this.chain(Seq.collect(f, this.source));
  }

  /** Take the first `count` elements; fails if there are fewer */
  take(count: number): LazySeq<T> {
    return this.chain(Seq.take(count, this.source));
  }

  /** At most the first `count` elements */
  truncate(count: number): LazySeq<T> {
    return this.chain(Seq.truncate(count, this.source));
  }

  /** Skip the first `count` elements; fails if there are fewer */
  drop(count: number): LazySeq<T> {
    return this.chain(Seq.skip(count, this.source));
  }

  /** Take elements while predicate holds, stop at first failure */
  takeWhile(predicate: (value: T) => boolean): LazySeq<T> {
    return this.chain(Seq.takeWhile(predicate, this.source));
  }

  /** Skip elements while predicate holds, emit once it fails */
  dropWhile(predicate: (value: T) => boolean): LazySeq<T> {
    return this.chain(Seq.skipWhile(predicate, this.source));
  }

  tail(): LazySeq<T> {
    return this.chain(Seq.tail(this.source));
  }

  distinct(): LazySeq<T> {
    return this.chain(Seq.distinct(this.source));
  }

  distinctBy<K>(keyOf: (value: T) => K): LazySeq<T> {
    return this.chain(Seq.distinctBy(keyOf, this.source));
  }

  except(itemsToExclude: Iterable<T>): LazySeq<T> {
    return this.chain(Seq.except(itemsToExclude, this.source));
  }

  pairwise(): LazySeq<[T, T]> {
    return this.chain(Seq.pairwise(this.source));
  }

  indexed(): LazySeq<[number, T]> {
    return this.chain(Seq.indexed(this.source));
  }

  zip<U>(other: Iterable<U>): LazySeq<[T, U]> {
    return this.chain(Seq.zip(this.source, other));
  }

  concat(other: Iterable<T>): LazySeq<T> {
    return this.chain(Seq.append(this.source, other));
  }

  /** Running fold states, starting with `init` */
  scan<S>(f: (state: S, value: T) => S, init: S): LazySeq<S> {
    return this.chain(Seq.scan(f, init, this.source));
  }

  windowed(size: number): LazySeq<T[]> {
    return this.chain(Seq.windowed(size, this.source));
  }

  chunk(size: number): LazySeq<T[]> {
    return this.chain(Seq.chunkBySize(size, this.source));
  }

  sort(compare?: (a: T, b: T) => number): LazySeq<T> {
    return this.chain(compare ? Seq.sortWith(compare, this.source) : Seq.sort(this.source));
  }

  sortBy<K>(projection: (value: T) => K): LazySeq<T> {
    return this.chain(Seq.sortBy(projection, this.source));
  }

  reverse(): LazySeq<T> {
    return this.chain(Seq.reverse(this.source));
  }

  /** Enumerate the source at most once, sharing the results */
  cache(): LazySeq<T> {
    return this.chain<T>(Seq.cache(this.source));
  }

  // ---------------------------------------------------------------------------
  // Terminal operations: these drive the single-pass execution
  // ---------------------------------------------------------------------------

  /** Collect all results into an array */
  toArray(): T[] {
    return Seq.toArray(this.source);
  }

  toList(): ConsList<T> {
    return Seq.toList(this.source);
  }

  /** Fold elements left-to-right into a single value */
  reduce<Acc>(f: (acc: Acc, value: T) => Acc, init: Acc): Acc {
    return Seq.fold(f, init, this.source);
  }

  /** Find the first element matching the predicate */
  find(predicate: (value: T) => boolean): T | undefined {
    return Seq.tryFind(predicate, this.source);
  }

  /** True if any element satisfies the predicate */
  some(predicate: (value: T) => boolean): boolean {
    return Seq.exists(predicate, this.source);
  }

  /** True if all elements satisfy the predicate */
  every(predicate: (value: T) => boolean): boolean {
    return Seq.forall(predicate, this.source);
  }

  /** Count the number of elements */
  count(): number {
    return Seq.length(this.source);
  }

  /** Execute a side effect for each element */
  forEach(f: (value: T) => void): void {
    Seq.iter(f, this.source);
  }

  /** First element; fails on an empty sequence */
  first(): T {
    return Seq.head(this.source);
  }

  /** First element, or undefined if empty */
  tryFirst(): T | undefined {
    return Seq.tryHead(this.source);
  }

  /** Last element; fails on an empty sequence */
  last(): T {
    return Seq.last(this.source);
  }

  /** Last element, or undefined if empty */
  tryLast(): T | undefined {
    return Seq.tryLast(this.source);
  }

  /** Collect into a Map using key/value extractors */
  toMap<K, V>(keyFn: (value: T) => K, valueFn: (value: T) => V): Map<K, V> {
    const map = new Map<K, V>();
    Seq.iter((value: T) => {
      map.set(keyFn(value), valueFn(value));
    }, this.source);
    return map;
  }

  /** Group elements by a structurally compared key, in order of first occurrence */
  groupBy<K>(keyFn: (value: T) => K): Map<K, T[]> {
    return new Map(Seq.toArray(Seq.groupBy(keyFn, this.source)));
  }

  /** First smallest element; fails on an empty sequence */
  min(compare?: (a: T, b: T) => number): T {
    const best = this.extreme(compare, (c) => c < 0);
    if (best === NO_VALUE) throw new EmptySequenceError();
    return best;
  }

  /** First largest element; fails on an empty sequence */
  max(compare?: (a: T, b: T) => number): T {
    const best = this.extreme(compare, (c) => c > 0);
    if (best === NO_VALUE) throw new EmptySequenceError();
    return best;
  }

  /** Smallest element, or undefined if empty */
  tryMin(compare?: (a: T, b: T) => number): T | undefined {
    const best = this.extreme(compare, (c) => c < 0);
    return best === NO_VALUE ? undefined : best;
  }

  /** Largest element, or undefined if empty */
  tryMax(compare?: (a: T, b: T) => number): T | undefined {
    const best = this.extreme(compare, (c) => c > 0);
    return best === NO_VALUE ? undefined : best;
  }

  private extreme(
    compare: ((a: T, b: T) => number) | undefined,
    better: (comparison: number) => boolean
  ): T | NoValue {
    const cmp = compare ?? naturalCompare;
    let best: T | NoValue = NO_VALUE;
    Seq.iter((value: T) => {
      if (best === NO_VALUE || better(cmp(value, best))) best = value;
    }, this.source);
    return best;
  }

  /** Sum of numeric elements */
  sum(this: LazySeq<number>): number {
    return Seq.sum(this.source);
  }

  /** Mean of numeric elements; fails on an empty sequence */
  average(this: LazySeq<number>): number {
    return Seq.average(this.source);
  }

  /** Join string elements with a separator */
  join(this: LazySeq<string>, separator: string = ","): string {
    return Seq.toArray(this.source).join(separator);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.source[Symbol.iterator]();
  }
}
