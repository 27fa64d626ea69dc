/**
 * Operations that need the whole input before producing anything. Each one
 * is delayed: the input is materialized when the result is first
 * enumerated, and again on every later enumeration.
 */

import {
  HashMap,
  eqStructural,
  hashStructural,
  naturalCompare,
  type Ordering,
} from "@seqfuse/collections";
import { ArgumentOutOfRangeError, checkNonNull, checkPositive } from "@seqfuse/core";
import { createDelayedArray } from "../drivers/array.js";
import type { Sequence } from "../sequence.js";
import { toArray } from "./consume.js";

function sortedCopy<T>(source: Iterable<T>, compare: (a: T, b: T) => number): T[] {
  // Array.prototype.sort is stable
  return toArray(source).sort(compare);
}

export function sortWith<T>(compare: (a: T, b: T) => number, source: Iterable<T>): Sequence<T> {
  checkNonNull("source", source);
  return createDelayedArray(() => sortedCopy(source, compare));
}

export function sort<T>(source: Iterable<T>): Sequence<T> {
  return sortWith<T>(naturalCompare, source);
}

export function sortBy<T, K>(projection: (value: T) => K, source: Iterable<T>): Sequence<T> {
  return sortWith((a: T, b: T) => naturalCompare(projection(a), projection(b)), source);
}

export function sortDescending<T>(source: Iterable<T>): Sequence<T> {
  return sortWith((a: T, b: T): Ordering => naturalCompare(b, a), source);
}

export function sortByDescending<T, K>(projection: (value: T) => K, source: Iterable<T>): Sequence<T> {
  return sortWith((a: T, b: T) => naturalCompare(projection(b), projection(a)), source);
}

export function reverse<T>(source: Iterable<T>): Sequence<T> {
  checkNonNull("source", source);
  return createDelayedArray(() => toArray(source).reverse());
}

/**
 * Moves the element at index i to index `indexMap(i)`. Fails on enumeration
 * if `indexMap` is not a permutation of the indices.
 */
export function permute<T>(indexMap: (index: number) => number, source: Iterable<T>): Sequence<T> {
  checkNonNull("source", source);
  return createDelayedArray(() => {
    const input = toArray(source);
    const result = new Array<T>(input.length);
    const placed = new Array<boolean>(input.length).fill(false);
    for (let i = 0; i < input.length; i++) {
      const target = indexMap(i);
      if (!Number.isInteger(target) || target < 0 || target >= input.length || placed[target]) {
        throw new ArgumentOutOfRangeError("indexMap", target, "a permutation of the source indices");
      }
      placed[target] = true;
      result[target] = input[i];
    }
    return result;
  });
}

/**
 * Groups elements by key. Groups come out in the order their keys first
 * occur; elements keep their order within a group.
 */
export function groupBy<T, K>(projection: (value: T) => K, source: Iterable<T>): Sequence<[K, T[]]> {
  checkNonNull("source", source);
  return createDelayedArray(() => {
    const groups = new HashMap<K, T[]>(eqStructural<K>(), hashStructural<K>());
    for (const value of toArray(source)) {
      groups.getOrInsert(projection(value), () => []).push(value);
    }
    return [...groups.entries()];
  });
}

/** Number of elements per key, in order of first occurrence. */
export function countBy<T, K>(projection: (value: T) => K, source: Iterable<T>): Sequence<[K, number]> {
  checkNonNull("source", source);
  return createDelayedArray(() => {
    const counts = new HashMap<K, number>(eqStructural<K>(), hashStructural<K>());
    for (const value of toArray(source)) {
      const key = projection(value);
      counts.set(key, counts.getOrElse(key, 0) + 1);
    }
    return [...counts.entries()];
  });
}

/**
 * Splits into at most `count` chunks whose sizes differ by at most one, the
 * longer chunks first.
 */
export function splitInto<T>(count: number, source: Iterable<T>): Sequence<T[]> {
  checkNonNull("source", source);
  checkPositive("count", count);
  return createDelayedArray(() => {
    const input = toArray(source);
    const chunks = Math.min(count, input.length);
    const size = Math.floor(input.length / Math.max(chunks, 1));
    const longer = input.length - size * chunks;
    const result: T[][] = [];
    let start = 0;
    for (let i = 0; i < chunks; i++) {
      const end = start + size + (i < longer ? 1 : 0);
      result.push(input.slice(start, end));
      start = end;
    }
    return result;
  });
}

/**
 * Like scan, folding from the right: every intermediate state of a right
 * fold, ending with the initial state.
 */
export function scanBack<T, S>(f: (value: T, state: S) => S, source: Iterable<T>, state: S): Sequence<S> {
  checkNonNull("source", source);
  return createDelayedArray(() => {
    const input = toArray(source);
    const result = new Array<S>(input.length + 1);
    let acc = state;
    result[input.length] = acc;
    for (let i = input.length - 1; i >= 0; i--) {
      acc = f(input[i], acc);
      result[i] = acc;
    }
    return result;
  });
}
