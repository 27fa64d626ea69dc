/**
 * Eager operations: each consumes its source immediately.
 *
 * Everything that can be written as a single pass runs in push mode through
 * `Sequence.run`, with the accumulator in the closure. Searches stop the
 * pipeline as soon as they have their answer.
 */

import { naturalCompare, structuralEquals } from "@seqfuse/collections";
import {
  EmptySequenceError,
  InsufficientElementsError,
  KeyNotFoundError,
  SequenceTooLongError,
  checkNonNegative,
  checkNonNull,
} from "@seqfuse/core";
import { CallbackSink } from "../consumer.js";
import { ConsList } from "../list.js";
import { enumerate, type Sequence } from "../sequence.js";
import { NO_VALUE, type NoValue, type PipelineSignal } from "../signal.js";
import { createArray } from "../drivers/array.js";
import { toSequence } from "./create.js";
import { map2 } from "./transform.js";

/**
 * Push every element of `source` into `onNext`, which receives the
 * execution's signal so it can stop early. `onDone` runs on completion.
 */
function push<T>(
  source: Iterable<T>,
  onNext: (value: T, signal: PipelineSignal) => void,
  onDone?: () => void
): void {
  toSequence(source).run((signal) => new CallbackSink<T>((value) => onNext(value, signal), onDone));
}

function pairs<T1, T2>(source1: Iterable<T1>, source2: Iterable<T2>): Sequence<[T1, T2]> {
  checkNonNull("source1", source1);
  checkNonNull("source2", source2);
  return map2((a: T1, b: T2): [T1, T2] => [a, b], source1, source2);
}

// ============================================================================
// Iteration and folds
// ============================================================================

export function iter<T>(action: (value: T) => void, source: Iterable<T>): void {
  push(source, (value) => action(value));
}

export function iteri<T>(action: (index: number, value: T) => void, source: Iterable<T>): void {
  let index = 0;
  push(source, (value) => action(index++, value));
}

export function iter2<T1, T2>(
  action: (first: T1, second: T2) => void,
  source1: Iterable<T1>,
  source2: Iterable<T2>
): void {
  push(pairs(source1, source2), ([a, b]) => action(a, b));
}

export function iteri2<T1, T2>(
  action: (index: number, first: T1, second: T2) => void,
  source1: Iterable<T1>,
  source2: Iterable<T2>
): void {
  let index = 0;
  push(pairs(source1, source2), ([a, b]) => action(index++, a, b));
}

export function fold<T, S>(f: (state: S, value: T) => S, state: S, source: Iterable<T>): S {
  let acc = state;
  push(source, (value) => {
    acc = f(acc, value);
  });
  return acc;
}

export function fold2<T1, T2, S>(
  f: (state: S, first: T1, second: T2) => S,
  state: S,
  source1: Iterable<T1>,
  source2: Iterable<T2>
): S {
  let acc = state;
  push(pairs(source1, source2), ([a, b]) => {
    acc = f(acc, a, b);
  });
  return acc;
}

export function foldBack<T, S>(f: (value: T, state: S) => S, source: Iterable<T>, state: S): S {
  const array = toArray(source);
  let acc = state;
  for (let i = array.length - 1; i >= 0; i--) {
    acc = f(array[i], acc);
  }
  return acc;
}

/** Right fold over the pairs of two sources; the longer one's tail is ignored. */
export function foldBack2<T1, T2, S>(
  f: (first: T1, second: T2, state: S) => S,
  source1: Iterable<T1>,
  source2: Iterable<T2>,
  state: S
): S {
  return foldBack(([a, b]: [T1, T2], acc: S) => f(a, b, acc), pairs(source1, source2), state);
}

export function reduce<T>(f: (acc: T, value: T) => T, source: Iterable<T>): T {
  let acc: T | NoValue = NO_VALUE;
  push(source, (value) => {
    acc = acc === NO_VALUE ? value : f(acc, value);
  });
  if (acc === NO_VALUE) throw new EmptySequenceError();
  return acc;
}

export function reduceBack<T>(f: (value: T, acc: T) => T, source: Iterable<T>): T {
  const array = toArray(source);
  if (array.length === 0) throw new EmptySequenceError();
  let acc = array[array.length - 1];
  for (let i = array.length - 2; i >= 0; i--) {
    acc = f(array[i], acc);
  }
  return acc;
}

/**
 * Maps with a threaded state. Returns the mapped elements (already
 * computed) and the final state.
 */
export function mapFold<T, S, U>(
  f: (state: S, value: T) => readonly [U, S],
  state: S,
  source: Iterable<T>
): [Sequence<U>, S] {
  const results: U[] = [];
  let acc = state;
  push(source, (value) => {
    const [mapped, next] = f(acc, value);
    results.push(mapped);
    acc = next;
  });
  return [createArray(results), acc];
}

/**
 * mapFold from the last element to the first. The mapped elements keep the
 * positions of their inputs.
 */
export function mapFoldBack<T, S, U>(
  f: (value: T, state: S) => readonly [U, S],
  source: Iterable<T>,
  state: S
): [Sequence<U>, S] {
  const array = toArray(source);
  const results: U[] = new Array<U>(array.length);
  let acc = state;
  for (let i = array.length - 1; i >= 0; i--) {
    const [mapped, next] = f(array[i], acc);
    results[i] = mapped;
    acc = next;
  }
  return [createArray(results), acc];
}

// ============================================================================
// Numeric aggregates
// ============================================================================

export function sum(source: Iterable<number>): number {
  return sumBy((value: number) => value, source);
}

export function sumBy<T>(projection: (value: T) => number, source: Iterable<T>): number {
  let total = 0;
  push(source, (value) => {
    total += projection(value);
  });
  return total;
}

export function average(source: Iterable<number>): number {
  return averageBy((value: number) => value, source);
}

export function averageBy<T>(projection: (value: T) => number, source: Iterable<T>): number {
  let total = 0;
  let count = 0;
  push(
    source,
    (value) => {
      total += projection(value);
      count++;
    },
    () => {
      if (count === 0) throw new EmptySequenceError();
    }
  );
  return total / count;
}

function extremeBy<T, K>(
  projection: (value: T) => K,
  source: Iterable<T>,
  better: (candidate: K, current: K) => boolean
): T {
  let best: T | NoValue = NO_VALUE;
  let bestKey: K | NoValue = NO_VALUE;
  push(
    source,
    (value) => {
      const key = projection(value);
      if (best === NO_VALUE || bestKey === NO_VALUE || better(key, bestKey)) {
        best = value;
        bestKey = key;
      }
    },
    () => {
      if (best === NO_VALUE) throw new EmptySequenceError();
    }
  );
  if (best === NO_VALUE) throw new EmptySequenceError();
  return best;
}

/** The first smallest element. */
export function min<T>(source: Iterable<T>): T {
  return extremeBy((value: T) => value, source, (a, b) => naturalCompare(a, b) < 0);
}

export function minBy<T, K>(projection: (value: T) => K, source: Iterable<T>): T {
  return extremeBy(projection, source, (a, b) => naturalCompare(a, b) < 0);
}

/** The first largest element. */
export function max<T>(source: Iterable<T>): T {
  return extremeBy((value: T) => value, source, (a, b) => naturalCompare(a, b) > 0);
}

export function maxBy<T, K>(projection: (value: T) => K, source: Iterable<T>): T {
  return extremeBy(projection, source, (a, b) => naturalCompare(a, b) > 0);
}

// ============================================================================
// Size and position
// ============================================================================

export function length<T>(source: Iterable<T>): number {
  let count = 0;
  push(source, () => {
    count++;
  });
  return count;
}

export function isEmpty<T>(source: Iterable<T>): boolean {
  let empty = true;
  push(source, (_value, signal) => {
    empty = false;
    signal.stopFurtherProcessing();
  });
  return empty;
}

export function tryItem<T>(index: number, source: Iterable<T>): T | undefined {
  checkNonNull("source", source);
  if (index < 0) return undefined;
  let position = 0;
  let found: T | undefined;
  push(source, (value, signal) => {
    if (position++ === index) {
      found = value;
      signal.stopFurtherProcessing();
    }
  });
  return found;
}

export function item<T>(index: number, source: Iterable<T>): T {
  checkNonNull("source", source);
  checkNonNegative("index", index);
  let position = 0;
  let found: T | NoValue = NO_VALUE;
  push(source, (value, signal) => {
    if (position++ === index) {
      found = value;
      signal.stopFurtherProcessing();
    }
  });
  if (found === NO_VALUE) throw new InsufficientElementsError("reach", index - position + 1);
  return found;
}

export function tryHead<T>(source: Iterable<T>): T | undefined {
  let found: T | undefined;
  push(source, (value, signal) => {
    found = value;
    signal.stopFurtherProcessing();
  });
  return found;
}

export function head<T>(source: Iterable<T>): T {
  let found: T | NoValue = NO_VALUE;
  push(source, (value, signal) => {
    found = value;
    signal.stopFurtherProcessing();
  });
  if (found === NO_VALUE) throw new EmptySequenceError();
  return found;
}

export function tryLast<T>(source: Iterable<T>): T | undefined {
  let found: T | undefined;
  push(source, (value) => {
    found = value;
  });
  return found;
}

export function last<T>(source: Iterable<T>): T {
  let found: T | NoValue = NO_VALUE;
  push(source, (value) => {
    found = value;
  });
  if (found === NO_VALUE) throw new EmptySequenceError();
  return found;
}

/**
 * The only element. Stops after seeing a second one, which is an error.
 */
export function exactlyOne<T>(source: Iterable<T>): T {
  let found: T | NoValue = NO_VALUE;
  let tooLong = false;
  push(source, (value, signal) => {
    if (found === NO_VALUE) {
      found = value;
    } else {
      tooLong = true;
      signal.stopFurtherProcessing();
    }
  });
  if (found === NO_VALUE) throw new EmptySequenceError();
  if (tooLong) throw new SequenceTooLongError();
  return found;
}

// ============================================================================
// Searching
// ============================================================================

export function tryFind<T>(predicate: (value: T) => boolean, source: Iterable<T>): T | undefined {
  let found: T | undefined;
  push(source, (value, signal) => {
    if (predicate(value)) {
      found = value;
      signal.stopFurtherProcessing();
    }
  });
  return found;
}

export function find<T>(predicate: (value: T) => boolean, source: Iterable<T>): T {
  let found: T | NoValue = NO_VALUE;
  push(source, (value, signal) => {
    if (predicate(value)) {
      found = value;
      signal.stopFurtherProcessing();
    }
  });
  if (found === NO_VALUE) throw new KeyNotFoundError();
  return found;
}

export function tryFindIndex<T>(predicate: (value: T) => boolean, source: Iterable<T>): number | undefined {
  let index = 0;
  let found: number | undefined;
  push(source, (value, signal) => {
    if (predicate(value)) {
      found = index;
      signal.stopFurtherProcessing();
    }
    index++;
  });
  return found;
}

export function findIndex<T>(predicate: (value: T) => boolean, source: Iterable<T>): number {
  const index = tryFindIndex(predicate, source);
  if (index === undefined) throw new KeyNotFoundError();
  return index;
}

export function tryFindIndexBack<T>(
  predicate: (value: T) => boolean,
  source: Iterable<T>
): number | undefined {
  const array = toArray(source);
  for (let i = array.length - 1; i >= 0; i--) {
    if (predicate(array[i])) return i;
  }
  return undefined;
}

export function findIndexBack<T>(predicate: (value: T) => boolean, source: Iterable<T>): number {
  const index = tryFindIndexBack(predicate, source);
  if (index === undefined) throw new KeyNotFoundError();
  return index;
}

export function tryFindBack<T>(predicate: (value: T) => boolean, source: Iterable<T>): T | undefined {
  const array = toArray(source);
  const index = tryFindIndexBack(predicate, array);
  return index === undefined ? undefined : array[index];
}

export function findBack<T>(predicate: (value: T) => boolean, source: Iterable<T>): T {
  const array = toArray(source);
  return array[findIndexBack(predicate, array)];
}

/** The first value `chooser` does not map to undefined. */
export function tryPick<T, U>(chooser: (value: T) => U | undefined, source: Iterable<T>): U | undefined {
  let picked: U | undefined;
  push(source, (value, signal) => {
    const result = chooser(value);
    if (result !== undefined) {
      picked = result;
      signal.stopFurtherProcessing();
    }
  });
  return picked;
}

export function pick<T, U>(chooser: (value: T) => U | undefined, source: Iterable<T>): U {
  const picked = tryPick(chooser, source);
  if (picked === undefined) throw new KeyNotFoundError();
  return picked;
}

export function exists<T>(predicate: (value: T) => boolean, source: Iterable<T>): boolean {
  let found = false;
  push(source, (value, signal) => {
    if (predicate(value)) {
      found = true;
      signal.stopFurtherProcessing();
    }
  });
  return found;
}

export function forall<T>(predicate: (value: T) => boolean, source: Iterable<T>): boolean {
  let ok = true;
  push(source, (value, signal) => {
    if (!predicate(value)) {
      ok = false;
      signal.stopFurtherProcessing();
    }
  });
  return ok;
}

export function exists2<T1, T2>(
  predicate: (first: T1, second: T2) => boolean,
  source1: Iterable<T1>,
  source2: Iterable<T2>
): boolean {
  return exists(([a, b]) => predicate(a, b), pairs(source1, source2));
}

export function forall2<T1, T2>(
  predicate: (first: T1, second: T2) => boolean,
  source1: Iterable<T1>,
  source2: Iterable<T2>
): boolean {
  return forall(([a, b]) => predicate(a, b), pairs(source1, source2));
}

/** Membership by structural equality. */
export function contains<T>(value: T, source: Iterable<T>): boolean {
  return exists((candidate) => structuralEquals(candidate, value), source);
}

/**
 * Lexicographic comparison: the first non-zero `compare` result, otherwise
 * the shorter sequence is smaller.
 */
export function compareWith<T>(
  compare: (a: T, b: T) => number,
  source1: Iterable<T>,
  source2: Iterable<T>
): number {
  checkNonNull("source1", source1);
  checkNonNull("source2", source2);
  const e1 = enumerate(source1);
  try {
    const e2 = enumerate(source2);
    try {
      for (;;) {
        const has1 = e1.moveNext();
        const has2 = e2.moveNext();
        if (has1 !== has2) return has1 ? 1 : -1;
        if (!has1) return 0;
        const c = compare(e1.current, e2.current);
        if (c !== 0) return c;
      }
    } finally {
      e2.dispose();
    }
  } finally {
    e1.dispose();
  }
}

// ============================================================================
// Materialization
// ============================================================================

export function toArray<T>(source: Iterable<T>): T[] {
  const result: T[] = [];
  push(source, (value) => {
    result.push(value);
  });
  return result;
}

export function toList<T>(source: Iterable<T>): ConsList<T> {
  return ConsList.fromArray(toArray(source));
}
