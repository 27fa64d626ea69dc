/**
 * Lazy operations: each returns a new sequence and pulls nothing until it
 * is enumerated.
 */

import { checkInteger, checkNonNegative, checkNonNull, checkPositive } from "@seqfuse/core";
import { fromGenerator } from "../drivers/iterable.js";
import { FilterFactory, MapFactory, StageFactoryOf, type StageFactory } from "../factory.js";
import type { Sequence } from "../sequence.js";
import { DistinctByStage, DistinctStage, ExceptStage } from "../stages/set.js";
import {
  SkipStage,
  SkipWhileStage,
  TailStage,
  TakeStage,
  TakeWhileStage,
  TruncateStage,
} from "../stages/slice.js";
import { ChooseStage, MapiStage, PairwiseStage } from "../stages/transform.js";
import { Map2Stage, Map3Stage, Mapi2Stage } from "../stages/zip.js";
import { cache, empty, toSequence } from "./create.js";

function compose<T, U>(source: Iterable<T>, factory: StageFactory<T, U>): Sequence<U> {
  return toSequence(source).compose(factory);
}

export function map<T, U>(f: (value: T) => U, source: Iterable<T>): Sequence<U> {
  return compose(source, new MapFactory(f));
}

export function mapi<T, U>(f: (index: number, value: T) => U, source: Iterable<T>): Sequence<U> {
  return compose(source, new StageFactoryOf<T, U>((_signal, next) => new MapiStage(f, next)));
}

/**
 * Pairs elements of two sources positionally. The result ends with the
 * shorter source.
 */
export function map2<T1, T2, U>(
  f: (first: T1, second: T2) => U,
  source1: Iterable<T1>,
  source2: Iterable<T2>
): Sequence<U> {
  checkNonNull("source1", source1);
  checkNonNull("source2", source2);
  return compose(
    source1,
    new StageFactoryOf<T1, U>((signal, next) => new Map2Stage(f, source2, signal, next))
  );
}

export function map3<T1, T2, T3, U>(
  f: (first: T1, second: T2, third: T3) => U,
  source1: Iterable<T1>,
  source2: Iterable<T2>,
  source3: Iterable<T3>
): Sequence<U> {
  checkNonNull("source1", source1);
  checkNonNull("source2", source2);
  checkNonNull("source3", source3);
  return compose(
    source1,
    new StageFactoryOf<T1, U>((signal, next) => new Map3Stage(f, source2, source3, signal, next))
  );
}

export function mapi2<T1, T2, U>(
  f: (index: number, first: T1, second: T2) => U,
  source1: Iterable<T1>,
  source2: Iterable<T2>
): Sequence<U> {
  checkNonNull("source1", source1);
  checkNonNull("source2", source2);
  return compose(
    source1,
    new StageFactoryOf<T1, U>((signal, next) => new Mapi2Stage(f, source2, signal, next))
  );
}

export function indexed<T>(source: Iterable<T>): Sequence<[number, T]> {
  return mapi((index, value: T): [number, T] => [index, value], source);
}

export function zip<T1, T2>(source1: Iterable<T1>, source2: Iterable<T2>): Sequence<[T1, T2]> {
  return map2((a: T1, b: T2): [T1, T2] => [a, b], source1, source2);
}

export function zip3<T1, T2, T3>(
  source1: Iterable<T1>,
  source2: Iterable<T2>,
  source3: Iterable<T3>
): Sequence<[T1, T2, T3]> {
  return map3((a: T1, b: T2, c: T3): [T1, T2, T3] => [a, b, c], source1, source2, source3);
}

export function filter<T>(predicate: (value: T) => boolean, source: Iterable<T>): Sequence<T> {
  return compose(source, new FilterFactory(predicate));
}

export const where = filter;

/**
 * Keeps the values `chooser` returns, dropping the elements it maps to undefined.
 */
export function choose<T, U>(chooser: (value: T) => U | undefined, source: Iterable<T>): Sequence<U> {
  return compose(source, new StageFactoryOf<T, U>((_signal, next) => new ChooseStage(chooser, next)));
}

/** Maps each element to an iterable and flattens the results. */
export function collect<T, U>(f: (value: T) => Iterable<U>, source: Iterable<T>): Sequence<U> {
  const sequence = toSequence(source);
  return fromGenerator<U>(function* () {
    for (const value of sequence) {
      yield* f(value);
    }
  });
}

export function distinct<T>(source: Iterable<T>): Sequence<T> {
  return compose(source, new StageFactoryOf<T, T>((_signal, next) => new DistinctStage<T>(next)));
}

export function distinctBy<T, K>(keyOf: (value: T) => K, source: Iterable<T>): Sequence<T> {
  return compose(
    source,
    new StageFactoryOf<T, T>((_signal, next) => new DistinctByStage(keyOf, next))
  );
}

/**
 * Distinct elements of `source` that do not occur in `itemsToExclude`.
 */
export function except<T>(itemsToExclude: Iterable<T>, source: Iterable<T>): Sequence<T> {
  checkNonNull("itemsToExclude", itemsToExclude);
  return compose(
    source,
    new StageFactoryOf<T, T>((_signal, next) => new ExceptStage(itemsToExclude, next))
  );
}

export function pairwise<T>(source: Iterable<T>): Sequence<[T, T]> {
  return compose(source, new StageFactoryOf<T, [T, T]>((_signal, next) => new PairwiseStage<T>(next)));
}

/**
 * Drops the first `count` elements. Fails once fully enumerated if the
 * source had fewer.
 */
export function skip<T>(count: number, source: Iterable<T>): Sequence<T> {
  checkNonNegative("count", count);
  return compose(source, new StageFactoryOf<T, T>((_signal, next) => new SkipStage(count, next)));
}

export function skipWhile<T>(predicate: (value: T) => boolean, source: Iterable<T>): Sequence<T> {
  return compose(
    source,
    new StageFactoryOf<T, T>((_signal, next) => new SkipWhileStage(predicate, next))
  );
}

/**
 * The first `count` elements. Fails once fully enumerated if the source had
 * fewer. `take(0, …)` never touches the source.
 */
export function take<T>(count: number, source: Iterable<T>): Sequence<T> {
  checkNonNegative("count", count);
  checkNonNull("source", source);
  if (count === 0) return empty<T>();
  return compose(
    source,
    new StageFactoryOf<T, T>((signal, next) => new TakeStage(count, signal, next))
  );
}

export function takeWhile<T>(predicate: (value: T) => boolean, source: Iterable<T>): Sequence<T> {
  return compose(
    source,
    new StageFactoryOf<T, T>((signal, next) => new TakeWhileStage(predicate, signal, next))
  );
}

/** At most `count` elements; a shorter source is not an error. */
export function truncate<T>(count: number, source: Iterable<T>): Sequence<T> {
  checkInteger("count", count);
  checkNonNull("source", source);
  if (count <= 0) return empty<T>();
  return compose(
    source,
    new StageFactoryOf<T, T>((signal, next) => new TruncateStage(count, signal, next))
  );
}

/** All but the first element. Fails once fully enumerated if the source was empty. */
export function tail<T>(source: Iterable<T>): Sequence<T> {
  return compose(source, new StageFactoryOf<T, T>((_signal, next) => new TailStage<T>(next)));
}

/** The initial state followed by every intermediate fold state. */
export function scan<T, S>(f: (state: S, value: T) => S, state: S, source: Iterable<T>): Sequence<S> {
  const sequence = toSequence(source);
  return fromGenerator<S>(function* () {
    let acc = state;
    yield acc;
    for (const value of sequence) {
      acc = f(acc, value);
      yield acc;
    }
  });
}

/** Sliding windows of `windowSize` consecutive elements. */
export function windowed<T>(windowSize: number, source: Iterable<T>): Sequence<T[]> {
  const sequence = toSequence(source);
  checkPositive("windowSize", windowSize);
  return fromGenerator<T[]>(function* () {
    const ring: T[] = new Array<T>(windowSize);
    let filled = 0;
    let start = 0;
    for (const value of sequence) {
      if (filled < windowSize) {
        ring[filled++] = value;
      } else {
        ring[start] = value;
        start = (start + 1) % windowSize;
      }
      if (filled === windowSize) {
        const window: T[] = [];
        for (let j = 0; j < windowSize; j++) window.push(ring[(start + j) % windowSize]);
        yield window;
      }
    }
  });
}

/** Consecutive chunks of `chunkSize`; the last may be shorter. */
export function chunkBySize<T>(chunkSize: number, source: Iterable<T>): Sequence<T[]> {
  const sequence = toSequence(source);
  checkPositive("chunkSize", chunkSize);
  return fromGenerator<T[]>(function* () {
    let chunk: T[] = [];
    for (const value of sequence) {
      chunk.push(value);
      if (chunk.length === chunkSize) {
        yield chunk;
        chunk = [];
      }
    }
    if (chunk.length > 0) yield chunk;
  });
}

/**
 * Every element of `source1` paired with every element of `source2`.
 * `source2` is enumerated once per enumeration of the result.
 */
export function allPairs<T1, T2>(source1: Iterable<T1>, source2: Iterable<T2>): Sequence<[T1, T2]> {
  checkNonNull("source1", source1);
  checkNonNull("source2", source2);
  return fromGenerator<[T1, T2]>(function* () {
    const cached = cache(source2);
    try {
      for (const x of toSequence(source1)) {
        for (const y of cached) yield [x, y];
      }
    } finally {
      cached.clear();
    }
  });
}
