/**
 * Entry points for creating lazy pipelines.
 *
 * `lazy()` wraps any iterable; `range()`, `iterate()`, `repeat()`,
 * and `generate()` create common source patterns.
 */

import { ArgumentOutOfRangeError } from "@seqfuse/core";
import { fromGenerator } from "./drivers/iterable.js";
import { LazySeq } from "./lazy.js";
import { initInfinite, toSequence, unfold } from "./seq/create.js";

/** Create a lazy pipeline from any iterable */
export function lazy<T>(source: Iterable<T>): LazySeq<T> {
  return new LazySeq(toSequence(source));
}

/** Create a lazy pipeline over a numeric range [start, end) with optional step */
export function range(start: number, end: number, step: number = 1): LazySeq<number> {
  if (step === 0) throw new ArgumentOutOfRangeError("step", step, "non-zero");
  const inRange = step > 0 ? (i: number) => i < end : (i: number) => i > end;
  return new LazySeq(
    unfold((i: number): [number, number] | undefined => (inRange(i) ? [i, i + step] : undefined), start)
  );
}

/** Create an infinite pipeline by repeatedly applying `f` to a seed */
export function iterate<T>(seed: T, f: (value: T) => T): LazySeq<T> {
  return new LazySeq(unfold((current: T): [T, T] => [current, f(current)], seed));
}

/** Create an infinite pipeline that repeats a single value */
export function repeat<T>(value: T): LazySeq<T> {
  return new LazySeq(initInfinite(() => value));
}

/** Create an infinite pipeline from a generator function */
export function generate<T>(f: () => T): LazySeq<T> {
  return new LazySeq(fromGenerator(() => generateIterable(f)));
}

function* generateIterable<T>(f: () => T): Generator<T> {
  while (true) yield f();
}
