/**
 * Sequence sources.
 */

import { checkNonNegative, checkNonNull } from "@seqfuse/core";
import { CachedSequence } from "../cache.js";
import { AppendSequence } from "../drivers/append.js";
import { ArraySequence, EmptySequence, createArray } from "../drivers/array.js";
import { DelayedSequence } from "../drivers/delay.js";
import { InitSequence } from "../drivers/init.js";
import { IterableSequence, fromGenerator } from "../drivers/iterable.js";
import { ListSequence } from "../drivers/list.js";
import { UnfoldSequence, type UnfoldGenerator } from "../drivers/unfold.js";
import { identity } from "../factory.js";
import { ConsList } from "../list.js";
import { Sequence, isSequence } from "../sequence.js";

/** Anything with a `dispose()` that `using` can release. */
export interface DisposableResource {
  dispose(): void;
}

/**
 * View any iterable as a Sequence. Sequences pass through; arrays and
 * ConsLists get their dedicated drivers.
 */
export function toSequence<T>(source: Iterable<T>): Sequence<T> {
  checkNonNull("source", source);
  if (isSequence(source)) return source;
  if (Array.isArray(source)) return createArray<T>(source);
  if (source instanceof ConsList) return new ListSequence<T, T>(source, identity<T>());
  return new IterableSequence(source, identity<T>());
}

export function ofArray<T>(source: readonly T[]): Sequence<T> {
  checkNonNull("source", source);
  return new ArraySequence(() => source, identity<T>());
}

export function ofList<T>(source: ConsList<T>): Sequence<T> {
  checkNonNull("source", source);
  return new ListSequence(source, identity<T>());
}

export function ofIterable<T>(source: Iterable<T>): Sequence<T> {
  return toSequence(source);
}

export function empty<T>(): Sequence<T> {
  return new EmptySequence<T>();
}

export function singleton<T>(value: T): Sequence<T> {
  return createArray([value]);
}

export function replicate<T>(count: number, value: T): Sequence<T> {
  checkNonNegative("count", count);
  return new InitSequence(count, () => value, identity<T>());
}

export function init<T>(count: number, f: (index: number) => T): Sequence<T> {
  checkNonNegative("count", count);
  return new InitSequence(count, f, identity<T>());
}

export function initInfinite<T>(f: (index: number) => T): Sequence<T> {
  return new InitSequence(undefined, f, identity<T>());
}

/**
 * Generate elements from a state until `generator` returns undefined.
 */
export function unfold<S, T>(generator: UnfoldGenerator<S, T>, state: S): Sequence<T> {
  return new UnfoldSequence(generator, state, identity<T>());
}

/** Calls `f` afresh each time the result is enumerated. */
export function delay<T>(f: () => Iterable<T>): Sequence<T> {
  return new DelayedSequence(() => toSequence(f()));
}

export function append<T>(first: Iterable<T>, second: Iterable<T>): Sequence<T> {
  checkNonNull("source1", first);
  checkNonNull("source2", second);
  if (first instanceof AppendSequence) return first.append(second);
  return AppendSequence.of(first, second);
}

export function concat<T>(sources: Iterable<Iterable<T>>): Sequence<T> {
  checkNonNull("sources", sources);
  return fromGenerator<T>(function* () {
    for (const source of sources) {
      yield* source;
    }
  });
}

/**
 * Enumerates `f(resource)` and disposes `resource` when that enumeration is
 * disposed, whether it finished, stopped early or threw.
 */
export function using<R extends DisposableResource, T>(
  resource: R,
  f: (resource: R) => Iterable<T>
): Sequence<T> {
  return fromGenerator<T>(function* () {
    try {
      yield* f(resource);
    } finally {
      resource.dispose();
    }
  });
}

export function cache<T>(source: Iterable<T>): CachedSequence<T> {
  checkNonNull("source", source);
  return new CachedSequence(source);
}

/**
 * Hides the concrete type of `source`, so it cannot be cast back to an
 * array or a cache.
 */
export function readonly<T>(source: Iterable<T>): Sequence<T> {
  checkNonNull("source", source);
  return fromGenerator(() => source[Symbol.iterator]());
}
