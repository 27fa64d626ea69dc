/**
 * Array driver: an index walk over an array obtained on first use. The
 * delayed form lets sort, reverse and friends materialize their input only
 * when enumeration actually starts.
 */

import type { Consumer } from "../consumer.js";
import type { Enumerator } from "../enumerator.js";
import { identity, type StageFactory } from "../factory.js";
import { PipelineEnumerator, Sequence, runPipeline, type Step } from "../sequence.js";
import type { PipelineSignal } from "../signal.js";

export class ArraySequence<T, U> extends Sequence<U> {
  constructor(
    private readonly delayedArray: () => readonly T[],
    private readonly factory: StageFactory<T, U>
  ) {
    super();
  }

  getEnumerator(): Enumerator<U> {
    return new ArrayEnumerator(this.delayedArray, this.factory);
  }

  compose<V>(next: StageFactory<U, V>): Sequence<V> {
    return new ArraySequence(this.delayedArray, this.factory.andThen(next));
  }

  run<R extends Consumer<U>>(createSink: (signal: PipelineSignal) => R): R {
    return runPipeline("array", this.factory, createSink, (head, signal) => {
      const array = this.delayedArray();
      for (let i = 0; i < array.length && !signal.halted; i++) {
        head.processNext(array[i]);
      }
    });
  }
}

class ArrayEnumerator<T, U> extends PipelineEnumerator<T, U> {
  private array: readonly T[] | undefined;
  private index = 0;

  constructor(
    private readonly delayedArray: () => readonly T[],
    factory: StageFactory<T, U>
  ) {
    super("array", factory);
  }

  protected pushNext(): Step {
    this.array ??= this.delayedArray();
    if (this.index >= this.array.length) return "exhausted";
    return this.head.processNext(this.array[this.index++]) ? "yielded" : "dropped";
  }
}

/**
 * The empty sequence. Concatenation skips it without asking for an enumerator.
 */
export class EmptySequence<T> extends ArraySequence<T, T> {
  constructor() {
    super(() => [], identity<T>());
  }

  get knownEmpty(): boolean {
    return true;
  }
}

export function createArray<T>(array: readonly T[]): Sequence<T> {
  return new ArraySequence(() => array, identity<T>());
}

export function createDelayedArray<T>(delayedArray: () => readonly T[]): Sequence<T> {
  return new ArraySequence(delayedArray, identity<T>());
}
