/**
 * Pull-based enumerators: the external-iterator access mode of a sequence.
 *
 * `moveNext()` advances, `current` reads the element it produced, and
 * `dispose()` releases whatever the enumerator holds. Reading `current`
 * before the first `moveNext()` or after the last one is an error, and
 * enumerators never reset.
 */

import { InvalidOperationError, NotSupportedError } from "@seqfuse/core";
import { NO_VALUE, type NoValue, type SeqState } from "./signal.js";

export interface Enumerator<T> {
  moveNext(): boolean;
  readonly current: T;
  reset(): never;
  dispose(): void;
}

export function readCurrent<T>(state: SeqState, value: T | NoValue): T {
  if (state === "notStarted") throw InvalidOperationError.notStarted();
  if (state === "finished") throw InvalidOperationError.alreadyFinished();
  if (value === NO_VALUE) throw InvalidOperationError.notStarted();
  return value;
}

export abstract class EnumeratorBase<T> implements Enumerator<T> {
  protected state: SeqState = "notStarted";
  protected value: T | NoValue = NO_VALUE;

  abstract moveNext(): boolean;

  abstract dispose(): void;

  get current(): T {
    return readCurrent(this.state, this.value);
  }

  reset(): never {
    throw NotSupportedError.noReset();
  }
}

/**
 * Adapts a JavaScript iterable. Disposing an iterator that has not finished
 * calls its `return()`, which runs the `finally` blocks of a generator.
 */
export class IterableEnumerator<T> extends EnumeratorBase<T> {
  private iterator: Iterator<T> | undefined;

  constructor(private readonly source: Iterable<T>) {
    super();
  }

  moveNext(): boolean {
    if (this.state === "finished") return false;
    this.iterator ??= this.source[Symbol.iterator]();
    this.state = "inProcess";
    const result = this.iterator.next();
    if (result.done) {
      this.state = "finished";
      this.value = NO_VALUE;
      this.iterator = undefined;
      return false;
    }
    this.value = result.value;
    return true;
  }

  dispose(): void {
    const iterator = this.iterator;
    this.iterator = undefined;
    if (iterator !== undefined && this.state !== "finished") {
      this.state = "finished";
      iterator.return?.();
    }
  }
}

export class EmptyEnumerator<T> extends EnumeratorBase<T> {
  moveNext(): boolean {
    this.state = "finished";
    return false;
  }

  dispose(): void {}
}
