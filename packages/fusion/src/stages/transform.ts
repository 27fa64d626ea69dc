/**
 * Element-wise stages beyond plain map and filter.
 */

import type { Consumer } from "../consumer.js";
import { NO_VALUE, type NoValue } from "../signal.js";
import { Stage } from "../stage.js";

export class ChooseStage<T, U> extends Stage<T, U> {
  constructor(
    private readonly chooser: (input: T) => U | undefined,
    next: Consumer<U>
  ) {
    super(next);
  }

  processNext(input: T): boolean {
    const value = this.chooser(input);
    return value === undefined ? false : this.next.processNext(value);
  }
}

export class MapiStage<T, U> extends Stage<T, U> {
  private index = 0;

  constructor(
    private readonly mapi: (index: number, input: T) => U,
    next: Consumer<U>
  ) {
    super(next);
  }

  processNext(input: T): boolean {
    return this.next.processNext(this.mapi(this.index++, input));
  }
}

export class PairwiseStage<T> extends Stage<T, [T, T]> {
  private last: T | NoValue = NO_VALUE;

  processNext(input: T): boolean {
    const previous = this.last;
    this.last = input;
    if (previous === NO_VALUE) return false;
    return this.next.processNext([previous, input]);
  }
}
