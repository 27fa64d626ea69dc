/**
 * Index-based generation. The element for index i is `f(i)`, computed only
 * when the pipeline will look at it: while a leading skip stage is still
 * dropping, indices advance without calling `f`.
 */

import { InvalidOperationError } from "@seqfuse/core";
import type { Consumer } from "../consumer.js";
import type { Enumerator } from "../enumerator.js";
import type { StageFactory } from "../factory.js";
import { PipelineEnumerator, Sequence, runPipeline, type Step } from "../sequence.js";
import type { PipelineSignal } from "../signal.js";

/** Highest index an unbounded generation may reach. */
export const MAX_INDEX = Number.MAX_SAFE_INTEGER;

function terminatingIndex(count: number | undefined): number {
  return count === undefined ? MAX_INDEX : count - 1;
}

function skippingQuery<T>(head: Consumer<T>): () => boolean {
  const fusible = head.asFusible();
  return fusible ? () => fusible.skipping() : () => false;
}

function pastMaxIndex(): InvalidOperationError {
  return new InvalidOperationError(`Enumeration has passed the maximum index ${MAX_INDEX}.`);
}

export class InitSequence<T, U> extends Sequence<U> {
  /** `count` undefined means unbounded. */
  constructor(
    private readonly count: number | undefined,
    private readonly f: (index: number) => T,
    private readonly factory: StageFactory<T, U>
  ) {
    super();
  }

  getEnumerator(): Enumerator<U> {
    return new InitEnumerator(this.count, this.f, this.factory);
  }

  compose<V>(next: StageFactory<U, V>): Sequence<V> {
    return new InitSequence(this.count, this.f, this.factory.andThen(next));
  }

  run<R extends Consumer<U>>(createSink: (signal: PipelineSignal) => R): R {
    return runPipeline("init", this.factory, createSink, (head, signal) => {
      const last = terminatingIndex(this.count);
      const isSkipping = skippingQuery(head);
      let maybeSkipping = true;
      let index = -1;
      while (!signal.halted && index < last) {
        index++;
        if (maybeSkipping) maybeSkipping = isSkipping();
        if (!maybeSkipping) head.processNext(this.f(index));
      }
      if (!signal.halted && this.count === undefined) throw pastMaxIndex();
    });
  }
}

class InitEnumerator<T, U> extends PipelineEnumerator<T, U> {
  private readonly last: number;
  private readonly isSkipping: () => boolean;
  // Skipping only happens at the start, so once it stops it stays stopped
  private maybeSkipping = true;
  private index = -1;

  constructor(
    private readonly count: number | undefined,
    private readonly f: (index: number) => T,
    factory: StageFactory<T, U>
  ) {
    super("init", factory);
    this.last = terminatingIndex(count);
    this.isSkipping = skippingQuery(this.head);
  }

  protected pushNext(): Step {
    if (this.index >= this.last) {
      if (this.count === undefined) throw pastMaxIndex();
      return "exhausted";
    }
    this.index++;
    if (this.maybeSkipping) this.maybeSkipping = this.isSkipping();
    if (this.maybeSkipping) return "dropped";
    return this.head.processNext(this.f(this.index)) ? "yielded" : "dropped";
  }
}
