/**
 * Unfold driver: repeatedly applies a generator to a state until it
 * returns undefined.
 */

import type { Consumer } from "../consumer.js";
import type { Enumerator } from "../enumerator.js";
import type { StageFactory } from "../factory.js";
import { PipelineEnumerator, Sequence, runPipeline, type Step } from "../sequence.js";
import type { PipelineSignal } from "../signal.js";

export type UnfoldGenerator<S, T> = (state: S) => readonly [T, S] | undefined;

export class UnfoldSequence<T, U, S> extends Sequence<U> {
  constructor(
    private readonly generator: UnfoldGenerator<S, T>,
    private readonly seed: S,
    private readonly factory: StageFactory<T, U>
  ) {
    super();
  }

  getEnumerator(): Enumerator<U> {
    return new UnfoldEnumerator(this.generator, this.seed, this.factory);
  }

  compose<V>(next: StageFactory<U, V>): Sequence<V> {
    return new UnfoldSequence(this.generator, this.seed, this.factory.andThen(next));
  }

  run<R extends Consumer<U>>(createSink: (signal: PipelineSignal) => R): R {
    return runPipeline("unfold", this.factory, createSink, (head, signal) => {
      let state = this.seed;
      while (!signal.halted) {
        const step = this.generator(state);
        if (step === undefined) break;
        state = step[1];
        head.processNext(step[0]);
      }
    });
  }
}

class UnfoldEnumerator<T, U, S> extends PipelineEnumerator<T, U> {
  constructor(
    private readonly generator: UnfoldGenerator<S, T>,
    private state: S,
    factory: StageFactory<T, U>
  ) {
    super("unfold", factory);
  }

  protected pushNext(): Step {
    const step = this.generator(this.state);
    if (step === undefined) return "exhausted";
    this.state = step[1];
    return this.head.processNext(step[0]) ? "yielded" : "dropped";
  }
}
