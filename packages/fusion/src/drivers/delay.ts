/**
 * A sequence whose source is produced by a function at each enumeration.
 */

import type { Consumer } from "../consumer.js";
import type { Enumerator } from "../enumerator.js";
import type { StageFactory } from "../factory.js";
import { Sequence } from "../sequence.js";
import type { PipelineSignal } from "../signal.js";
import { IterableSequence } from "./iterable.js";

export class DelayedSequence<T> extends Sequence<T> {
  constructor(private readonly produce: () => Sequence<T>) {
    super();
  }

  getEnumerator(): Enumerator<T> {
    return this.produce().getEnumerator();
  }

  compose<U>(next: StageFactory<T, U>): Sequence<U> {
    return new IterableSequence(this, next);
  }

  run<R extends Consumer<T>>(createSink: (signal: PipelineSignal) => R): R {
    return this.produce().run(createSink);
  }
}
