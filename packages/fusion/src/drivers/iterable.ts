/**
 * Driver over an arbitrary pull source: any JavaScript iterable, or another
 * Sequence whose own enumerator is used as the raw source.
 */

import type { Consumer } from "../consumer.js";
import type { Enumerator } from "../enumerator.js";
import { identity, type StageFactory } from "../factory.js";
import { PipelineEnumerator, Sequence, enumerate, runPipeline, type Step } from "../sequence.js";
import type { PipelineSignal } from "../signal.js";

export class IterableSequence<T, U> extends Sequence<U> {
  constructor(
    private readonly source: Iterable<T>,
    private readonly factory: StageFactory<T, U>
  ) {
    super();
  }

  getEnumerator(): Enumerator<U> {
    return new IterableDriverEnumerator(enumerate(this.source), this.factory);
  }

  compose<V>(next: StageFactory<U, V>): Sequence<V> {
    return new IterableSequence(this.source, this.factory.andThen(next));
  }

  run<R extends Consumer<U>>(createSink: (signal: PipelineSignal) => R): R {
    const source = enumerate(this.source);
    return runPipeline(
      "iterable",
      this.factory,
      createSink,
      (head, signal) => {
        while (!signal.halted && source.moveNext()) {
          head.processNext(source.current);
        }
      },
      () => source.dispose()
    );
  }
}

class IterableDriverEnumerator<T, U> extends PipelineEnumerator<T, U> {
  constructor(
    private readonly source: Enumerator<T>,
    factory: StageFactory<T, U>
  ) {
    super("iterable", factory);
  }

  protected pushNext(): Step {
    if (!this.source.moveNext()) return "exhausted";
    return this.head.processNext(this.source.current) ? "yielded" : "dropped";
  }

  protected disposeSource(): void {
    this.source.dispose();
  }
}

export function createIterable<T>(source: Iterable<T>): Sequence<T> {
  return new IterableSequence(source, identity<T>());
}

/**
 * A restartable sequence over a generator function: each enumeration calls
 * `generator` again.
 */
export function fromGenerator<T>(generator: () => Iterator<T>): Sequence<T> {
  return createIterable({ [Symbol.iterator]: generator });
}
