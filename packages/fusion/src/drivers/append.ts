/**
 * Concatenation driver. Sources are kept newest-first in a persistent list
 * so appending to an existing concatenation is a single cons.
 */

import type { Consumer } from "../consumer.js";
import { EnumeratorBase, type Enumerator } from "../enumerator.js";
import { identity, type StageFactory } from "../factory.js";
import { ConsList } from "../list.js";
import { Sequence, enumerate, isSequence, runPipeline } from "../sequence.js";
import { NO_VALUE, type PipelineSignal } from "../signal.js";
import { IterableSequence } from "./iterable.js";

export class AppendSequence<T> extends Sequence<T> {
  constructor(private readonly reversedSources: ConsList<Iterable<T>>) {
    super();
  }

  static of<T>(first: Iterable<T>, second: Iterable<T>): AppendSequence<T> {
    return new AppendSequence(ConsList.of(second, first));
  }

  /** A new concatenation with `source` after the existing ones. */
  append(source: Iterable<T>): AppendSequence<T> {
    return new AppendSequence(this.reversedSources.cons(source));
  }

  getEnumerator(): Enumerator<T> {
    return new AppendEnumerator(this.reversedSources.reverse().toArray());
  }

  compose<U>(next: StageFactory<T, U>): Sequence<U> {
    return new IterableSequence(this, next);
  }

  run<R extends Consumer<T>>(createSink: (signal: PipelineSignal) => R): R {
    const source = this.getEnumerator();
    return runPipeline(
      "append",
      identity<T>(),
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

class AppendEnumerator<T> extends EnumeratorBase<T> {
  private nextSource = 0;
  private active: Enumerator<T> | undefined;

  constructor(private readonly sources: readonly Iterable<T>[]) {
    super();
  }

  moveNext(): boolean {
    if (this.state === "finished") return false;
    this.state = "inProcess";
    for (;;) {
      if (this.active !== undefined) {
        if (this.active.moveNext()) {
          this.value = this.active.current;
          return true;
        }
        const exhausted = this.active;
        this.active = undefined;
        exhausted.dispose();
      }
      const source = this.takeSource();
      if (source === undefined) {
        this.state = "finished";
        this.value = NO_VALUE;
        return false;
      }
      this.active = enumerate(source);
    }
  }

  dispose(): void {
    const active = this.active;
    this.active = undefined;
    active?.dispose();
  }

  private takeSource(): Iterable<T> | undefined {
    while (this.nextSource < this.sources.length) {
      const source = this.sources[this.nextSource++];
      if (!(isSequence(source) && source.knownEmpty)) return source;
    }
    return undefined;
  }
}
