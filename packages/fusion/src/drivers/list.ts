/**
 * List driver: walks the cells of a persistent ConsList.
 */

import type { Consumer } from "../consumer.js";
import type { Enumerator } from "../enumerator.js";
import type { StageFactory } from "../factory.js";
import type { ConsList } from "../list.js";
import { PipelineEnumerator, Sequence, runPipeline, type Step } from "../sequence.js";
import type { PipelineSignal } from "../signal.js";

export class ListSequence<T, U> extends Sequence<U> {
  constructor(
    private readonly list: ConsList<T>,
    private readonly factory: StageFactory<T, U>
  ) {
    super();
  }

  getEnumerator(): Enumerator<U> {
    return new ListEnumerator(this.list, this.factory);
  }

  compose<V>(next: StageFactory<U, V>): Sequence<V> {
    return new ListSequence(this.list, this.factory.andThen(next));
  }

  run<R extends Consumer<U>>(createSink: (signal: PipelineSignal) => R): R {
    return runPipeline("list", this.factory, createSink, (head, signal) => {
      for (let cell = this.list.cell; cell && !signal.halted; cell = cell.tail.cell) {
        head.processNext(cell.head);
      }
    });
  }
}

class ListEnumerator<T, U> extends PipelineEnumerator<T, U> {
  constructor(
    private remaining: ConsList<T>,
    factory: StageFactory<T, U>
  ) {
    super("list", factory);
  }

  protected pushNext(): Step {
    const cell = this.remaining.cell;
    if (!cell) return "exhausted";
    this.remaining = cell.tail;
    return this.head.processNext(cell.head) ? "yielded" : "dropped";
  }
}
