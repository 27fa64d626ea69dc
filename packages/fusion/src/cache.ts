/**
 * Cached sequence: enumerates its source at most once and serves every
 * reader from a shared prefix.
 *
 * Readers each hold only an index into the prefix. The prefix grows by one
 * underlying pull when a reader asks for the element just past it, so each
 * source element is pulled once however many readers there are. Extending
 * the prefix is a synchronous step, so no other reader can observe the
 * buffer half-updated.
 */

import type { Consumer } from "./consumer.js";
import { EnumeratorBase, type Enumerator } from "./enumerator.js";
import { identity, type StageFactory } from "./factory.js";
import { IterableSequence } from "./drivers/iterable.js";
import { Sequence, enumerate, runPipeline } from "./sequence.js";
import { NO_VALUE, type PipelineSignal } from "./signal.js";

type CacheState = "notStarted" | "started" | "finished";

export class CachedSequence<T> extends Sequence<T> {
  private prefix: T[] = [];
  private state: CacheState = "notStarted";
  private source: Enumerator<T> | undefined;

  constructor(private readonly underlying: Iterable<T>) {
    super();
  }

  /**
   * Make sure the element at `index` is buffered. Returns false when the
   * underlying source ends before it.
   */
  tryGet(index: number): boolean {
    while (index >= this.prefix.length) {
      if (this.state === "finished") return false;
      if (this.state === "notStarted") {
        this.source = enumerate(this.underlying);
        this.state = "started";
      }
      const source = this.source;
      if (source === undefined) return false;
      if (source.moveNext()) {
        this.prefix.push(source.current);
      } else {
        this.state = "finished";
        this.source = undefined;
        source.dispose();
        return false;
      }
    }
    return true;
  }

  itemAt(index: number): T {
    return this.prefix[index];
  }

  /** Drop the buffered prefix and release the underlying enumerator. */
  clear(): void {
    const source = this.source;
    this.prefix = [];
    this.state = "notStarted";
    this.source = undefined;
    source?.dispose();
  }

  getEnumerator(): Enumerator<T> {
    return new CacheEnumerator(this);
  }

  compose<U>(next: StageFactory<T, U>): Sequence<U> {
    return new IterableSequence(this, next);
  }

  run<R extends Consumer<T>>(createSink: (signal: PipelineSignal) => R): R {
    return runPipeline("cache", identity<T>(), createSink, (head, signal) => {
      for (let i = 0; !signal.halted && this.tryGet(i); i++) {
        head.processNext(this.itemAt(i));
      }
    });
  }
}

class CacheEnumerator<T> extends EnumeratorBase<T> {
  private index = -1;

  constructor(private readonly cache: CachedSequence<T>) {
    super();
  }

  moveNext(): boolean {
    if (this.state === "finished") return false;
    this.state = "inProcess";
    this.index++;
    if (this.cache.tryGet(this.index)) {
      this.value = this.cache.itemAt(this.index);
      return true;
    }
    this.state = "finished";
    this.value = NO_VALUE;
    return false;
  }

  dispose(): void {}
}
