/**
 * The Sequence abstraction and the two execution modes every driver shares.
 *
 * Iterator mode hands out a `PipelineEnumerator` that pulls one raw element
 * at a time through the composed consumer chain. Push mode (`run`) drives
 * the whole source through a caller-supplied terminal consumer in one call.
 * Both modes fire `onComplete` once when the source is exhausted or halted,
 * and both release the source before the consumer chain's `onDispose`, on
 * every exit path.
 */

import { createLogger, NotSupportedError } from "@seqfuse/core";
import { ResultSink, type Consumer } from "./consumer.js";
import type { Enumerator } from "./enumerator.js";
import { IterableEnumerator, readCurrent } from "./enumerator.js";
import type { StageFactory } from "./factory.js";
import { PipelineSignal } from "./signal.js";

const log = createLogger("pipeline");

/**
 * A restartable, possibly infinite producer of values. Every enumeration
 * (and every `run`) re-runs the source from the start.
 */
export abstract class Sequence<T> implements Iterable<T> {
  /** A fresh enumerator positioned before the first element. */
  abstract getEnumerator(): Enumerator<T>;

  /** A new sequence with `factory` appended to this one's stages. */
  abstract compose<U>(factory: StageFactory<T, U>): Sequence<U>;

  /**
   * Push every element (or a halted prefix) into the consumer returned by
   * `createSink`, then return that consumer.
   */
  abstract run<R extends Consumer<T>>(createSink: (signal: PipelineSignal) => R): R;

  /** True only for sources that are empty without being enumerated. */
  get knownEmpty(): boolean {
    return false;
  }

  [Symbol.iterator](): Iterator<T> {
    return new EnumeratorIterator(this.getEnumerator());
  }
}

export function isSequence<T>(source: Iterable<T>): source is Sequence<T> {
  return source instanceof Sequence;
}

/**
 * An enumerator over any iterable: sequences hand out their own, anything
 * else is adapted.
 */
export function enumerate<T>(source: Iterable<T>): Enumerator<T> {
  return isSequence(source) ? source.getEnumerator() : new IterableEnumerator(source);
}

/**
 * Bridges an Enumerator to the JavaScript iterator protocol. The enumerator
 * is disposed when iteration ends, when the loop exits early through
 * `return()`, and when advancing throws.
 */
class EnumeratorIterator<T> implements Iterator<T> {
  private closed = false;

  constructor(private readonly enumerator: Enumerator<T>) {}

  next(): IteratorResult<T> {
    if (this.closed) return { done: true, value: undefined };
    let hasValue: boolean;
    try {
      hasValue = this.enumerator.moveNext();
    } catch (error) {
      this.close();
      throw error;
    }
    if (!hasValue) {
      this.close();
      return { done: true, value: undefined };
    }
    return { done: false, value: this.enumerator.current };
  }

  return(): IteratorResult<T> {
    this.close();
    return { done: true, value: undefined };
  }

  private close(): void {
    if (this.closed) return;
    this.closed = true;
    this.enumerator.dispose();
  }
}

export type Step = "yielded" | "dropped" | "exhausted";

/**
 * Iterator-mode driver loop. Subclasses supply `pushNext`, which pulls one
 * raw element and hands it to `head`, and optionally `disposeSource`.
 */
export abstract class PipelineEnumerator<T, U> implements Enumerator<U> {
  protected readonly signal = new PipelineSignal();
  protected readonly head: Consumer<T>;
  private readonly sink = new ResultSink<U>();
  private disposed = false;

  constructor(
    private readonly kind: string,
    factory: StageFactory<T, U>
  ) {
    this.head = factory.create(this.signal, this.sink);
  }

  protected abstract pushNext(): Step;

  protected disposeSource(): void {}

  get current(): U {
    return readCurrent(this.signal.state, this.sink.current);
  }

  moveNext(): boolean {
    const signal = this.signal;
    if (signal.state === "finished") return false;
    if (signal.state === "notStarted") {
      log.debug(`${this.kind} source: iterator started`);
      signal.state = "inProcess";
    }

    // A loop, not recursion: long runs of dropped elements must not grow the stack
    while (!signal.halted) {
      const step = this.pushNext();
      if (step === "yielded") return true;
      if (step === "exhausted") break;
    }

    signal.state = "finished";
    log.debug(`${this.kind} source: iterator ${signal.halted ? "halted" : "completed"}`);
    this.head.onComplete();
    return false;
  }

  reset(): never {
    throw NotSupportedError.noReset();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    try {
      this.disposeSource();
    } finally {
      this.head.onDispose();
    }
  }
}

/**
 * Push-mode driver shell shared by every source kind. `drain` feeds raw
 * elements to `head` until the source runs out or `signal.halted` is set.
 * `release` frees the raw source and runs before the chain's `onDispose`.
 */
export function runPipeline<T, U, R extends Consumer<U>>(
  kind: string,
  factory: StageFactory<T, U>,
  createSink: (signal: PipelineSignal) => R,
  drain: (head: Consumer<T>, signal: PipelineSignal) => void,
  release?: () => void
): R {
  const signal = new PipelineSignal();
  const sink = createSink(signal);
  const head = factory.create(signal, sink);

  log.debug(`${kind} source: push started`);
  signal.state = "inProcess";
  try {
    drain(head, signal);
    signal.state = "finished";
    log.debug(`${kind} source: push ${signal.halted ? "halted" : "completed"}`);
    head.onComplete();
  } finally {
    try {
      release?.();
    } finally {
      head.onDispose();
    }
  }
  return sink;
}
