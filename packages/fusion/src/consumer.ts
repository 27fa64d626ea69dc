/**
 * The consumer side of the stage protocol.
 *
 * A consumer receives one element at a time through `processNext`. Its
 * return value says whether something reached the terminal sink for this
 * element; drivers use it to decide whether to yield or keep pulling.
 *
 * `onComplete` and `onDispose` run the consumer's own hook first and then
 * forward to the next consumer, so both travel from the stage nearest the
 * source toward the sink.
 */

import { NO_VALUE, type NoValue } from "./signal.js";

export abstract class Consumer<T> {
  abstract processNext(input: T): boolean;

  onComplete(): void {}

  onDispose(): void {}

  /**
   * The fusion capability of this consumer, when it has one. Terminal sinks
   * return undefined and are always linked to without merging.
   */
  asFusible(): FusibleConsumer<T> | undefined {
    return undefined;
  }
}

export interface FusibleConsumer<T> {
  /** A consumer that maps its input and then does what this stage does. */
  createMap<S>(map: (input: S) => T): Consumer<S>;
  /** A consumer that filters its input and then does what this stage does. */
  createFilter(predicate: (input: T) => boolean): Consumer<T>;
  /**
   * Asked by index-based sources before they compute an element. True
   * means the element would be dropped unseen, so it need not be built.
   */
  skipping(): boolean;
}

/**
 * Terminal consumer of the iterator mode: stores the value the pipeline
 * produced so the enumerator can expose it as `current`.
 */
export class ResultSink<T> extends Consumer<T> {
  current: T | NoValue = NO_VALUE;

  processNext(input: T): boolean {
    this.current = input;
    return true;
  }
}

/**
 * Terminal consumer of the push mode built from closures. Aggregations keep
 * their accumulator in the enclosing scope.
 */
export class CallbackSink<T> extends Consumer<T> {
  constructor(
    private readonly onNext: (input: T) => void,
    private readonly onDone?: () => void
  ) {
    super();
  }

  processNext(input: T): boolean {
    this.onNext(input);
    return true;
  }

  onComplete(): void {
    this.onDone?.();
  }
}
