/**
 * Stages that cut the sequence by position or by a leading predicate.
 *
 * skip, take and tail check for a shortfall only in `onComplete`, after
 * the source has been drained. A caller that never finishes enumerating
 * never sees the error.
 */

import { InsufficientElementsError } from "@seqfuse/core";
import type { Consumer } from "../consumer.js";
import type { PipelineSignal } from "../signal.js";
import { Stage } from "../stage.js";

export class SkipStage<T> extends Stage<T, T> {
  private count = 0;

  constructor(
    private readonly skipCount: number,
    next: Consumer<T>
  ) {
    super(next);
  }

  skipping(): boolean {
    if (this.count < this.skipCount) {
      this.count++;
      return true;
    }
    return false;
  }

  processNext(input: T): boolean {
    if (this.count < this.skipCount) {
      this.count++;
      return false;
    }
    return this.next.processNext(input);
  }

  onComplete(): void {
    if (this.count < this.skipCount) {
      throw new InsufficientElementsError("skip", this.skipCount - this.count);
    }
    this.next.onComplete();
  }
}

export class SkipWhileStage<T> extends Stage<T, T> {
  private skip = true;

  constructor(
    private readonly predicate: (input: T) => boolean,
    next: Consumer<T>
  ) {
    super(next);
  }

  processNext(input: T): boolean {
    if (this.skip) {
      this.skip = this.predicate(input);
      if (this.skip) return false;
    }
    return this.next.processNext(input);
  }
}

/**
 * Forwards at most `truncateCount` elements. The stop request goes out with
 * the last one, so the driver never pulls the element after it.
 */
export class TruncateStage<T> extends Stage<T, T> {
  protected count = 0;

  constructor(
    protected readonly truncateCount: number,
    private readonly signal: PipelineSignal,
    next: Consumer<T>
  ) {
    super(next);
  }

  processNext(input: T): boolean {
    if (this.count < this.truncateCount) {
      this.count++;
      if (this.count === this.truncateCount) {
        this.signal.stopFurtherProcessing();
      }
      return this.next.processNext(input);
    }
    this.signal.stopFurtherProcessing();
    return false;
  }
}

export class TakeStage<T> extends TruncateStage<T> {
  onComplete(): void {
    if (this.count < this.truncateCount) {
      throw new InsufficientElementsError("take", this.truncateCount - this.count);
    }
    this.next.onComplete();
  }
}

export class TakeWhileStage<T> extends Stage<T, T> {
  constructor(
    private readonly predicate: (input: T) => boolean,
    private readonly signal: PipelineSignal,
    next: Consumer<T>
  ) {
    super(next);
  }

  processNext(input: T): boolean {
    if (this.predicate(input)) {
      return this.next.processNext(input);
    }
    this.signal.stopFurtherProcessing();
    return false;
  }
}

export class TailStage<T> extends Stage<T, T> {
  private first = true;

  processNext(input: T): boolean {
    if (this.first) {
      this.first = false;
      return false;
    }
    return this.next.processNext(input);
  }

  onComplete(): void {
    if (this.first) {
      throw new InsufficientElementsError("tail", 0);
    }
    this.next.onComplete();
  }
}
