import type { Consumer } from "../consumer.js";
import { StageFactoryOf, type StageFactory } from "../factory.js";
import { Stage } from "../stage.js";

export interface SourceStats {
  /** Calls to the iterator's `next()`, including the one that reports done. */
  pulls: number;
  /** Values handed out. */
  reads: number;
  /** Calls to the iterator's `return()`. */
  returns: number;
}

/**
 * An iterable over `items` that records how it is driven. Every
 * `[Symbol.iterator]()` call starts a fresh pass; the stats accumulate
 * across passes.
 */
export function instrumented<T>(items: readonly T[]): { iterable: Iterable<T>; stats: SourceStats } {
  const stats: SourceStats = { pulls: 0, reads: 0, returns: 0 };
  const iterable: Iterable<T> = {
    [Symbol.iterator](): Iterator<T> {
      let index = 0;
      return {
        next(): IteratorResult<T> {
          stats.pulls++;
          if (index < items.length) {
            stats.reads++;
            return { done: false, value: items[index++] };
          }
          return { done: true, value: undefined };
        },
        return(): IteratorResult<T> {
          stats.returns++;
          return { done: true, value: undefined };
        },
      };
    },
  };
  return { iterable, stats };
}

/** Pass-through stage that logs its lifecycle hooks into `log`. */
class RecordingStage<T> extends Stage<T, T> {
  constructor(
    private readonly name: string,
    private readonly log: string[],
    next: Consumer<T>
  ) {
    super(next);
  }

  processNext(input: T): boolean {
    return this.next.processNext(input);
  }

  onComplete(): void {
    this.log.push(`complete:${this.name}`);
    super.onComplete();
  }

  onDispose(): void {
    this.log.push(`dispose:${this.name}`);
    super.onDispose();
  }
}

export function recording<T>(name: string, log: string[]): StageFactory<T, T> {
  return new StageFactoryOf<T, T>((_signal, next) => new RecordingStage(name, log, next));
}
