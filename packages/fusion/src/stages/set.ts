/**
 * Stages that remember what they have already seen. Keys are compared with
 * structural equality: tuples, arrays, Dates and plain objects match by
 * content.
 */

import { HashSet, eqStructural, hashStructural } from "@seqfuse/collections";
import type { Consumer } from "../consumer.js";
import { Stage } from "../stage.js";

function structuralSet<K>(): HashSet<K> {
  return new HashSet<K>(eqStructural<K>(), hashStructural<K>());
}

export class DistinctStage<T> extends Stage<T, T> {
  private readonly seen = structuralSet<T>();

  processNext(input: T): boolean {
    return this.seen.tryAdd(input) ? this.next.processNext(input) : false;
  }
}

export class DistinctByStage<T, K> extends Stage<T, T> {
  private readonly seen = structuralSet<K>();

  constructor(
    private readonly keyOf: (input: T) => K,
    next: Consumer<T>
  ) {
    super(next);
  }

  processNext(input: T): boolean {
    return this.seen.tryAdd(this.keyOf(input)) ? this.next.processNext(input) : false;
  }
}

/**
 * Drops anything in `itemsToExclude`, and like distinct drops repeats of
 * what it already let through. The exclusion set is built on the first
 * element, so an empty input never enumerates `itemsToExclude`.
 */
export class ExceptStage<T> extends Stage<T, T> {
  private seen: HashSet<T> | undefined;

  constructor(
    private readonly itemsToExclude: Iterable<T>,
    next: Consumer<T>
  ) {
    super(next);
  }

  processNext(input: T): boolean {
    if (this.seen === undefined) {
      const seen = structuralSet<T>();
      for (const item of this.itemsToExclude) seen.add(item);
      this.seen = seen;
    }
    return this.seen.tryAdd(input) ? this.next.processNext(input) : false;
  }
}
