/**
 * Stage factories: immutable descriptions of one transformation step.
 *
 * A factory owns no runtime state. Each execution asks it for a fresh
 * consumer wired to the consumer that follows it.
 */

import { isFusionEnabled } from "@seqfuse/core";
import type { Consumer } from "./consumer.js";
import type { PipelineSignal } from "./signal.js";
import { FilterStage, MapStage } from "./stage.js";

export abstract class StageFactory<T, U> {
  get isIdentity(): boolean {
    return false;
  }

  abstract create(signal: PipelineSignal, next: Consumer<U>): Consumer<T>;

  /** This step followed by `next`. */
  andThen<V>(next: StageFactory<U, V>): StageFactory<T, V> {
    return next.composeAfter(this);
  }

  /** `previous` followed by this step. */
  composeAfter<S>(previous: StageFactory<S, T>): StageFactory<S, U> {
    if (previous.isIdentity) return previous.andThen(this);
    return new ComposedFactory(previous, this);
  }
}

/**
 * The two-sided unit of composition. It never allocates a consumer.
 */
export class IdentityFactory<T> extends StageFactory<T, T> {
  get isIdentity(): boolean {
    return true;
  }

  create(_signal: PipelineSignal, next: Consumer<T>): Consumer<T> {
    return next;
  }

  andThen<V>(next: StageFactory<T, V>): StageFactory<T, V> {
    return next;
  }

  composeAfter<S>(previous: StageFactory<S, T>): StageFactory<S, T> {
    return previous;
  }
}

export class ComposedFactory<T, M, U> extends StageFactory<T, U> {
  constructor(
    private readonly first: StageFactory<T, M>,
    private readonly second: StageFactory<M, U>
  ) {
    super();
  }

  create(signal: PipelineSignal, next: Consumer<U>): Consumer<T> {
    return this.first.create(signal, this.second.create(signal, next));
  }
}

/**
 * Factory for stages that need nothing beyond the signal and the next consumer.
 */
export class StageFactoryOf<T, U> extends StageFactory<T, U> {
  constructor(private readonly build: (signal: PipelineSignal, next: Consumer<U>) => Consumer<T>) {
    super();
  }

  create(signal: PipelineSignal, next: Consumer<U>): Consumer<T> {
    return this.build(signal, next);
  }
}

export class MapFactory<T, U> extends StageFactory<T, U> {
  constructor(private readonly map: (input: T) => U) {
    super();
  }

  create(_signal: PipelineSignal, next: Consumer<U>): Consumer<T> {
    const fusible = isFusionEnabled() ? next.asFusible() : undefined;
    return fusible ? fusible.createMap(this.map) : new MapStage(this.map, next);
  }
}

export class FilterFactory<T> extends StageFactory<T, T> {
  constructor(private readonly predicate: (input: T) => boolean) {
    super();
  }

  create(_signal: PipelineSignal, next: Consumer<T>): Consumer<T> {
    const fusible = isFusionEnabled() ? next.asFusible() : undefined;
    return fusible ? fusible.createFilter(this.predicate) : new FilterStage(this.predicate, next);
  }
}

export function identity<T>(): StageFactory<T, T> {
  return new IdentityFactory<T>();
}

export function combine<T, M, U>(
  first: StageFactory<T, M>,
  second: StageFactory<M, U>
): StageFactory<T, U> {
  return first.andThen(second);
}
