/**
 * Stage base class and the four map/filter stages that fuse with each other.
 *
 * They share a file because the base class builds them in its default
 * `createMap` / `createFilter`.
 */

import { Consumer, type FusibleConsumer } from "./consumer.js";

/**
 * A consumer that forwards to a `next` consumer. Lifecycle hooks forward
 * unchanged unless a stage has its own work to do first.
 */
export abstract class Stage<T, U> extends Consumer<T> implements FusibleConsumer<T> {
  constructor(protected readonly next: Consumer<U>) {
    super();
  }

  onComplete(): void {
    this.next.onComplete();
  }

  onDispose(): void {
    this.next.onDispose();
  }

  asFusible(): FusibleConsumer<T> {
    return this;
  }

  skipping(): boolean {
    return false;
  }

  createMap<S>(map: (input: S) => T): Consumer<S> {
    return new MapStage(map, this);
  }

  createFilter(predicate: (input: T) => boolean): Consumer<T> {
    return new FilterStage(predicate, this);
  }
}

export class MapStage<T, U> extends Stage<T, U> {
  constructor(
    private readonly map: (input: T) => U,
    next: Consumer<U>
  ) {
    super(next);
  }

  // filter placed before a map: one consumer tests then maps
  createFilter(predicate: (input: T) => boolean): Consumer<T> {
    return new FilterThenMapStage(predicate, this.map, this.next);
  }

  processNext(input: T): boolean {
    return this.next.processNext(this.map(input));
  }
}

export class FilterStage<T> extends Stage<T, T> {
  constructor(
    private readonly predicate: (input: T) => boolean,
    next: Consumer<T>
  ) {
    super(next);
  }

  // map placed before a filter: one consumer maps then tests
  createMap<S>(map: (input: S) => T): Consumer<S> {
    return new MapThenFilterStage(map, this.predicate, this.next);
  }

  processNext(input: T): boolean {
    return this.predicate(input) ? this.next.processNext(input) : false;
  }
}

export class MapThenFilterStage<T, U> extends Stage<T, U> {
  constructor(
    private readonly map: (input: T) => U,
    private readonly predicate: (value: U) => boolean,
    next: Consumer<U>
  ) {
    super(next);
  }

  processNext(input: T): boolean {
    const value = this.map(input);
    return this.predicate(value) ? this.next.processNext(value) : false;
  }
}

export class FilterThenMapStage<T, U> extends Stage<T, U> {
  constructor(
    private readonly predicate: (input: T) => boolean,
    private readonly map: (input: T) => U,
    next: Consumer<U>
  ) {
    super(next);
  }

  processNext(input: T): boolean {
    return this.predicate(input) ? this.next.processNext(this.map(input)) : false;
  }
}
