/**
 * Stages that walk secondary sources in lockstep with the main one.
 *
 * Each stage owns enumerators over its secondary sources for the length of
 * one execution. They are opened on the first element and disposed in the
 * stage's own `onDispose`, before disposal is forwarded. When a secondary
 * source runs out first, the stage halts the pipeline.
 */

import type { Consumer } from "../consumer.js";
import type { Enumerator } from "../enumerator.js";
import { enumerate } from "../sequence.js";
import type { PipelineSignal } from "../signal.js";
import { Stage } from "../stage.js";

export class Map2Stage<T1, T2, U> extends Stage<T1, U> {
  private input2: Enumerator<T2> | undefined;

  constructor(
    private readonly map: (first: T1, second: T2) => U,
    private readonly source2: Iterable<T2>,
    private readonly signal: PipelineSignal,
    next: Consumer<U>
  ) {
    super(next);
  }

  processNext(input: T1): boolean {
    const input2 = (this.input2 ??= enumerate(this.source2));
    if (input2.moveNext()) {
      return this.next.processNext(this.map(input, input2.current));
    }
    this.signal.stopFurtherProcessing();
    return false;
  }

  onDispose(): void {
    try {
      this.input2?.dispose();
    } finally {
      this.next.onDispose();
    }
  }
}

export class Map3Stage<T1, T2, T3, U> extends Stage<T1, U> {
  private input2: Enumerator<T2> | undefined;
  private input3: Enumerator<T3> | undefined;

  constructor(
    private readonly map: (first: T1, second: T2, third: T3) => U,
    private readonly source2: Iterable<T2>,
    private readonly source3: Iterable<T3>,
    private readonly signal: PipelineSignal,
    next: Consumer<U>
  ) {
    super(next);
  }

  processNext(input: T1): boolean {
    const input2 = (this.input2 ??= enumerate(this.source2));
    const input3 = (this.input3 ??= enumerate(this.source3));
    if (input2.moveNext() && input3.moveNext()) {
      return this.next.processNext(this.map(input, input2.current, input3.current));
    }
    this.signal.stopFurtherProcessing();
    return false;
  }

  onDispose(): void {
    try {
      this.input2?.dispose();
    } finally {
      try {
        this.input3?.dispose();
      } finally {
        this.next.onDispose();
      }
    }
  }
}

export class Mapi2Stage<T1, T2, U> extends Stage<T1, U> {
  private index = 0;
  private input2: Enumerator<T2> | undefined;

  constructor(
    private readonly map: (index: number, first: T1, second: T2) => U,
    private readonly source2: Iterable<T2>,
    private readonly signal: PipelineSignal,
    next: Consumer<U>
  ) {
    super(next);
  }

  processNext(input: T1): boolean {
    const input2 = (this.input2 ??= enumerate(this.source2));
    if (input2.moveNext()) {
      return this.next.processNext(this.map(this.index++, input, input2.current));
    }
    this.signal.stopFurtherProcessing();
    return false;
  }

  onDispose(): void {
    try {
      this.input2?.dispose();
    } finally {
      this.next.onDispose();
    }
  }
}
