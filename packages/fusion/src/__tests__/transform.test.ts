import { describe, expect, it } from "vitest";
import { ArgumentNullError, ArgumentOutOfRangeError, InsufficientElementsError } from "@seqfuse/core";
import * as Seq from "../seq/index.js";
import { instrumented } from "./fixtures.js";

// ===========================================================================
// Element-wise
// ===========================================================================

describe("element-wise operations", () => {
  it("map then filter", () => {
    const lengths = Seq.filter((n: number) => n > 1, Seq.map((s: string) => s.length, ["a", "bb", "ccc"]));
    expect(Seq.toArray(lengths)).toEqual([2, 3]);
    expect(Seq.toList(lengths).toArray()).toEqual([2, 3]);
  });

  it("map agrees with mapping the materialized source", () => {
    const f = (x: number) => x * 3 + 1;
    const data = [4, 8, 15, 16, 23, 42];
    expect(Seq.toArray(Seq.map(f, data))).toEqual(data.map(f));
  });

  it("two filters act as one conjoined filter", () => {
    const p = (x: number) => x % 2 === 0;
    const q = (x: number) => x > 10;
    const data = [4, 8, 15, 16, 23, 42];
    expect(Seq.toArray(Seq.filter(q, Seq.filter(p, data)))).toEqual(
      Seq.toArray(Seq.filter((x: number) => p(x) && q(x), data))
    );
  });

  it("where is filter", () => {
    expect(Seq.toArray(Seq.where((x: number) => x > 2, [1, 2, 3, 4]))).toEqual([3, 4]);
  });

  it("mapi passes the position", () => {
    expect(Seq.toArray(Seq.mapi((i: number, x: number) => i * x, [5, 6, 7]))).toEqual([0, 6, 14]);
  });

  it("indexed pairs elements with positions", () => {
    expect(Seq.toArray(Seq.indexed(["a", "b"]))).toEqual([
      [0, "a"],
      [1, "b"],
    ]);
  });

  it("choose keeps the defined results", () => {
    const evensTimesTen = (x: number) => (x % 2 === 0 ? x * 10 : undefined);
    expect(Seq.toArray(Seq.choose(evensTimesTen, [1, 2, 3, 4]))).toEqual([20, 40]);
  });

  it("collect flattens", () => {
    expect(Seq.toArray(Seq.collect((x: number) => [x, x * 10], [1, 2]))).toEqual([1, 10, 2, 20]);
  });

  it("pairwise yields overlapping pairs", () => {
    expect(Seq.toArray(Seq.pairwise([1, 2, 3]))).toEqual([
      [1, 2],
      [2, 3],
    ]);
    expect(Seq.toArray(Seq.pairwise([1]))).toEqual([]);
  });
});

// ===========================================================================
// Zipping
// ===========================================================================

describe("zipping", () => {
  it("zip ends with the shorter source", () => {
    expect(Seq.toArray(Seq.zip([1, 2, 3], ["a", "b"]))).toEqual([
      [1, "a"],
      [2, "b"],
    ]);
  });

  it("zip3 ends with the shortest source", () => {
    expect(Seq.toArray(Seq.zip3([1, 2], ["a", "b", "c"], [true]))).toEqual([[1, "a", true]]);
  });

  it("map3 combines three sources", () => {
    const sum3 = (a: number, b: number, c: number) => a + b + c;
    expect(Seq.toArray(Seq.map3(sum3, [1, 2, 3], [10, 20], [100, 200, 300]))).toEqual([111, 222]);
  });

  it("mapi2 passes the position", () => {
    expect(Seq.toArray(Seq.mapi2((i: number, a: number, b: number) => i + a + b, [1, 2], [10, 20]))).toEqual([
      11, 23,
    ]);
  });

  it("disposes the secondary source when the main one ends first", () => {
    const { iterable, stats } = instrumented([10, 20, 30]);
    expect(Seq.toArray(Seq.zip([1, 2], iterable))).toEqual([
      [1, 10],
      [2, 20],
    ]);
    expect(stats.returns).toBe(1);
  });

  it("halts the main source when the secondary runs out", () => {
    const { iterable, stats } = instrumented([1, 2, 3, 4]);
    expect(Seq.toArray(Seq.map2((a: number, b: string) => `${a}${b}`, iterable, ["x"]))).toEqual(["1x"]);
    expect(stats.reads).toBe(2);
  });

  it("names the missing source", () => {
    const pair = (a: number, b: number) => a + b;
    const triple = (a: number, b: number, c: number) => a + b + c;
    expect(() => Reflect.apply(Seq.map2, undefined, [pair, null, [1]])).toThrow("(Parameter 'source1')");
    expect(() => Reflect.apply(Seq.map2, undefined, [pair, [1], null])).toThrow("(Parameter 'source2')");
    expect(() => Reflect.apply(Seq.map3, undefined, [triple, null, [1], [2]])).toThrow(ArgumentNullError);
    expect(() => Reflect.apply(Seq.map3, undefined, [triple, null, [1], [2]])).toThrow("(Parameter 'source1')");
    expect(() => Reflect.apply(Seq.map3, undefined, [triple, [1], [2], null])).toThrow("(Parameter 'source3')");
    expect(() => Reflect.apply(Seq.zip, undefined, [null, [1]])).toThrow("(Parameter 'source1')");
  });

  it("allPairs crosses both sources", () => {
    expect(Seq.toArray(Seq.allPairs([1, 2], ["a", "b"]))).toEqual([
      [1, "a"],
      [1, "b"],
      [2, "a"],
      [2, "b"],
    ]);
  });

  it("allPairs enumerates the second source once", () => {
    const { iterable, stats } = instrumented(["a", "b"]);
    Seq.toArray(Seq.allPairs([1, 2, 3], iterable));
    expect(stats.pulls).toBe(3);
  });
});

// ===========================================================================
// Set-like
// ===========================================================================

describe("distinct and except", () => {
  it("distinct keeps first occurrences", () => {
    expect(Seq.toArray(Seq.distinct([1, 2, 1, 3, 2]))).toEqual([1, 2, 3]);
  });

  it("distinct compares tuples structurally", () => {
    expect(
      Seq.toArray(
        Seq.distinct([
          [1, 2],
          [1, 2],
          [2, 1],
        ])
      )
    ).toEqual([
      [1, 2],
      [2, 1],
    ]);
  });

  it("distinctBy compares keys", () => {
    expect(Seq.toArray(Seq.distinctBy((x: number) => x % 3, [1, 2, 3, 4, 5, 6]))).toEqual([1, 2, 3]);
  });

  it("except drops excluded items and repeats", () => {
    expect(Seq.toArray(Seq.except([2, 4], [1, 2, 3, 4, 1, 5]))).toEqual([1, 3, 5]);
  });

  it("except does not read the exclusions for an empty input", () => {
    const { iterable, stats } = instrumented([1]);
    expect(Seq.toArray(Seq.except(iterable, []))).toEqual([]);
    expect(stats.pulls).toBe(0);
  });
});

// ===========================================================================
// Slicing
// ===========================================================================

describe("skip, take and friends", () => {
  it("skip drops a prefix", () => {
    expect(Seq.toArray(Seq.skip(2, [1, 2, 3, 4]))).toEqual([3, 4]);
    expect(Seq.toArray(Seq.skip(0, [1]))).toEqual([1]);
  });

  it("skip fails on completion when the source is too short", () => {
    expect(() => Seq.toArray(Seq.skip(5, [1, 2, 3]))).toThrow(InsufficientElementsError);
    expect(() => Seq.toArray(Seq.skip(5, [1, 2, 3]))).toThrow(
      "The input sequence has an insufficient number of elements: tried to skip 2 elements past the end of the sequence."
    );
  });

  it("skip then take slices the source", () => {
    const data = [10, 11, 12, 13, 14, 15, 16];
    expect(Seq.toArray(Seq.take(3, Seq.skip(2, data)))).toEqual(data.slice(2, 5));
  });

  it("truncate accepts a short source", () => {
    expect(Seq.toArray(Seq.truncate(5, [1, 2, 3]))).toEqual([1, 2, 3]);
    expect(Seq.toArray(Seq.truncate(2, [1, 2, 3]))).toEqual([1, 2]);
    expect(Seq.toArray(Seq.truncate(-1, [1, 2, 3]))).toEqual([]);
  });

  it("take yields what exists before failing", () => {
    const seen: number[] = [];
    expect(() => {
      for (const x of Seq.take(5, [1, 2, 3])) seen.push(x);
    }).toThrow("tried to take 2 elements past the end of the sequence.");
    expect(seen).toEqual([1, 2, 3]);
  });

  it("take does not fail before the source is drained", () => {
    const e = Seq.take(5, [1, 2, 3]).getEnumerator();
    expect(e.moveNext()).toBe(true);
    expect(e.current).toBe(1);
    e.dispose();
  });

  it("rejects negative counts up front", () => {
    expect(() => Seq.take(-1, [1])).toThrow(ArgumentOutOfRangeError);
    expect(() => Seq.skip(-1, [1])).toThrow("The input must be non-negative.\ncount = -1");
  });

  it("rejects counts that are not whole numbers", () => {
    expect(() => Seq.take(Number.NaN, [1, 2, 3])).toThrow("The input must be an integer.\ncount = NaN");
    expect(() => Seq.skip(Number.NaN, [1, 2, 3])).toThrow(ArgumentOutOfRangeError);
    expect(() => Seq.take(1.5, [1, 2, 3])).toThrow("count = 1.5");
    expect(() => Seq.skip(0.5, [1, 2, 3])).toThrow(ArgumentOutOfRangeError);
    expect(() => Seq.truncate(Number.NaN, [1, 2, 3])).toThrow(ArgumentOutOfRangeError);
    expect(() => Seq.truncate(2.5, [1, 2, 3])).toThrow("count = 2.5");
    expect(() => Seq.take(Number.POSITIVE_INFINITY, [1])).toThrow(ArgumentOutOfRangeError);
  });

  it("skipWhile and takeWhile split at the first failure", () => {
    expect(Seq.toArray(Seq.skipWhile((x: number) => x < 3, [1, 2, 3, 1]))).toEqual([3, 1]);
    expect(Seq.toArray(Seq.takeWhile((x: number) => x < 3, [1, 2, 3, 1]))).toEqual([1, 2]);
  });

  it("takeWhile stops pulling at the first failure", () => {
    const { iterable, stats } = instrumented([1, 2, 3, 4, 5]);
    Seq.toArray(Seq.takeWhile((x: number) => x < 3, iterable));
    expect(stats.reads).toBe(3);
  });

  it("tail drops the first element", () => {
    expect(Seq.toArray(Seq.tail([1, 2, 3]))).toEqual([2, 3]);
    expect(Seq.toArray(Seq.tail([1]))).toEqual([]);
  });

  it("tail of an empty sequence fails", () => {
    expect(() => Seq.toArray(Seq.tail([]))).toThrow(
      "The input sequence has an insufficient number of elements for tail."
    );
  });
});

// ===========================================================================
// Windows and running states
// ===========================================================================

describe("scan, windowed and chunkBySize", () => {
  it("scan includes the initial state", () => {
    expect(Seq.toArray(Seq.scan((s: number, x: number) => s + x, 0, [1, 2, 3]))).toEqual([0, 1, 3, 6]);
    expect(Seq.toArray(Seq.scan((s: number, x: number) => s + x, 7, []))).toEqual([7]);
  });

  it("windowed slides over the source", () => {
    expect(Seq.toArray(Seq.windowed(3, [1, 2, 3, 4, 5]))).toEqual([
      [1, 2, 3],
      [2, 3, 4],
      [3, 4, 5],
    ]);
    expect(Seq.toArray(Seq.windowed(3, [1, 2]))).toEqual([]);
  });

  it("windowed rejects a non-positive size", () => {
    expect(() => Seq.windowed(0, [1])).toThrow("The input must be positive.\nwindowSize = 0");
  });

  it("chunkBySize keeps a short last chunk", () => {
    expect(Seq.toArray(Seq.chunkBySize(2, [1, 2, 3, 4, 5]))).toEqual([[1, 2], [3, 4], [5]]);
  });
});
