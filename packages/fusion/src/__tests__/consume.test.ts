import { describe, expect, it } from "vitest";
import {
  ArgumentOutOfRangeError,
  EmptySequenceError,
  InsufficientElementsError,
  KeyNotFoundError,
  SequenceTooLongError,
} from "@seqfuse/core";
import * as Seq from "../seq/index.js";
import { instrumented } from "./fixtures.js";

describe("iteration", () => {
  it("iter and iteri visit every element", () => {
    const seen: string[] = [];
    Seq.iter((x: string) => seen.push(x), ["a", "b"]);
    Seq.iteri((i: number, x: string) => seen.push(`${i}${x}`), ["c", "d"]);
    expect(seen).toEqual(["a", "b", "0c", "1d"]);
  });

  it("iter2 and iteri2 walk two sources in lockstep", () => {
    const seen: string[] = [];
    Seq.iter2((a: number, b: string) => seen.push(`${a}${b}`), [1, 2, 3], ["x", "y"]);
    Seq.iteri2((i: number, a: number, b: string) => seen.push(`${i}:${a}${b}`), [4], ["z"]);
    expect(seen).toEqual(["1x", "2y", "0:4z"]);
  });
});

describe("folds", () => {
  it("fold and fold2", () => {
    expect(Seq.fold((s: number, x: number) => s * 10 + x, 0, [1, 2, 3])).toBe(123);
    expect(Seq.fold2((s: number, a: number, b: number) => s + a * b, 0, [1, 2, 3], [4, 5, 6])).toBe(32);
  });

  it("foldBack folds from the right", () => {
    expect(Seq.foldBack((x: string, acc: string) => acc + x, ["a", "b", "c"], "")).toBe("cba");
  });

  it("reduce and reduceBack", () => {
    expect(Seq.reduce((a: number, b: number) => a - b, [10, 3, 2])).toBe(5);
    expect(Seq.reduceBack((x: number, acc: number) => x - acc, [1, 2, 3])).toBe(2);
  });

  it("reduce of an empty sequence fails", () => {
    expect(() => Seq.reduce((a: number, b: number) => a + b, [])).toThrow(EmptySequenceError);
    expect(() => Seq.reduceBack((a: number, b: number) => a + b, [])).toThrow(EmptySequenceError);
  });

  it("mapFold threads a state", () => {
    const [doubled, total] = Seq.mapFold((s: number, x: number): [number, number] => [x * 2, s + x], 0, [1, 2, 3]);
    expect(Seq.toArray(doubled)).toEqual([2, 4, 6]);
    expect(total).toBe(6);
  });

  it("foldBack2 folds pairs from the right, ignoring the longer tail", () => {
    const visited: string[] = [];
    const result = Seq.foldBack2(
      (a: number, b: string, acc: string) => {
        visited.push(`${a}${b}`);
        return acc + b.repeat(a);
      },
      [1, 2, 3],
      ["x", "y"],
      ">"
    );
    expect(result).toBe(">yyx");
    expect(visited).toEqual(["2y", "1x"]);
  });

  it("mapFoldBack threads a state from the last element", () => {
    const [running, total] = Seq.mapFoldBack(
      (x: number, s: number): [number, number] => [x + s, s + x],
      [1, 2, 3],
      0
    );
    expect(Seq.toArray(running)).toEqual([6, 5, 3]);
    expect(total).toBe(6);
  });

  it("mapFoldBack of an empty sequence returns the initial state", () => {
    const [mapped, state] = Seq.mapFoldBack((x: number, s: string): [number, string] => [x, s + x], [], "init");
    expect(Seq.toArray(mapped)).toEqual([]);
    expect(state).toBe("init");
  });
});

describe("aggregates", () => {
  it("sum and sumBy", () => {
    expect(Seq.sum([1, 2, 3])).toBe(6);
    expect(Seq.sum([])).toBe(0);
    expect(Seq.sumBy((s: string) => s.length, ["ab", "c"])).toBe(3);
  });

  it("average and averageBy", () => {
    expect(Seq.average([1, 2, 3, 4])).toBe(2.5);
    expect(Seq.averageBy((s: string) => s.length, ["a", "abc"])).toBe(2);
  });

  it("average of an empty sequence fails", () => {
    expect(() => Seq.average([])).toThrow("The input sequence was empty. (Parameter 'source')");
  });

  it("min and max", () => {
    expect(Seq.min([3, 1, 2])).toBe(1);
    expect(Seq.max([3, 1, 2])).toBe(3);
    expect(Seq.max(["b", "c", "a"])).toBe("c");
  });

  it("minBy and maxBy keep the first of equals", () => {
    expect(Seq.maxBy((s: string) => s.length, ["aa", "b", "cc"])).toBe("aa");
    expect(Seq.minBy((s: string) => s.length, ["aa", "b", "c"])).toBe("b");
  });

  it("min of an empty sequence fails", () => {
    expect(() => Seq.min([])).toThrow(EmptySequenceError);
    expect(() => Seq.maxBy((x: number) => x, [])).toThrow(EmptySequenceError);
  });
});

describe("position", () => {
  it("length and isEmpty", () => {
    expect(Seq.length([1, 2, 3])).toBe(3);
    expect(Seq.isEmpty([])).toBe(true);
    expect(Seq.isEmpty([undefined])).toBe(false);
  });

  it("isEmpty reads at most one element", () => {
    const { iterable, stats } = instrumented([1, 2, 3]);
    Seq.isEmpty(iterable);
    expect(stats.reads).toBe(1);
  });

  it("item and tryItem", () => {
    expect(Seq.item(1, [5, 6, 7])).toBe(6);
    expect(Seq.tryItem(5, [5, 6, 7])).toBeUndefined();
    expect(Seq.tryItem(-1, [5, 6, 7])).toBeUndefined();
  });

  it("item past the end reports how far it fell short", () => {
    expect(() => Seq.item(5, [1, 2, 3])).toThrow(InsufficientElementsError);
    expect(() => Seq.item(5, [1, 2, 3])).toThrow("tried to reach 3 elements past the end of the sequence.");
    expect(() => Seq.item(-1, [1])).toThrow(ArgumentOutOfRangeError);
  });

  it("head, last and their try forms", () => {
    expect(Seq.head([4, 5])).toBe(4);
    expect(Seq.last([4, 5])).toBe(5);
    expect(Seq.tryHead([])).toBeUndefined();
    expect(Seq.tryLast([])).toBeUndefined();
    expect(() => Seq.head([])).toThrow(EmptySequenceError);
    expect(() => Seq.last([])).toThrow(EmptySequenceError);
  });

  it("head of an infinite sequence", () => {
    expect(Seq.head(Seq.initInfinite((i) => i + 100))).toBe(100);
  });

  it("exactlyOne", () => {
    expect(Seq.exactlyOne([7])).toBe(7);
    expect(() => Seq.exactlyOne([])).toThrow(EmptySequenceError);
    expect(() => Seq.exactlyOne([1, 2])).toThrow(SequenceTooLongError);
  });

  it("exactlyOne stops after the second element", () => {
    const { iterable, stats } = instrumented([1, 2, 3]);
    expect(() => Seq.exactlyOne(iterable)).toThrow(SequenceTooLongError);
    expect(stats.reads).toBe(2);
  });
});

describe("searching", () => {
  const isEven = (x: number) => x % 2 === 0;

  it("find and tryFind", () => {
    expect(Seq.find(isEven, [1, 2, 3, 4])).toBe(2);
    expect(Seq.tryFind(isEven, [1, 3])).toBeUndefined();
    expect(() => Seq.find(isEven, [1, 3])).toThrow(KeyNotFoundError);
  });

  it("findIndex and tryFindIndex", () => {
    expect(Seq.findIndex(isEven, [1, 2, 3, 4])).toBe(1);
    expect(Seq.tryFindIndex(isEven, [1, 3])).toBeUndefined();
    expect(() => Seq.findIndex(isEven, [])).toThrow(KeyNotFoundError);
  });

  it("searching from the back", () => {
    expect(Seq.findBack(isEven, [1, 2, 3, 4, 5])).toBe(4);
    expect(Seq.findIndexBack(isEven, [1, 2, 3, 4, 5])).toBe(3);
    expect(Seq.tryFindBack(isEven, [1, 3])).toBeUndefined();
    expect(Seq.tryFindIndexBack(isEven, [1, 3])).toBeUndefined();
    expect(() => Seq.findBack(isEven, [1])).toThrow(KeyNotFoundError);
  });

  it("pick and tryPick", () => {
    const label = (x: number) => (x > 1 ? `v${x}` : undefined);
    expect(Seq.pick(label, [1, 2, 3])).toBe("v2");
    expect(Seq.tryPick(label, [0, 1])).toBeUndefined();
    expect(() => Seq.pick(label, [1])).toThrow(KeyNotFoundError);
  });

  it("exists and forall", () => {
    expect(Seq.exists(isEven, [1, 2])).toBe(true);
    expect(Seq.exists(isEven, [])).toBe(false);
    expect(Seq.forall(isEven, [2, 4])).toBe(true);
    expect(Seq.forall(isEven, [2, 3])).toBe(false);
    expect(Seq.forall(isEven, [])).toBe(true);
  });

  it("exists2 and forall2", () => {
    expect(Seq.exists2((a: number, b: number) => a === b, [1, 2, 3], [3, 2, 1])).toBe(true);
    expect(Seq.forall2((a: number, b: number) => a < b, [1, 2], [2, 3, 0])).toBe(true);
    expect(Seq.forall2((a: number, b: number) => a < b, [1, 5], [2, 3])).toBe(false);
  });

  it("contains compares structurally", () => {
    expect(Seq.contains([1, 2], [[1, 2], [3]])).toBe(true);
    expect(Seq.contains({ id: 1 }, [{ id: 2 }])).toBe(false);
  });
});

describe("compareWith", () => {
  const byValue = (a: number, b: number) => a - b;

  it("returns the first non-zero comparison", () => {
    expect(Seq.compareWith(byValue, [1, 2], [1, 5])).toBe(-3);
    expect(Seq.compareWith(byValue, [1, 2], [1, 2])).toBe(0);
  });

  it("treats the shorter sequence as smaller", () => {
    expect(Seq.compareWith(byValue, [1, 2, 3], [1, 2])).toBe(1);
    expect(Seq.compareWith(byValue, [], [1])).toBe(-1);
  });

  it("disposes both sources when it stops early", () => {
    const left = instrumented([1, 9, 9]);
    const right = instrumented([2, 9]);
    expect(Seq.compareWith(byValue, left.iterable, right.iterable)).toBe(-1);
    expect(left.stats.returns).toBe(1);
    expect(right.stats.returns).toBe(1);
  });
});
