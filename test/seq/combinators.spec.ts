// test/seq/combinators.spec.ts

import { describe, it, expect } from "vitest";
import type { Val } from "../../src/core/values";
import { seqGrep, seqMap, seqSkip, seqTake, seqZip } from "../../src/core/seq/combinators";
import { seqState, toSequence } from "../../src/core/seq/seq";
import { makeArray, makeList } from "../../src/core/binder/construct";
import { list, range } from "../../src/core/positional/list";
import { slip } from "../../src/core/positional/slip";
import { elems, index, values } from "../../src/core/positional/ops";
import { IterationEnd, makeIterator, pulled } from "../../src/core/iter/iterator";

const double = (x: Val): Val => (typeof x === "number" ? x * 2 : x);
const isEven = (x: Val): boolean => typeof x === "number" && x % 2 === 0;

describe("seqMap", () => {
  it("maps over a List", () => {
    expect(values(makeList([seqMap(list(1, 2, 3), double)]))).toEqual([2, 4, 6]);
  });

  it("reads Array elements through their Containers", () => {
    expect(values(makeList([seqMap(makeArray([1, 2]), double)]))).toEqual([2, 4]);
  });

  it("splices Slips returned by the function", () => {
    const s = seqMap(list(1, 2), (x) => slip(x, x));
    expect(values(makeList([s]))).toEqual([1, 1, 2, 2]);
  });

  it("consumes a Seq source", () => {
    const source = toSequence([1]);
    seqMap(source, double);
    expect(seqState(source)).toBe("Consumed");
  });
});

describe("seqGrep", () => {
  it("keeps matching elements", () => {
    expect(values(makeList([seqGrep(range(1, 10), isEven)]))).toEqual([2, 4, 6, 8, 10]);
  });
});

describe("seqTake / seqSkip", () => {
  it("takes from an infinite range", () => {
    expect(values(makeList([seqTake(range(1), 3)]))).toEqual([1, 2, 3]);
  });

  it("never pulls past the last taken element", () => {
    let produced = 0;
    const source = toSequence(makeIterator(() => pulled(++produced)));
    makeList([seqTake(source, 3)]);
    expect(produced).toBe(3);
  });

  it("skips leading elements", () => {
    expect(values(makeList([seqSkip(list(1, 2, 3, 4), 2)]))).toEqual([3, 4]);
  });

  it("skips past the end", () => {
    expect(elems(makeList([seqSkip(list(1, 2), 5)]))).toBe(0);
  });

  it("composes with grep over an infinite source", () => {
    const firstEvens = seqTake(seqGrep(range(1), isEven), 2);
    expect(values(makeList([firstEvens]))).toEqual([2, 4]);
  });
});

describe("seqZip", () => {
  it("pairs elements and stops at the shorter source", () => {
    const zipped = makeList([seqZip(list(1, 2, 3), list("a", "b"))]);
    expect(elems(zipped)).toBe(2);
    expect(index(zipped, 0)).toEqual(list(1, "a"));
    expect(index(zipped, 1)).toEqual(list(2, "b"));
  });

  it("stops when the left source ends", () => {
    const zipped = makeList([seqZip(list(1), toSequence(makeIterator(() => IterationEnd)))]);
    expect(elems(zipped)).toBe(0);
  });
});
