// test/properties.spec.ts
// End-to-end properties of the list runtime

import { describe, it, expect } from "vitest";
import {
  AlreadyConsumedError,
  ImmutableAssignmentError,
  assign,
  assignArray,
  assignAt,
  box,
  cache,
  comma,
  elems,
  flatten,
  index,
  isContainer,
  list,
  makeArray,
  makeList,
  newArray,
  pull,
  single,
  slotAt,
  toSequence,
  toSlip,
  values,
} from "../src/index";

describe("count invariant", () => {
  it("counts a boxed List once", () => {
    expect(elems(makeList([box(list(1, 2, 3))]))).toBe(1);
  });

  it("spreads a lone bare List", () => {
    expect(elems(makeList([list(1, 2, 3)]))).toBe(3);
  });

  it("counts comma operands whatever their sizes", () => {
    const a = makeArray([1, 2, 3, 4]);
    const b = makeArray([5]);
    expect(elems(makeList([list(a), list(b)]))).toBe(2);
  });
});

describe("Array boxing", () => {
  it("reads every element through a Container", () => {
    const arr = makeArray([1, list(2, 3), "x"]);
    for (let i = 0; i < elems(arr); i++) {
      expect(isContainer(slotAt(arr, i))).toBe(true);
    }
  });

  it("flattens an Array to exactly its own elements", () => {
    const arr = makeArray([1, list(2, 3), "x"]);
    const flat = makeList([flatten(arr)]);
    expect(values(flat)).toEqual([1, list(2, 3), "x"]);
  });
});

describe("consume once", () => {
  it("fails a pull after the drain", () => {
    const seq = toSequence([1, 2]);
    while (pull(seq).tag === "Value");
    expect(() => pull(seq)).toThrow(AlreadyConsumedError);
  });

  it("fails a pull after a cache", () => {
    const seq = toSequence([1, 2]);
    cache(seq);
    expect(() => pull(seq)).toThrow(AlreadyConsumedError);
  });

  it("returns the identical cached List", () => {
    const seq = toSequence([1, 2]);
    const first = cache(seq);
    const second = cache(seq);
    expect(second).toBe(first);
    expect(values(second)).toEqual([1, 2]);
  });
});

describe("eager assignment", () => {
  it("copies values into independent Containers", () => {
    const source = [box(2), box(3), box(4)];
    const arr = assignArray(newArray(), toSequence(source));
    expect(elems(arr)).toBe(3);

    for (const c of source) assign(c, 0);
    expect(values(arr)).toEqual([2, 3, 4]);
  });
});

describe("Slip splice", () => {
  it("splices a Slip operand", () => {
    const l = makeList([1, toSlip(list(2, 3)), 4]);
    expect(elems(l)).toBe(4);
    expect(values(l)).toEqual([1, 2, 3, 4]);
  });

  it("keeps a List operand whole", () => {
    const l = makeList([1, list(2, 3), 4]);
    expect(elems(l)).toBe(3);
    expect(values(l)).toEqual([1, list(2, 3), 4]);
  });
});

describe("immutability", () => {
  it("refuses to mutate a bare List element", () => {
    const l = list(1, 2);
    expect(() => assignAt(l, 0, 9)).toThrow(ImmutableAssignmentError);
    expect(() => assign(index(l, 0), 9)).toThrow("Cannot assign to an immutable value (Int)");
    expect(index(l, 0)).toBe(1);
  });

  it("mutates through an explicitly boxed element", () => {
    const l = list(box(1), 2);
    assignAt(l, 0, 9);
    expect(index(l, 0)).toBe(9);
  });
});

describe("nested constructor results", () => {
  it("nests a trailing-comma List as one element", () => {
    const arr = makeArray(comma(makeList([1, 2, 3])));
    expect(elems(arr)).toBe(1);
    expect(values(arr)).toEqual([list(1, 2, 3)]);
  });

  it("builds a one-element Array from a nested one-element Array", () => {
    const arr = makeArray(single(makeArray([1])));
    expect(elems(arr)).toBe(1);
    expect(index(arr, 0)).toBe(1);
  });
});
