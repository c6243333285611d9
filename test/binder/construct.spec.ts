// test/binder/construct.spec.ts
// makeList / makeArray / eager assignment / loop iteration

import { describe, it, expect, beforeEach } from "vitest";
import type { Val } from "../../src/core/values";
import { isContainer } from "../../src/core/values";
import { forEachArgument, makeArray, makeList } from "../../src/core/binder/construct";
import { assignArray, assignArrayFrom } from "../../src/core/binder/assign";
import { comma, single } from "../../src/core/binder/singleArg";
import { list, range } from "../../src/core/positional/list";
import { newArray } from "../../src/core/positional/array";
import { slip } from "../../src/core/positional/slip";
import { elems, hasPending, index, slotAt, values } from "../../src/core/positional/ops";
import { assign, box, fetch } from "../../src/core/container";
import { lazy, seqState, toSequence } from "../../src/core/seq/seq";
import { createRuntimeContext, eventsOfTag } from "../../src/core/runtime/context";
import type { RuntimeContext } from "../../src/core/runtime/context";
import { makeIterator, pulled, IterationEnd } from "../../src/core/iter/iterator";

describe("makeList", () => {
  it("builds one element per comma operand", () => {
    const l = makeList([1, list(2, 3), 4]);
    expect(elems(l)).toBe(3);
    expect(index(l, 1)).toEqual(list(2, 3));
  });

  it("splices Slip operands", () => {
    expect(values(makeList([1, slip(2, 3), 4]))).toEqual([1, 2, 3, 4]);
  });

  it("splices Slips produced by a spread source", () => {
    const seq = toSequence([1, slip(2, 3)]);
    expect(values(makeList([seq]))).toEqual([1, 2, 3]);
  });

  it("keeps a boxed Slip whole", () => {
    const c = box(slip(1, 2));
    const l = makeList([0, c]);
    expect(elems(l)).toBe(2);
    expect(slotAt(l, 1)).toBe(c);
  });

  it("keeps a spread Array's Containers", () => {
    const arr = makeArray([1, 2]);
    const l = makeList([arr]);
    expect(slotAt(l, 0)).toBe(slotAt(arr, 0));
    assign(slotAt(l, 0), 10);
    expect(index(arr, 0)).toBe(10);
  });

  it("stays lazy over an infinite source", () => {
    const l = makeList([range(1)]);
    expect(hasPending(l)).toBe(true);
    expect(index(l, 9)).toBe(10);
  });
});

describe("makeArray", () => {
  it("nests a trailing-comma operand", () => {
    const inner = makeList([1, 2, 3]);
    const arr = makeArray(comma(inner));
    expect(elems(arr)).toBe(1);
    expect(index(arr, 0)).toBe(inner);
  });

  it("spreads a lone Array operand", () => {
    const arr = makeArray(single(makeArray([1])));
    expect(elems(arr)).toBe(1);
    expect(index(arr, 0)).toBe(1);
  });

  it("stores a lazily-marked Seq without draining it", () => {
    let produced = 0;
    const source = makeIterator(() => (produced < 5 ? pulled(++produced) : IterationEnd));
    const arr = makeArray([lazy(toSequence(source))]);
    expect(produced).toBe(0);
    expect(index(arr, 1)).toBe(2);
    expect(produced).toBe(2);
    expect(elems(arr)).toBe(5);
  });
});

describe("assignArray", () => {
  let ctx: RuntimeContext;

  beforeEach(() => {
    ctx = createRuntimeContext();
  });

  it("drains a Seq eagerly into fresh Containers", () => {
    const source = [box(2), box(3), box(4)];
    const seq = toSequence(source, { ctx });
    const arr = assignArray(newArray(), seq, ctx);

    expect(seqState(seq)).toBe("Consumed");
    expect(values(arr)).toEqual([2, 3, 4]);
    for (let i = 0; i < 3; i++) {
      expect(slotAt(arr, i)).not.toBe(source[i]);
    }
    source[0].value = 99;
    expect(index(arr, 0)).toBe(2);
    expect(eventsOfTag(ctx, "ArrayAssigned")).toMatchObject([{ mode: "eager", elems: 3 }]);
  });

  it("replaces the previous contents", () => {
    const arr = makeArray([1, 2, 3]);
    assignArrayFrom(arr, ["a"], ctx);
    expect(values(arr)).toEqual(["a"]);
  });

  it("assigns an Array to itself", () => {
    const arr = makeArray([1, 2]);
    const before = slotAt(arr, 0);
    assignArray(arr, arr, ctx);
    expect(values(arr)).toEqual([1, 2]);
    expect(slotAt(arr, 0)).not.toBe(before);
  });

  it("assigns an infinite Array to itself", () => {
    const arr = makeArray([range(1)]);
    expect(index(arr, 1)).toBe(2);
    const before = slotAt(arr, 0);
    assignArray(arr, arr, ctx);
    expect(index(arr, 0)).toBe(1);
    expect(index(arr, 4)).toBe(5);
    expect(slotAt(arr, 0)).not.toBe(before);
    expect(eventsOfTag(ctx, "ArrayAssigned")).toMatchObject([{ mode: "lazy" }]);
  });

  it("keeps unread input when a partly read Array is assigned to itself", () => {
    let produced = 0;
    const source = makeIterator(() => (produced < 4 ? pulled(++produced) : IterationEnd));
    const arr = makeArray([lazy(toSequence(source))]);
    expect(index(arr, 0)).toBe(1);
    assignArray(arr, arr, ctx);
    expect(values(arr)).toEqual([1, 2, 3, 4]);
  });

  it("stores a boxed List as one element", () => {
    const inner = list(1, 2);
    const arr = assignArray(newArray(), box(inner), ctx);
    expect(elems(arr)).toBe(1);
    expect(index(arr, 0)).toBe(inner);
  });

  it("logs lazy assignment", () => {
    assignArray(newArray(), range(0), ctx);
    expect(eventsOfTag(ctx, "ArrayAssigned")).toMatchObject([{ mode: "lazy", elems: 0 }]);
  });
});

describe("forEachArgument", () => {
  it("runs once for a boxed List", () => {
    const seen: Val[] = [];
    const n = forEachArgument([box(list(1, 2, 3))], (item) => seen.push(item));
    expect(n).toBe(1);
    expect(seen).toHaveLength(1);
    expect(isContainer(seen[0])).toBe(true);
  });

  it("runs once per element for a bare List", () => {
    const seen: number[] = [];
    forEachArgument([list(1, 2, 3)], (_item, i) => seen.push(i));
    expect(seen).toEqual([0, 1, 2]);
  });

  it("hands Array Containers to the body", () => {
    const arr = makeArray([1, 2, 3]);
    forEachArgument([arr], (item) => {
      if (isContainer(item)) assign(item, fetch(item) === 2 ? 20 : fetch(item));
    });
    expect(values(arr)).toEqual([1, 20, 3]);
  });
});
