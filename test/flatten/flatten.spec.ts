// test/flatten/flatten.spec.ts
// Flattening stops at Containers

import { describe, it, expect } from "vitest";
import { flatten } from "../../src/core/flatten";
import { comma } from "../../src/core/binder/singleArg";
import { makeArray, makeList } from "../../src/core/binder/construct";
import { list, range } from "../../src/core/positional/list";
import { slip } from "../../src/core/positional/slip";
import { elems, index, slotAt, values } from "../../src/core/positional/ops";
import { box } from "../../src/core/container";
import { toSequence } from "../../src/core/seq/seq";
import { seqTake } from "../../src/core/seq/combinators";
import { hyper } from "../../src/core/hyper/hyper";

describe("flatten", () => {
  it("recurses into nested Lists", () => {
    const nested = list(1, list(2, list(3)), 4);
    expect(values(makeList([flatten(nested)]))).toEqual([1, 2, 3, 4]);
  });

  it("keeps a boxed List whole", () => {
    const c = box(list(2, 3));
    const flat = makeList([flatten(list(1, c))]);
    expect(elems(flat)).toBe(2);
    expect(slotAt(flat, 1)).toBe(c);
  });

  it("does not descend into an Array's elements", () => {
    const arr = makeArray([1, list(2, 3)]);
    const flat = makeList([flatten(arr)]);
    expect(values(flat)).toEqual([1, list(2, 3)]);
  });

  it("yields the slots of a nested Array without inspecting them", () => {
    const arr = makeArray(comma(list(1, 2)));
    const flat = makeList([flatten(list(0, arr))]);
    expect(elems(flat)).toBe(2);
    expect(index(flat, 1)).toEqual(list(1, 2));
  });

  it("recurses into Slips and Seqs", () => {
    const value = list(1, slip(2, list(3)), toSequence([4, list(5)]));
    expect(values(makeList([flatten(value)]))).toEqual([1, 2, 3, 4, 5]);
  });

  it("wraps atoms and Containers as a single element", () => {
    expect(values(makeList([flatten(5)]))).toEqual([5]);
    expect(elems(makeList([flatten(box(list(1, 2)))]))).toBe(1);
  });

  it("stays lazy over infinite input", () => {
    const firstThree = seqTake(flatten(list(range(1))), 3);
    expect(values(makeList([firstThree]))).toEqual([1, 2, 3]);
  });

  it("yields a HyperSeq as one element", () => {
    const h = hyper(list(1, 2));
    const flat = makeList([flatten(list(h, 3))]);
    expect(elems(flat)).toBe(2);
    expect(index(flat, 0)).toBe(h);
  });
});
