// src/core/iter/iterate.ts
// Uniform iteration over any value

import type { Val } from "../values";
import { isSlip, isTagged } from "../values";
import type { PullIterator } from "./iterator";
import { IterationEnd, iteratorFromArray, makeIterator } from "./iterator";
import { listIterator } from "../positional/list";
import { arrayIterator } from "../positional/array";
import { takeIterator } from "../seq/seq";
import { NotPositionalError } from "../errors";

/**
 * Iterator over a value's elements.
 *
 * - List, Slip: their elements, reified on demand
 * - Array: its slot Containers
 * - Seq: its own producer (consumes the Seq)
 * - Container or atom: the value itself, once
 *
 * A HyperSeq has no synchronous iterator.
 */
export function iteratorOf(v: Val): PullIterator {
  if (!isTagged(v)) {
    return iteratorFromArray([v]);
  }
  switch (v.tag) {
    case "List":
      return listIterator(v);
    case "Slip":
      return listIterator(v.list);
    case "Array":
      return arrayIterator(v);
    case "Seq":
      return takeIterator(v);
    case "Container":
      return iteratorFromArray([v]);
    case "HyperSeq":
      throw new NotPositionalError("HyperSeq");
  }
}

/**
 * Expand every Slip the source produces into its elements. Slips nested
 * inside a Slip splice too; a Container holding a Slip does not.
 */
export function spliceSlips(source: PullIterator): PullIterator {
  const stack: PullIterator[] = [source];
  return makeIterator(() => {
    for (;;) {
      const top = stack[stack.length - 1];
      if (top === undefined) return IterationEnd;
      const next = top.pull();
      if (next.tag === "End") {
        stack.pop();
        continue;
      }
      if (isSlip(next.value)) {
        stack.push(listIterator(next.value.list));
        continue;
      }
      return next;
    }
  });
}
