// src/core/flatten.ts
// Flattening: recurse into bare iterables, stop at Containers

import type { Seq, Val } from "./values";
import { isArray, isContainer, isHyperSeq, isIterable } from "./values";
import type { PullIterator } from "./iter/iterator";
import { IterationEnd, iteratorFromArray, makeIterator } from "./iter/iterator";
import { iteratorOf } from "./iter/iterate";
import { arrayIterator } from "./positional/array";
import type { RuntimeContext } from "./runtime/context";
import { toSequence } from "./seq/seq";

type Frame = {
  it: PullIterator;
  /** false for Array frames: every element is a Container, nothing to recurse into */
  recurse: boolean;
};

function descends(v: Val): boolean {
  return isIterable(v) && !isHyperSeq(v);
}

/**
 * Lazily flatten a value.
 *
 * Lists, Slips and Seqs are recursed into (nested Seqs are consumed when
 * the traversal reaches them). A Container is yielded as one element, so
 * a boxed List stays whole. An Array yields its own slot Containers
 * without inspecting them.
 */
export function flatten(value: Val, ctx?: RuntimeContext): Seq {
  if (isArray(value)) {
    return toSequence(arrayIterator(value), { ctx });
  }
  if (isContainer(value) || !descends(value)) {
    return toSequence(iteratorFromArray([value]), { ctx });
  }

  const stack: Frame[] = [{ it: iteratorOf(value), recurse: true }];
  const source = makeIterator(() => {
    for (;;) {
      const top = stack[stack.length - 1];
      if (top === undefined) return IterationEnd;
      const next = top.it.pull();
      if (next.tag === "End") {
        stack.pop();
        continue;
      }
      const item = next.value;
      if (!top.recurse || isContainer(item) || !descends(item)) {
        return next;
      }
      if (isArray(item)) {
        stack.push({ it: arrayIterator(item), recurse: false });
      } else {
        stack.push({ it: iteratorOf(item), recurse: true });
      }
    }
  });
  return toSequence(source, { ctx });
}
