// src/core/binder/construct.ts
// Constructor entry points and the Array mutators that take "the list"

import type { ArrayVal, ListVal, Val } from "../values";
import { listFromIterator, listOf } from "../positional/list";
import { newArray, pushValues, spliceValues, unshiftValues } from "../positional/array";
import type { RuntimeContext } from "../runtime/context";
import { assignResolved } from "./assign";
import type { Operands } from "./singleArg";
import {
  argumentValues,
  resolutionIsInfinite,
  resolutionIsLazy,
  resolutionIterator,
  resolveArguments,
} from "./singleArg";

/**
 * The comma operator: a List with one element per effective argument.
 *
 *   makeList([box(l)])        -> 1 element
 *   makeList([l])             -> elems(l) elements
 *   makeList([a, b])          -> 2 elements, whatever a and b hold
 *   makeList([1, slip(2, 3)]) -> 3 elements
 */
export function makeList(operands: Operands): ListVal {
  const res = resolveArguments(operands);
  return listFromIterator(resolutionIterator(res), {
    lazy: resolutionIsLazy(res),
    infinite: resolutionIsInfinite(res),
  });
}

/**
 * Array constructor: a fresh Array, then eager assignment from the operands.
 */
export function makeArray(operands: Operands, ctx?: RuntimeContext): ArrayVal {
  return assignResolved(newArray(), resolveArguments(operands), ctx);
}

export function push(target: ArrayVal, ...args: Val[]): ArrayVal {
  return pushValues(target, argumentValues(args, "push"));
}

export function unshift(target: ArrayVal, ...args: Val[]): ArrayVal {
  return unshiftValues(target, argumentValues(args, "unshift"));
}

/**
 * Remove `count` elements from `start`, insert the replacement arguments
 * in their place, and return the removed values as a List.
 */
export function splice(target: ArrayVal, start: number, count: number, ...replacement: Val[]): ListVal {
  const values = replacement.length === 0 ? [] : argumentValues(replacement, "splice");
  return listOf(spliceValues(target, start, count, values));
}

/**
 * Loop-construct entry point: run `body` once per effective argument and
 * return how many times it ran. Arrays hand their Containers to the body.
 */
export function forEachArgument(operands: Operands, body: (item: Val, index: number) => void): number {
  const it = resolutionIterator(resolveArguments(operands));
  let i = 0;
  for (let next = it.pull(); next.tag === "Value"; next = it.pull()) {
    body(next.value, i++);
  }
  return i;
}
