// src/core/binder/assign.ts
// Eager assignment into Arrays

import type { ArrayVal, Val } from "../values";
import { drain } from "../iter/iterator";
import { detachedIterator, freshSlots } from "../positional/array";
import type { RuntimeContext } from "../runtime/context";
import { defaultContext, logEvent } from "../runtime/context";
import type { Operands, Resolution } from "./singleArg";
import {
  resolutionIsInfinite,
  resolutionIsLazy,
  resolutionIterator,
  resolveArguments,
  single,
} from "./singleArg";

/**
 * Replace an Array's contents from a resolved producer.
 *
 * Eager: the producer is drained completely, then every value gets a fresh
 * Container. Lazy (the producer is marked lazy or is infinite): the Array
 * keeps the producer and materializes slots on demand. An Array assigned
 * from itself reads a detached view of its old contents.
 */
export function assignResolved(
  target: ArrayVal,
  res: Resolution,
  ctx: RuntimeContext = defaultContext()
): ArrayVal {
  const lazy = resolutionIsLazy(res);
  const infinite = resolutionIsInfinite(res);
  const source =
    res.tag === "Spread" && res.source === target ? detachedIterator(target) : resolutionIterator(res);
  if (lazy) {
    target.slots = [];
    target.pending = source;
    target.infinite = infinite;
    logEvent(ctx, { tag: "ArrayAssigned", mode: "lazy", elems: 0 });
    return target;
  }
  const values = drain(source);
  target.slots = freshSlots(values);
  target.pending = undefined;
  target.infinite = false;
  logEvent(ctx, { tag: "ArrayAssigned", mode: "eager", elems: values.length });
  return target;
}

/**
 * `@target = producer`: the right-hand side is one operand under the
 * single argument rule.
 */
export function assignArray(target: ArrayVal, producer: Val, ctx?: RuntimeContext): ArrayVal {
  return assignResolved(target, resolveArguments(single(producer)), ctx);
}

/**
 * `@target = a, b, c`: assignment from an operand list.
 */
export function assignArrayFrom(target: ArrayVal, operands: Operands, ctx?: RuntimeContext): ArrayVal {
  return assignResolved(target, resolveArguments(operands), ctx);
}
