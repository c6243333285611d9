// src/core/binder/singleArg.ts
// The single argument rule: how many things a "takes the list" slot receives

import type { Val } from "../values";
import { isContainer, isLazy, isPositional, isSeq, isSlip } from "../values";
import type { PullIterator } from "../iter/iterator";
import { drain, iteratorFromArray } from "../iter/iterator";
import { iteratorOf, spliceSlips } from "../iter/iterate";
import { isInfinite } from "../positional/ops";
import { listIterator } from "../positional/list";
import { cache } from "../seq/seq";
import { InfiniteLengthError } from "../errors";

// ─────────────────────────────────────────────────────────────────
// Call-site syntax
// ─────────────────────────────────────────────────────────────────

/**
 * ArgSyntax: What the call site wrote.
 *
 * - Single: one operand and no comma (`f(x)`, `[x]`, `for x`)
 * - Comma: operands joined by commas, including the one-operand trailing
 *   comma form (`f(x,)`, `[x,]`)
 *
 * Grouping parentheses are not represented: they never change the count.
 */
export type ArgSyntax =
  | { readonly tag: "Single"; readonly value: Val }
  | { readonly tag: "Comma"; readonly operands: readonly Val[] };

/**
 * Operands: ArgSyntax, or a plain operand array read as Single when it
 * holds exactly one operand and as Comma otherwise.
 */
export type Operands = ArgSyntax | readonly Val[];

export function single(value: Val): ArgSyntax {
  return { tag: "Single", value };
}

export function comma(...operands: Val[]): ArgSyntax {
  return { tag: "Comma", operands };
}

function isArgSyntax(ops: Operands): ops is ArgSyntax {
  return !Array.isArray(ops);
}

export function toSyntax(ops: Operands): ArgSyntax {
  if (isArgSyntax(ops)) return ops;
  const [only] = ops;
  return ops.length === 1 ? single(only) : { tag: "Comma", operands: ops };
}

// ─────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────

/**
 * Resolution:
 * - Items: each operand is one argument, except Slips, which contribute
 *   their elements
 * - Spread: a single unboxed List, Array, Slip or Seq whose elements are
 *   the arguments
 */
export type Resolution =
  | { readonly tag: "Items"; readonly operands: readonly Val[] }
  | { readonly tag: "Spread"; readonly source: Val };

export function resolveArguments(ops: Operands): Resolution {
  const syntax = toSyntax(ops);
  if (syntax.tag === "Comma") {
    return { tag: "Items", operands: syntax.operands };
  }
  const v = syntax.value;
  // Rule 1: an explicit box is one argument, whatever it holds.
  if (isContainer(v)) {
    return { tag: "Items", operands: [v] };
  }
  // Rule 2: a lone bare iterable is spread.
  if (isPositional(v) || isSeq(v)) {
    return { tag: "Spread", source: v };
  }
  return { tag: "Items", operands: [v] };
}

export function resolutionIsLazy(res: Resolution): boolean {
  if (res.tag === "Spread") return isLazy(res.source);
  return res.operands.some((v) => isSlip(v) && isLazy(v));
}

export function resolutionIsInfinite(res: Resolution): boolean {
  if (res.tag === "Spread") {
    return isPositional(res.source) && isInfinite(res.source);
  }
  return res.operands.some((v) => isSlip(v) && isInfinite(v));
}

/**
 * The effective arguments, Slips spliced. Spreading a Seq consumes it.
 */
export function resolutionIterator(res: Resolution): PullIterator {
  if (res.tag === "Items") {
    return spliceSlips(iteratorFromArray(res.operands));
  }
  return spliceSlips(iteratorOf(res.source));
}

export function argumentIterator(ops: Operands): PullIterator {
  return resolutionIterator(resolveArguments(ops));
}

/**
 * Effective arguments as an array. Fails with InfiniteLength rather than
 * draining an infinite source.
 */
export function argumentValues(ops: Operands, op = "bind the arguments of"): Val[] {
  const res = resolveArguments(ops);
  if (resolutionIsInfinite(res)) {
    throw new InfiniteLengthError(op, "List");
  }
  return drain(resolutionIterator(res));
}

/**
 * Effective argument count. Counting a spread Seq caches it, so the Seq
 * is Cached afterwards.
 */
export function argumentCount(ops: Operands): number {
  const res = resolveArguments(ops);
  if (res.tag === "Spread" && isSeq(res.source)) {
    return drain(spliceSlips(listIterator(cache(res.source)))).length;
  }
  return argumentValues(ops, "count").length;
}
