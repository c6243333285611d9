// src/core/positional/list.ts
// Immutable Lists, including lazy and infinite ones

import type { ListVal, Val } from "../values";
import type { PullIterator } from "../iter/iterator";
import { IterationEnd, makeIterator, pulled } from "../iter/iterator";
import { InfiniteLengthError } from "../errors";

// ─────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────

/**
 * Build a List from bare values. No binder rules apply: each argument is
 * one element, whatever it is.
 */
export function list(...values: Val[]): ListVal {
  return listOf(values);
}

/**
 * Build a List that takes ownership of `values`.
 */
export function listOf(values: Val[]): ListVal {
  return { tag: "List", reified: values, infinite: false, lazy: false };
}

/**
 * Build a List over a producer.
 *
 * A finite, non-lazy source is drained now. A lazy or infinite source is
 * kept pending and reified on demand.
 */
export function listFromIterator(
  source: PullIterator,
  opts: { lazy?: boolean; infinite?: boolean } = {}
): ListVal {
  const infinite = opts.infinite ?? false;
  if (opts.lazy || infinite) {
    return { tag: "List", reified: [], pending: source, infinite, lazy: true };
  }
  const reified: Val[] = [];
  for (let next = source.pull(); next.tag === "Value"; next = source.pull()) {
    reified.push(next.value);
  }
  return { tag: "List", reified, infinite: false, lazy: false };
}

/**
 * Integer range, inclusive at both ends. Elements are reified on demand;
 * only `to = Infinity` makes the range lazy for assignment.
 */
export function range(from: number, to = Infinity): ListVal {
  let next = from;
  const source = makeIterator(() => (next <= to ? pulled(next++) : IterationEnd));
  const infinite = to === Infinity;
  return { tag: "List", reified: [], pending: source, infinite, lazy: infinite };
}

// ─────────────────────────────────────────────────────────────────
// Reification
// ─────────────────────────────────────────────────────────────────

/**
 * Reify until index `i` exists. Returns false if the List ends first.
 */
export function reifyListTo(l: ListVal, i: number): boolean {
  while (l.reified.length <= i && l.pending) {
    const next = l.pending.pull();
    if (next.tag === "End") {
      l.pending = undefined;
      break;
    }
    l.reified.push(next.value);
  }
  return i < l.reified.length;
}

/**
 * Reify every element. Fails on an infinite List.
 */
export function reifyListAll(l: ListVal, op: string): Val[] {
  if (l.infinite) {
    throw new InfiniteLengthError(op, "List");
  }
  while (l.pending) {
    const next = l.pending.pull();
    if (next.tag === "End") {
      l.pending = undefined;
    } else {
      l.reified.push(next.value);
    }
  }
  return l.reified;
}

/**
 * Iterate a List's elements, reifying as the cursor advances. Several
 * cursors over one List share the reified prefix.
 */
export function listIterator(l: ListVal): PullIterator {
  let i = 0;
  return makeIterator(() => {
    if (!reifyListTo(l, i)) return IterationEnd;
    return pulled(l.reified[i++]);
  });
}
