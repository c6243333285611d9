// src/core/iter/iterator.ts
// Pull-based production protocol

import type { Val } from "../values";

/**
 * Pulled: Result of one pull. `End` is sticky: once an iterator returns it,
 * every later pull returns it too.
 */
export type Pulled =
  | { readonly tag: "Value"; readonly value: Val }
  | { readonly tag: "End" };

export const IterationEnd: Pulled = Object.freeze({ tag: "End" });

export function pulled(value: Val): Pulled {
  return { tag: "Value", value };
}

export interface PullIterator {
  pull(): Pulled;
}

/**
 * Wrap a step function so exhaustion latches.
 */
export function makeIterator(step: () => Pulled): PullIterator {
  let done = false;
  return {
    pull(): Pulled {
      if (done) return IterationEnd;
      const next = step();
      if (next.tag === "End") done = true;
      return next;
    },
  };
}

export function emptyIterator(): PullIterator {
  return makeIterator(() => IterationEnd);
}

/**
 * Iterate a JS array by index. Elements appended while iterating are seen.
 */
export function iteratorFromArray(items: readonly Val[]): PullIterator {
  let i = 0;
  return makeIterator(() => (i < items.length ? pulled(items[i++]) : IterationEnd));
}

export function iteratorFromIterable(items: Iterable<Val>): PullIterator {
  const it = items[Symbol.iterator]();
  return makeIterator(() => {
    const next = it.next();
    return next.done ? IterationEnd : pulled(next.value);
  });
}

/**
 * Concatenate iterators produced on demand; `sources` is itself pulled
 * lazily so infinite chains are fine.
 */
export function concatIterators(sources: Iterator<PullIterator>): PullIterator {
  let current: PullIterator | undefined;
  return makeIterator(() => {
    for (;;) {
      if (current === undefined) {
        const next = sources.next();
        if (next.done) return IterationEnd;
        current = next.value;
      }
      const item = current.pull();
      if (item.tag === "Value") return item;
      current = undefined;
    }
  });
}

/**
 * Drain an iterator into a JS array.
 */
export function drain(source: PullIterator): Val[] {
  const out: Val[] = [];
  for (let next = source.pull(); next.tag === "Value"; next = source.pull()) {
    out.push(next.value);
  }
  return out;
}
