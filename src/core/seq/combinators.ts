// src/core/seq/combinators.ts
// List-processing operations. Each consumes its source lazily and returns a Seq.

import type { Seq, Val } from "../values";
import { decont } from "../values";
import { IterationEnd, makeIterator, pulled } from "../iter/iterator";
import { iteratorOf } from "../iter/iterate";
import type { RuntimeContext } from "../runtime/context";
import { list } from "../positional/list";
import { toSequence } from "./seq";

/**
 * Map a function over a value's elements. Elements are decontainerized
 * before `f` sees them; a Slip returned by `f` splices where the result is
 * stored.
 */
export function seqMap(source: Val, f: (x: Val) => Val, ctx?: RuntimeContext): Seq {
  const it = iteratorOf(source);
  return toSequence(
    makeIterator(() => {
      const next = it.pull();
      return next.tag === "End" ? next : pulled(f(decont(next.value)));
    }),
    { ctx }
  );
}

/**
 * Keep the elements matching a predicate.
 */
export function seqGrep(source: Val, p: (x: Val) => boolean, ctx?: RuntimeContext): Seq {
  const it = iteratorOf(source);
  return toSequence(
    makeIterator(() => {
      for (let next = it.pull(); next.tag === "Value"; next = it.pull()) {
        if (p(decont(next.value))) return next;
      }
      return IterationEnd;
    }),
    { ctx }
  );
}

/**
 * Pair up two sources; stops at the shorter. Each pair is a two-element List.
 */
export function seqZip(a: Val, b: Val, ctx?: RuntimeContext): Seq {
  const left = iteratorOf(a);
  const right = iteratorOf(b);
  return toSequence(
    makeIterator(() => {
      const x = left.pull();
      if (x.tag === "End") return x;
      const y = right.pull();
      if (y.tag === "End") return y;
      return pulled(list(x.value, y.value));
    }),
    { ctx }
  );
}

/**
 * The first `n` elements. Never pulls past the `n`th.
 */
export function seqTake(source: Val, n: number, ctx?: RuntimeContext): Seq {
  const it = iteratorOf(source);
  let remaining = n;
  return toSequence(
    makeIterator(() => {
      if (remaining <= 0) return IterationEnd;
      remaining--;
      return it.pull();
    }),
    { ctx }
  );
}

/**
 * Everything after the first `n` elements.
 */
export function seqSkip(source: Val, n: number, ctx?: RuntimeContext): Seq {
  const it = iteratorOf(source);
  let toSkip = n;
  return toSequence(
    makeIterator(() => {
      while (toSkip > 0) {
        toSkip--;
        if (it.pull().tag === "End") return IterationEnd;
      }
      return it.pull();
    }),
    { ctx }
  );
}
