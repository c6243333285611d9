// src/core/seq/seq.ts
// One-shot sequences over a PullIterator
//
// State machine:
//   Fresh --pull--> Consuming --end--> Consumed
//   Fresh --cache--> Cached (cache again: same List)
//   Fresh --takeIterator--> Consumed (the iterator moves to the caller)

import type { ListVal, Seq, SeqState, Val } from "../values";
import type { PullIterator, Pulled } from "../iter/iterator";
import { iteratorFromIterable } from "../iter/iterator";
import type { RuntimeContext } from "../runtime/context";
import { defaultContext, logEvent } from "../runtime/context";
import { AlreadyConsumedError } from "../errors";
import { listFromIterator } from "../positional/list";

// ─────────────────────────────────────────────────────────────────
// ID generation
// ─────────────────────────────────────────────────────────────────

let nextSeqId = 0;

export function freshSeqId(): number {
  return nextSeqId++;
}

/**
 * Reset the Seq ID counter (for testing).
 */
export function resetSeqIds(): void {
  nextSeqId = 0;
}

// ─────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────

export type SeqOptions = {
  /** Store lazily on eager assignment instead of draining */
  lazy?: boolean;
  ctx?: RuntimeContext;
};

function isPullIterator(source: PullIterator | Iterable<Val>): source is PullIterator {
  return typeof source === "object" && "pull" in source && typeof source.pull === "function";
}

export function toSequence(source: PullIterator | Iterable<Val>, opts: SeqOptions = {}): Seq {
  const ctx = opts.ctx ?? defaultContext();
  const seq: Seq = {
    tag: "Seq",
    id: freshSeqId(),
    state: "Fresh",
    pulled: 0,
    source: isPullIterator(source) ? source : iteratorFromIterable(source),
    lazy: opts.lazy ?? false,
    ctx,
  };
  logEvent(ctx, { tag: "SeqCreated", seqId: seq.id, lazy: seq.lazy });
  return seq;
}

// ─────────────────────────────────────────────────────────────────
// Consumption
// ─────────────────────────────────────────────────────────────────

function reject(seq: Seq, op: "pull" | "cache" | "iterate"): AlreadyConsumedError {
  logEvent(seq.ctx, { tag: "SeqRejected", seqId: seq.id, op, state: seq.state });
  return new AlreadyConsumedError(seq.id, seq.state);
}

/**
 * Pull the next value. Reaching the end moves the Seq to Consumed; any
 * pull after that (or after a cache) fails with AlreadyConsumed.
 */
export function pull(seq: Seq): Pulled {
  if (seq.state !== "Fresh" && seq.state !== "Consuming") {
    throw reject(seq, "pull");
  }
  const source = seq.source;
  if (source === undefined) {
    throw reject(seq, "pull");
  }
  seq.state = "Consuming";
  const next = source.pull();
  if (next.tag === "End") {
    seq.state = "Consumed";
    seq.source = undefined;
    logEvent(seq.ctx, { tag: "SeqExhausted", seqId: seq.id, pulled: seq.pulled });
  } else {
    seq.pulled++;
  }
  return next;
}

/**
 * Drain a Fresh Seq into an immutable List and keep it. Repeated calls
 * return the identical List.
 */
export function cache(seq: Seq): ListVal {
  if (seq.state === "Cached" && seq.cached) {
    return seq.cached;
  }
  const source = seq.source;
  if (seq.state !== "Fresh" || source === undefined) {
    throw reject(seq, "cache");
  }
  const cached = listFromIterator(source);
  seq.source = undefined;
  seq.cached = cached;
  seq.state = "Cached";
  logEvent(seq.ctx, { tag: "SeqCached", seqId: seq.id, elems: cached.reified.length });
  return cached;
}

export const toCachedList = cache;

/**
 * Move the iterator out of a Fresh Seq. The Seq is Consumed from then on;
 * the caller owns the producer.
 */
export function takeIterator(seq: Seq): PullIterator {
  const source = seq.source;
  if (seq.state !== "Fresh" || source === undefined) {
    throw reject(seq, "iterate");
  }
  seq.source = undefined;
  seq.state = "Consumed";
  return source;
}

/**
 * Move a Fresh Seq's producer into a new Seq marked lazy.
 */
export function lazy(seq: Seq): Seq {
  return toSequence(takeIterator(seq), { lazy: true, ctx: seq.ctx });
}

export function seqState(seq: Seq): SeqState {
  return seq.state;
}
