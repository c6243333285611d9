// src/core/hyper/hyper.ts
// Parallel sequences: batched work units over an injected executor
//
// The coordinator pulls the source sequentially, hands each batch to the
// executor as one work unit, and never keeps more than `degree` units in
// flight. Each unit owns the result slots of its own batch, so ordered
// collection needs no locking. A failure or an external abort stops the
// issuing of units; the run then waits for running units and rejects as a
// whole.

import type { ArrayVal, HyperFn, HyperSeq, ListVal, Val } from "../values";
import { decont } from "../values";
import type { PullIterator } from "../iter/iterator";
import { iteratorFromArray } from "../iter/iterator";
import { iteratorOf, spliceSlips } from "../iter/iterate";
import { listFromIterator, listOf } from "../positional/list";
import { freshSeqId } from "../seq/seq";
import { makeArray } from "../binder/construct";
import { single } from "../binder/singleArg";
import type { RuntimeContext } from "../runtime/context";
import { defaultContext, logEvent } from "../runtime/context";
import type { UnitFailure } from "../errors";
import {
  AlreadyConsumedError,
  CancelledError,
  ListRuntimeError,
  WorkUnitFailureError,
  describeError,
} from "../errors";
import type { Outcome } from "../../outcome/outcome";
import { done, fail } from "../../outcome/constructors";
import type { WorkExecutor } from "./executor";
import { createPoolExecutor } from "./executor";

// ─────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────

export type HyperOptions = {
  /** Elements per work unit (default: config.hyper.batch) */
  batch?: number;
  /** Units in flight when no executor is given (default: config.hyper.degree) */
  degree?: number;
  executor?: WorkExecutor;
  signal?: AbortSignal;
  ctx?: RuntimeContext;
};

const identity: HyperFn = (value) => value;

function makeHyper(source: Val, fn: HyperFn | undefined, ordered: boolean, opts: HyperOptions): HyperSeq {
  const ctx = opts.ctx ?? defaultContext();
  const batch = opts.batch ?? ctx.config.hyper.batch;
  if (!Number.isInteger(batch) || batch < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${batch}`);
  }
  return {
    tag: "HyperSeq",
    id: freshSeqId(),
    state: "Fresh",
    source: spliceSlips(iteratorOf(source)),
    fn: fn ?? identity,
    ordered,
    batch,
    executor: opts.executor ?? createPoolExecutor(opts.degree ?? ctx.config.hyper.degree),
    signal: opts.signal,
    ctx,
  };
}

/**
 * Parallel map whose collected results keep source order.
 */
export function hyper(source: Val, fn?: HyperFn, opts: HyperOptions = {}): HyperSeq {
  return makeHyper(source, fn, true, opts);
}

/**
 * Parallel map whose collected results arrive in completion order.
 */
export function race(source: Val, fn?: HyperFn, opts: HyperOptions = {}): HyperSeq {
  return makeHyper(source, fn, false, opts);
}

// ─────────────────────────────────────────────────────────────────
// Coordinator
// ─────────────────────────────────────────────────────────────────

function takeSource(h: HyperSeq, op: "iterate" | "cache"): PullIterator {
  const source = h.source;
  if (h.state !== "Fresh" || source === undefined) {
    logEvent(h.ctx, { tag: "SeqRejected", seqId: h.id, op, state: h.state });
    throw new AlreadyConsumedError(h.id, h.state);
  }
  h.source = undefined;
  h.state = "Consuming";
  return source;
}

function readBatch(source: PullIterator, size: number): Val[] {
  const items: Val[] = [];
  while (items.length < size) {
    const next = source.pull();
    if (next.tag === "End") break;
    items.push(next.value);
  }
  return items;
}

/**
 * Run every unit; `deliver` sees each result once, after its whole unit
 * has succeeded. Resolves to the number of units issued.
 */
async function runUnits(
  h: HyperSeq,
  source: PullIterator,
  deliver: (index: number, value: Val) => void
): Promise<number> {
  const external = h.signal;
  if (external?.aborted) {
    logEvent(h.ctx, { tag: "HyperCancelled", seqId: h.id, issued: 0 });
    throw new CancelledError();
  }

  const controller = new AbortController();
  const onAbort = (): void => controller.abort();
  external?.addEventListener("abort", onAbort, { once: true });

  const failures: UnitFailure[] = [];
  const inFlight = new Set<Promise<void>>();
  let issued = 0;
  let nextIndex = 0;
  let sourceFailed = false;
  let sourceError: unknown;

  const runUnit = async (unit: number, start: number, items: Val[]): Promise<void> => {
    if (controller.signal.aborted) return;
    logEvent(h.ctx, { tag: "HyperUnitStarted", seqId: h.id, unit, start, size: items.length });
    const results: Val[] = [];
    for (let i = 0; i < items.length; i++) {
      results.push(await h.fn(decont(items[i]), start + i));
    }
    if (controller.signal.aborted) return;
    results.forEach((value, i) => deliver(start + i, value));
    logEvent(h.ctx, { tag: "HyperUnitCompleted", seqId: h.id, unit });
  };

  try {
    while (!controller.signal.aborted) {
      if (inFlight.size >= h.executor.degree) {
        await Promise.race(inFlight);
        continue;
      }

      let items: Val[];
      try {
        items = readBatch(source, h.batch);
      } catch (error: unknown) {
        sourceFailed = true;
        sourceError = error;
        controller.abort();
        break;
      }
      if (items.length === 0) break;

      const unit = issued++;
      const start = nextIndex;
      nextIndex += items.length;

      const tracked: Promise<void> = h.executor
        .run(() => runUnit(unit, start, items))
        .catch((error: unknown) => {
          failures.push({ unit, start, error });
          logEvent(h.ctx, { tag: "HyperUnitFailed", seqId: h.id, unit, message: describeError(error) });
          controller.abort();
        })
        .finally(() => {
          inFlight.delete(tracked);
        });
      inFlight.add(tracked);
    }
    await Promise.all(inFlight);
  } finally {
    external?.removeEventListener("abort", onAbort);
  }

  if (sourceFailed) {
    throw sourceError;
  }
  if (failures.length > 0) {
    failures.sort((a, b) => a.unit - b.unit);
    throw new WorkUnitFailureError(failures);
  }
  if (external?.aborted) {
    logEvent(h.ctx, { tag: "HyperCancelled", seqId: h.id, issued });
    throw new CancelledError();
  }
  return issued;
}

async function collectValues(h: HyperSeq, source: PullIterator): Promise<{ values: Val[]; units: number }> {
  const values: Val[] = [];
  const deliver = h.ordered
    ? (index: number, value: Val): void => {
        values[index] = value;
      }
    : (_index: number, value: Val): void => {
        values.push(value);
      };
  const units = await runUnits(h, source, deliver);
  return { values, units };
}

// ─────────────────────────────────────────────────────────────────
// Consumers
// ─────────────────────────────────────────────────────────────────

/**
 * Call `cb` for every result as its unit completes. Arrival order is
 * unspecified. Resolves to the number of results delivered.
 */
export async function hyperForEach(h: HyperSeq, cb: (value: Val, index: number) => void): Promise<number> {
  const source = takeSource(h, "iterate");
  let count = 0;
  try {
    await runUnits(h, source, (index, value) => {
      count++;
      cb(value, index);
    });
  } finally {
    h.state = "Consumed";
  }
  return count;
}

/**
 * Materialize into a fresh Array. All-or-fail: a failed or cancelled run
 * rejects and no Array is produced.
 */
export async function hyperCollect(h: HyperSeq): Promise<ArrayVal> {
  return (await collectWithUnits(h)).array;
}

async function collectWithUnits(h: HyperSeq): Promise<{ array: ArrayVal; units: number }> {
  const source = takeSource(h, "iterate");
  try {
    const { values, units } = await collectValues(h, source);
    return { array: makeArray(single(listOf(values)), h.ctx), units };
  } finally {
    h.state = "Consumed";
  }
}

/**
 * Drain into an immutable List and keep it. Repeated calls return the
 * same promise, hence the same List.
 */
export function hyperCache(h: HyperSeq): Promise<ListVal> {
  if (h.state === "Cached" && h.cached) {
    return h.cached;
  }
  const source = takeSource(h, "cache");
  h.state = "Cached";
  h.cached = collectValues(h, source).then(({ values }) => {
    const cached = listFromIterator(spliceSlips(iteratorFromArray(values)));
    logEvent(h.ctx, { tag: "SeqCached", seqId: h.id, elems: cached.reified.length });
    return cached;
  });
  return h.cached;
}

/**
 * hyperCollect reporting runtime failures as a Fail outcome.
 */
export async function hyperCollectOutcome(h: HyperSeq): Promise<Outcome<ArrayVal>> {
  const startedAt = Date.now();
  try {
    const { array, units } = await collectWithUnits(h);
    return done(array, { durationMs: Date.now() - startedAt, units });
  } catch (e: unknown) {
    if (e instanceof ListRuntimeError) {
      return fail(e.toFailure(), { durationMs: Date.now() - startedAt });
    }
    throw e;
  }
}
