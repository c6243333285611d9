// test/runtime/context.spec.ts
// Event log on the runtime context

import { describe, it, expect, afterEach } from "vitest";
import {
  clearEvents,
  createRuntimeContext,
  defaultContext,
  eventsOfTag,
  logEvent,
  resetDefaultContext,
} from "../../src/core/runtime/context";
import { toSequence } from "../../src/core/seq/seq";

describe("RuntimeContext", () => {
  afterEach(() => {
    resetDefaultContext();
  });

  it("stamps and records events", () => {
    const ctx = createRuntimeContext();
    logEvent(ctx, { tag: "ArrayAssigned", mode: "eager", elems: 2 });
    expect(ctx.events).toHaveLength(1);
    expect(ctx.events[0]).toMatchObject({ tag: "ArrayAssigned", mode: "eager", elems: 2 });
    expect(typeof ctx.events[0]?.timestamp).toBe("number");
  });

  it("records nothing when logging is off", () => {
    const ctx = createRuntimeContext({ logging: false });
    toSequence([1], { ctx });
    expect(ctx.events).toEqual([]);
  });

  it("drops the oldest events past maxEvents", () => {
    const ctx = createRuntimeContext({ maxEvents: 2 });
    for (let elems = 1; elems <= 3; elems++) {
      logEvent(ctx, { tag: "ArrayAssigned", mode: "eager", elems });
    }
    expect(eventsOfTag(ctx, "ArrayAssigned").map((e) => e.elems)).toEqual([2, 3]);
  });

  it("filters by tag and clears", () => {
    const ctx = createRuntimeContext();
    logEvent(ctx, { tag: "SeqCreated", seqId: 1, lazy: false });
    logEvent(ctx, { tag: "SeqCached", seqId: 1, elems: 0 });
    expect(eventsOfTag(ctx, "SeqCached")).toMatchObject([{ seqId: 1, elems: 0 }]);
    clearEvents(ctx);
    expect(ctx.events).toEqual([]);
  });

  it("routes calls without a context to the default one", () => {
    const ctx = resetDefaultContext({ hyper: { batch: 5 } });
    expect(defaultContext()).toBe(ctx);
    expect(ctx.config.hyper).toEqual({ batch: 5, degree: 4 });
    toSequence([1]);
    expect(eventsOfTag(ctx, "SeqCreated")).toHaveLength(1);
  });
});
