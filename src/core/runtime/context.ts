// src/core/runtime/context.ts
// Runtime context: configuration plus the event log

import type { RuntimeConfig, PartialConfig } from "../config/config";
import { mergeConfigs } from "../config/config";
import type { EventInput, EventOf, RuntimeEvent, RuntimeEventTag } from "./events";

/**
 * RuntimeContext: Shared by every Seq and HyperSeq created against it.
 */
export type RuntimeContext = {
  config: RuntimeConfig;
  events: RuntimeEvent[];
};

/**
 * Create a fresh runtime context.
 */
export function createRuntimeContext(config: PartialConfig = {}): RuntimeContext {
  return {
    config: mergeConfigs(config),
    events: [],
  };
}

let sharedContext: RuntimeContext = createRuntimeContext();

/**
 * The context used when a caller does not pass one.
 */
export function defaultContext(): RuntimeContext {
  return sharedContext;
}

/**
 * Replace the default context (for testing).
 */
export function resetDefaultContext(config: PartialConfig = {}): RuntimeContext {
  sharedContext = createRuntimeContext(config);
  return sharedContext;
}

export function logEvent(ctx: RuntimeContext, event: EventInput): void {
  if (!ctx.config.logging) return;
  ctx.events.push({ ...event, timestamp: Date.now() });
  const overflow = ctx.events.length - ctx.config.maxEvents;
  if (overflow > 0) {
    ctx.events.splice(0, overflow);
  }
}

export function eventsOfTag<T extends RuntimeEventTag>(ctx: RuntimeContext, tag: T): EventOf<T>[] {
  return ctx.events.filter((e): e is EventOf<T> => e.tag === tag);
}

export function clearEvents(ctx: RuntimeContext): void {
  ctx.events.length = 0;
}
