// src/core/runtime/index.ts

export type { RuntimeEvent, RuntimeEventTag, EventOf, EventInput } from "./events";
export type { RuntimeContext } from "./context";
export {
  createRuntimeContext,
  defaultContext,
  resetDefaultContext,
  logEvent,
  eventsOfTag,
  clearEvents,
} from "./context";
