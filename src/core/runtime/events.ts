// src/core/runtime/events.ts
// Structured runtime events recorded on a RuntimeContext

/**
 * RuntimeEvent: Events logged while sequences are consumed and arrays assigned.
 */
export type RuntimeEvent =
  | { tag: "SeqCreated"; seqId: number; lazy: boolean; timestamp: number }
  | { tag: "SeqExhausted"; seqId: number; pulled: number; timestamp: number }
  | { tag: "SeqCached"; seqId: number; elems: number; timestamp: number }
  | { tag: "SeqRejected"; seqId: number; op: "pull" | "cache" | "iterate"; state: string; timestamp: number }
  | { tag: "ArrayAssigned"; mode: "eager" | "lazy"; elems: number; timestamp: number }
  | { tag: "HyperUnitStarted"; seqId: number; unit: number; start: number; size: number; timestamp: number }
  | { tag: "HyperUnitCompleted"; seqId: number; unit: number; timestamp: number }
  | { tag: "HyperUnitFailed"; seqId: number; unit: number; message: string; timestamp: number }
  | { tag: "HyperCancelled"; seqId: number; issued: number; timestamp: number };

export type RuntimeEventTag = RuntimeEvent["tag"];

export type EventOf<T extends RuntimeEventTag> = Extract<RuntimeEvent, { tag: T }>;

type OmitTimestamp<E> = E extends RuntimeEvent ? Omit<E, "timestamp"> : never;

/**
 * EventInput: An event as handed to logEvent, before it is stamped.
 */
export type EventInput = OmitTimestamp<RuntimeEvent>;
