// src/index.ts
// List runtime - Public API
//
// Containers, Lists, Arrays and Slips; one-shot Seqs and their parallel
// variant; the single argument rule and flattening.

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  Atom,
  Container,
  ListVal,
  ArrayVal,
  SlipVal,
  Seq,
  SeqState,
  HyperSeq,
  HyperFn,
  Positional,
  Val,
} from "./core/values";
export {
  isContainer,
  isList,
  isArray,
  isSlip,
  isSeq,
  isHyperSeq,
  isPositional,
  isIterable,
  isLazy,
  decont,
  typeName,
} from "./core/values";
export { box, constant, fetch, store, assign } from "./core/container";

// ═══════════════════════════════════════════════════════════════════════════════
// ITERATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/iter";

// ═══════════════════════════════════════════════════════════════════════════════
// LIST / ARRAY / SLIP
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/positional";

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTRUCTION & BINDING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/binder";
export { flatten } from "./core/flatten";

// ═══════════════════════════════════════════════════════════════════════════════
// SEQUENCES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/seq";
export * from "./core/hyper";

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME, CONFIG & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/runtime";
export * from "./core/config";
export {
  ListRuntimeError,
  ImmutableAssignmentError,
  IndexOutOfRangeError,
  EmptyCollectionError,
  InfiniteLengthError,
  NotPositionalError,
  AlreadyConsumedError,
  WorkUnitFailureError,
  CancelledError,
  type UnitFailure,
} from "./core/errors";
export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export type { Failure, FailureReason } from "./outcome/failure";
export type { Diagnostic } from "./outcome/diagnostic";
export { done, fail, err, ok } from "./outcome/constructors";
export { match, mapOutcome, unwrap, unwrapOr } from "./outcome/matchers";
