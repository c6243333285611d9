// src/core/errors.ts
// Runtime error hierarchy. Every error carries a coded diagnostic and
// converts to a structured Failure for the Outcome ADT.

import type { Diagnostic } from "../outcome/diagnostic";
import type { Failure, FailureReason } from "../outcome/failure";
import { failure } from "../outcome/failure";
import { makeDiagnostic } from "../outcome/codes";
import type { SeqState } from "./values";

export class ListRuntimeError extends Error {
  constructor(
    message: string,
    public readonly reason: FailureReason,
    public readonly diagnostic: Diagnostic
  ) {
    super(message);
    this.name = "ListRuntimeError";
  }

  get code(): string {
    return this.diagnostic.code;
  }

  toFailure(): Failure {
    return failure(this.reason, this.message, {
      diagnostics: [this.diagnostic],
      context: this.diagnostic.data,
    });
  }
}

export class ImmutableAssignmentError extends ListRuntimeError {
  constructor(public readonly target: string) {
    const diag = makeDiagnostic("E0100", { target });
    super(diag.message, "immutable-assignment", diag);
    this.name = "ImmutableAssignmentError";
  }
}

export class IndexOutOfRangeError extends ListRuntimeError {
  constructor(
    public readonly index: number,
    public readonly elems: number
  ) {
    const diag = makeDiagnostic("E0200", { index, elems });
    super(diag.message, "index-out-of-range", diag);
    this.name = "IndexOutOfRangeError";
  }
}

export class EmptyCollectionError extends ListRuntimeError {
  constructor(op: string, kind: string) {
    const diag = makeDiagnostic("E0201", { op, kind });
    super(diag.message, "empty-collection", diag);
    this.name = "EmptyCollectionError";
  }
}

export class InfiniteLengthError extends ListRuntimeError {
  constructor(op: string, kind: string) {
    const diag = makeDiagnostic("E0202", { op, kind });
    super(diag.message, "infinite-length", diag);
    this.name = "InfiniteLengthError";
  }
}

export class NotPositionalError extends ListRuntimeError {
  constructor(public readonly type: string) {
    const diag = makeDiagnostic("E0203", { type });
    super(diag.message, "not-positional", diag);
    this.name = "NotPositionalError";
  }
}

export class AlreadyConsumedError extends ListRuntimeError {
  constructor(
    public readonly seqId: number,
    public readonly state: SeqState
  ) {
    const diag = makeDiagnostic("E0300", { id: seqId, state });
    super(diag.message, "already-consumed", diag);
    this.name = "AlreadyConsumedError";
  }
}

/**
 * UnitFailure: One failed work unit of a parallel run.
 */
export type UnitFailure = {
  unit: number;
  /** Logical index of the unit's first element */
  start: number;
  error: unknown;
};

export class WorkUnitFailureError extends ListRuntimeError {
  constructor(public readonly failures: UnitFailure[]) {
    const diag = makeDiagnostic("E0400", { count: failures.length });
    super(diag.message, "work-unit-failure", diag);
    this.name = "WorkUnitFailureError";
  }

  override toFailure(): Failure {
    const first = this.failures[0];
    const firstMessage = first === undefined ? undefined : describeError(first.error);
    return failure(this.reason, this.message, {
      diagnostics: [this.diagnostic],
      context: {
        units: this.failures.map((f) => f.unit),
        starts: this.failures.map((f) => f.start),
      },
      cause: firstMessage === undefined ? undefined : failure("internal-error", firstMessage),
    });
  }
}

export class CancelledError extends ListRuntimeError {
  constructor() {
    const diag = makeDiagnostic("E0401");
    super(diag.message, "cancelled", diag);
    this.name = "CancelledError";
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
