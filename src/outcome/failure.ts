import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "immutable-assignment"
  | "index-out-of-range"
  | "empty-collection"
  | "infinite-length"
  | "already-consumed"
  | "not-positional"
  | "work-unit-failure"
  | "cancelled"
  | "internal-error"
  | `custom:${string}`;

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
    cause: opts?.cause,
  };
}
