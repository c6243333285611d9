import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(
  failureOrReason: Failure | FailureReason,
  message = "",
  meta: OutcomeMeta = {}
): Fail {
  if (typeof failureOrReason === "string") {
    return fail(failure(failureOrReason, message), meta);
  }
  return fail(failureOrReason, meta);
}
