// src/core/binder/bind.ts
// Binding to an array-style parameter or variable

import type { Positional, Val } from "../values";
import { decont, isPositional, isSeq, typeName } from "../values";
import { cache } from "../seq/seq";
import { NotPositionalError } from "../errors";

/**
 * BindOptions: Only parameter binding may fall back to caching a Seq.
 */
export type BindOptions =
  | { readonly context: "variable" }
  | { readonly context: "parameter"; readonly fallback?: boolean };

/**
 * Bind a value to an array-style slot. Lists, Arrays and Slips bind as
 * themselves (binding never copies); a Container binds what it holds.
 * A Seq fails with NotPositional unless the parameter binder asks for the
 * cache fallback, in which case the cached List is bound.
 */
export function bindToArrayParam(value: Val, options: BindOptions = { context: "parameter" }): Positional {
  const target = decont(value);
  if (isPositional(target)) {
    return target;
  }
  if (isSeq(target) && options.context === "parameter" && options.fallback === true) {
    return cache(target);
  }
  throw new NotPositionalError(typeName(target));
}
