// src/core/positional/slip.ts
// Slips: splice-in-place markers

import type { ListVal, SlipVal, Val } from "../values";
import { list } from "./list";

export function toSlip(l: ListVal): SlipVal {
  return { tag: "Slip", list: l };
}

export function slip(...values: Val[]): SlipVal {
  return toSlip(list(...values));
}

/**
 * The empty Slip: splices to nothing.
 */
export function empty(): SlipVal {
  return slip();
}
