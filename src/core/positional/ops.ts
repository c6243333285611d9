// src/core/positional/ops.ts
// Read-side operations shared by List, Array and Slip, dispatched on tag

import type { ListVal, Positional, Val } from "../values";
import { decont, isContainer } from "../values";
import { assign } from "../container";
import { ImmutableAssignmentError, IndexOutOfRangeError } from "../errors";
import { list, listOf, reifyListAll, reifyListTo } from "./list";
import { autovivify, reifyArrayAll, reifyArrayTo } from "./array";

function checkIndex(p: Positional, i: number): void {
  if (!Number.isInteger(i) || i < 0) {
    throw new IndexOutOfRangeError(i, knownElems(p));
  }
}

function knownElems(p: Positional): number {
  switch (p.tag) {
    case "List":
      return p.reified.length;
    case "Array":
      return p.slots.length;
    case "Slip":
      return p.list.reified.length;
  }
}

/**
 * Number of elements. Fails with InfiniteLength on an infinite List or Array.
 */
export function elems(p: Positional): number {
  return elements(p, "elems").length;
}

/**
 * Every element, fully reified: bare values or Containers as stored.
 */
export function elements(p: Positional, op = "iterate"): readonly Val[] {
  switch (p.tag) {
    case "List":
      return reifyListAll(p, op);
    case "Array":
      return reifyArrayAll(p, op);
    case "Slip":
      return reifyListAll(p.list, op);
  }
}

/**
 * The raw element at `i`: a Container or a bare value.
 * Out-of-range reads fail with IndexOutOfRange.
 */
export function slotAt(p: Positional, i: number): Val {
  checkIndex(p, i);
  switch (p.tag) {
    case "List":
    case "Slip": {
      const l = p.tag === "List" ? p : p.list;
      if (!reifyListTo(l, i)) throw new IndexOutOfRangeError(i, l.reified.length);
      return l.reified[i];
    }
    case "Array":
      if (!reifyArrayTo(p, i)) throw new IndexOutOfRangeError(i, p.slots.length);
      return p.slots[i];
  }
}

/**
 * The value at `i`, read through its Container if it has one.
 */
export function index(p: Positional, i: number): Val {
  return decont(slotAt(p, i));
}

/**
 * Assign to position `i`. Arrays grow; Lists accept only where the
 * element is itself a mutable Container.
 */
export function assignAt(p: Positional, i: number, value: Val): Val {
  if (p.tag === "Array") {
    return assign(autovivify(p, i), value);
  }
  const slot = slotAt(p, i);
  if (!isContainer(slot)) {
    throw new ImmutableAssignmentError(`element ${i} of a ${p.tag}`);
  }
  return assign(slot, value);
}

/**
 * New List in reverse order. Element identities are shared.
 */
export function reverse(p: Positional): ListVal {
  return listOf(elements(p, "reverse").slice().reverse());
}

/**
 * New List rotated left by `n` (right for negative `n`).
 */
export function rotate(p: Positional, n = 1): ListVal {
  const items = elements(p, "rotate");
  if (items.length === 0) return list();
  const k = ((Math.trunc(n) % items.length) + items.length) % items.length;
  return listOf(items.slice(k).concat(items.slice(0, k)));
}

/**
 * Decontainerized values as a plain array.
 */
export function values(p: Positional): Val[] {
  return elements(p, "list the values of").map(decont);
}

/**
 * Whether unreified input remains.
 */
export function hasPending(p: Positional): boolean {
  switch (p.tag) {
    case "List":
      return p.pending !== undefined;
    case "Array":
      return p.pending !== undefined;
    case "Slip":
      return p.list.pending !== undefined;
  }
}

export function isInfinite(p: Positional): boolean {
  switch (p.tag) {
    case "List":
      return p.infinite;
    case "Array":
      return p.infinite;
    case "Slip":
      return p.list.infinite;
  }
}
