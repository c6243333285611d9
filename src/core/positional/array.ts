// src/core/positional/array.ts
// Mutable Arrays: every slot is a Container

import type { ArrayVal, Container, Val } from "../values";
import { decont } from "../values";
import type { PullIterator } from "../iter/iterator";
import {
  IterationEnd,
  concatIterators,
  emptyIterator,
  iteratorFromArray,
  makeIterator,
  pulled,
} from "../iter/iterator";
import { box } from "../container";
import { EmptyCollectionError, IndexOutOfRangeError, InfiniteLengthError } from "../errors";

// ─────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────

export function newArray(): ArrayVal {
  return { tag: "Array", slots: [], infinite: false };
}

/**
 * Fresh Containers for a batch of values. Source Containers are read
 * through, never reused.
 */
export function freshSlots(values: readonly Val[]): Container[] {
  return values.map((v) => box(decont(v)));
}

// ─────────────────────────────────────────────────────────────────
// Reification
// ─────────────────────────────────────────────────────────────────

export function reifyArrayTo(a: ArrayVal, i: number): boolean {
  while (a.slots.length <= i && a.pending) {
    const next = a.pending.pull();
    if (next.tag === "End") {
      a.pending = undefined;
      a.infinite = false;
      break;
    }
    a.slots.push(box(decont(next.value)));
  }
  return i < a.slots.length;
}

export function reifyArrayAll(a: ArrayVal, op: string): Container[] {
  if (a.infinite) {
    throw new InfiniteLengthError(op, "Array");
  }
  while (a.pending) {
    const next = a.pending.pull();
    if (next.tag === "End") {
      a.pending = undefined;
    } else {
      a.slots.push(box(decont(next.value)));
    }
  }
  return a.slots;
}

/**
 * Iterate the slot Containers themselves, so loop bodies can assign
 * through them.
 */
export function arrayIterator(a: ArrayVal): PullIterator {
  let i = 0;
  return makeIterator(() => {
    if (!reifyArrayTo(a, i)) return IterationEnd;
    return pulled(a.slots[i++]);
  });
}

/**
 * Iterator over the Array's current contents that no longer reads the
 * Array itself: the reified slots as they are now, then the old producer.
 * Lets an Array be reassigned from itself.
 */
export function detachedIterator(a: ArrayVal): PullIterator {
  const rest = a.pending ?? emptyIterator();
  return concatIterators([iteratorFromArray(a.slots), rest].values());
}

// ─────────────────────────────────────────────────────────────────
// Slot access
// ─────────────────────────────────────────────────────────────────

/**
 * Container at `i`, growing the Array with empty Containers as needed.
 */
export function autovivify(a: ArrayVal, i: number): Container {
  if (!Number.isInteger(i) || i < 0) {
    throw new IndexOutOfRangeError(i, a.slots.length);
  }
  if (!reifyArrayTo(a, i)) {
    while (a.slots.length <= i) {
      a.slots.push(box());
    }
  }
  const slot = a.slots[i];
  if (slot === undefined) {
    throw new IndexOutOfRangeError(i, a.slots.length);
  }
  return slot;
}

// ─────────────────────────────────────────────────────────────────
// Structural mutation (values already resolved by the binder)
// ─────────────────────────────────────────────────────────────────

export function pushValues(a: ArrayVal, values: readonly Val[]): ArrayVal {
  a.slots = reifyArrayAll(a, "push onto").concat(freshSlots(values));
  return a;
}

export function unshiftValues(a: ArrayVal, values: readonly Val[]): ArrayVal {
  a.slots = freshSlots(values).concat(a.slots);
  return a;
}

export function pop(a: ArrayVal): Val {
  reifyArrayAll(a, "pop from");
  const slot = a.slots.pop();
  if (slot === undefined) {
    throw new EmptyCollectionError("pop", "Array");
  }
  return slot.value;
}

export function shift(a: ArrayVal): Val {
  if (!reifyArrayTo(a, 0)) {
    throw new EmptyCollectionError("shift", "Array");
  }
  const slot = a.slots.shift();
  if (slot === undefined) {
    throw new EmptyCollectionError("shift", "Array");
  }
  return slot.value;
}

/**
 * Remove `count` elements at `start` and insert `replacement` there.
 * `start` is clamped to the Array bounds; returns the removed values.
 */
export function spliceValues(
  a: ArrayVal,
  start: number,
  count: number,
  replacement: readonly Val[]
): Val[] {
  const slots = reifyArrayAll(a, "splice");
  const from = Math.min(Math.max(0, Math.trunc(start)), slots.length);
  const to = Math.min(from + Math.max(0, Math.trunc(count)), slots.length);
  const removed = slots.slice(from, to);
  a.slots = slots.slice(0, from).concat(freshSlots(replacement), slots.slice(to));
  return removed.map((slot) => slot.value);
}
