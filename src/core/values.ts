// src/core/values.ts
// Value model: atoms plus the tagged container, positional and sequence variants

import type { PullIterator } from "./iter/iterator";
import type { RuntimeContext } from "./runtime/context";
import type { WorkExecutor } from "./hyper/executor";

// ─────────────────────────────────────────────────────────────────
// Atoms
// ─────────────────────────────────────────────────────────────────

/**
 * Atom: A bare, immutable scalar. `undefined` is Nil, the content of an
 * empty Container.
 */
export type Atom = string | number | bigint | boolean | null | undefined;

// ─────────────────────────────────────────────────────────────────
// Variants
// ─────────────────────────────────────────────────────────────────

/**
 * Container: One assignable slot. The only mutation surface in the model.
 */
export type Container = {
  readonly tag: "Container";
  value: Val;
  readonly mutable: boolean;
};

/**
 * ListVal: Immutable ordered sequence, possibly lazy and possibly infinite.
 *
 * `reified` only ever grows (by pulling from `pending`); an element, once
 * reified, keeps its identity for the life of the List.
 */
export type ListVal = {
  readonly tag: "List";
  readonly reified: Val[];
  pending?: PullIterator;
  readonly infinite: boolean;
  /** Built from a lazy producer: eager assignment keeps it lazy */
  readonly lazy: boolean;
};

/**
 * ArrayVal: Mutable ordered sequence. Every slot is a Container.
 */
export type ArrayVal = {
  readonly tag: "Array";
  slots: Container[];
  pending?: PullIterator;
  infinite: boolean;
};

/**
 * SlipVal: Marker asking the enclosing constructor to splice `list` in place.
 */
export type SlipVal = {
  readonly tag: "Slip";
  readonly list: ListVal;
};

export type SeqState = "Fresh" | "Consuming" | "Cached" | "Consumed";

/**
 * Seq: One-shot façade over a PullIterator.
 *
 * `source` is dropped as soon as the Seq leaves the Fresh/Consuming states,
 * so a consumed Seq holds no reference to its producer.
 */
export type Seq = {
  readonly tag: "Seq";
  readonly id: number;
  state: SeqState;
  /** Values handed out by pull so far */
  pulled: number;
  source?: PullIterator;
  cached?: ListVal;
  /** Marked lazy: eager assignment stores it as a lazily-materializing list */
  readonly lazy: boolean;
  readonly ctx: RuntimeContext;
};

export type HyperFn = (value: Val, index: number) => Val | Promise<Val>;

/**
 * HyperSeq: Seq variant whose elements may be produced concurrently.
 */
export type HyperSeq = {
  readonly tag: "HyperSeq";
  readonly id: number;
  state: SeqState;
  source?: PullIterator;
  cached?: Promise<ListVal>;
  readonly fn: HyperFn;
  /** false relaxes collection order to arrival order */
  readonly ordered: boolean;
  readonly batch: number;
  readonly executor: WorkExecutor;
  readonly signal?: AbortSignal;
  readonly ctx: RuntimeContext;
};

export type Positional = ListVal | ArrayVal | SlipVal;

export type Val = Atom | Container | ListVal | ArrayVal | SlipVal | Seq | HyperSeq;

export type Tagged = Exclude<Val, Atom>;

// ─────────────────────────────────────────────────────────────────
// Guards
// ─────────────────────────────────────────────────────────────────

export function isTagged(v: Val): v is Tagged {
  return typeof v === "object" && v !== null;
}

export function isContainer(v: Val): v is Container {
  return isTagged(v) && v.tag === "Container";
}

export function isList(v: Val): v is ListVal {
  return isTagged(v) && v.tag === "List";
}

export function isArray(v: Val): v is ArrayVal {
  return isTagged(v) && v.tag === "Array";
}

export function isSlip(v: Val): v is SlipVal {
  return isTagged(v) && v.tag === "Slip";
}

export function isSeq(v: Val): v is Seq {
  return isTagged(v) && v.tag === "Seq";
}

export function isHyperSeq(v: Val): v is HyperSeq {
  return isTagged(v) && v.tag === "HyperSeq";
}

/**
 * Positional capability: indexable, bindable to an array parameter.
 */
export function isPositional(v: Val): v is Positional {
  return isList(v) || isArray(v) || isSlip(v);
}

/**
 * Iterable capability: anything a flattening traversal may recurse into.
 */
export function isIterable(v: Val): v is Positional | Seq | HyperSeq {
  return isPositional(v) || isSeq(v) || isHyperSeq(v);
}

/**
 * Read through one level of Container.
 */
export function decont(v: Val): Val {
  return isContainer(v) ? v.value : v;
}

/**
 * Whether eager assignment must store the value lazily instead of draining it.
 */
export function isLazy(v: Val): boolean {
  if (!isTagged(v)) return false;
  switch (v.tag) {
    case "List":
      return v.lazy || v.infinite;
    case "Slip":
      return v.list.lazy || v.list.infinite;
    case "Array":
      return v.infinite;
    case "Seq":
      return v.lazy;
    case "Container":
    case "HyperSeq":
      return false;
  }
}

export function typeName(v: Val): string {
  if (isTagged(v)) return v.tag;
  if (v === undefined || v === null) return "Nil";
  if (typeof v === "string") return "Str";
  if (typeof v === "boolean") return "Bool";
  if (typeof v === "bigint") return "Int";
  return Number.isInteger(v) ? "Int" : "Num";
}
