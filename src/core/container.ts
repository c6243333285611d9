// src/core/container.ts
// Containers: the single unit of assignability

import type { Container, Val } from "./values";
import { isContainer, typeName } from "./values";
import { ImmutableAssignmentError } from "./errors";

/**
 * Box a value in a fresh Container. Boxing is always explicit: nothing in
 * the runtime wraps a value as a side effect of storing it, except Array
 * slot allocation.
 */
export function box(value: Val = undefined, opts: { mutable?: boolean } = {}): Container {
  return { tag: "Container", value, mutable: opts.mutable ?? true };
}

/**
 * Box a value in a Container that rejects assignment.
 */
export function constant(value: Val): Container {
  return box(value, { mutable: false });
}

export function fetch(c: Container): Val {
  return c.value;
}

export function store(c: Container, value: Val): Val {
  if (!c.mutable) {
    throw new ImmutableAssignmentError(`immutable Container of ${typeName(c.value)}`);
  }
  c.value = value;
  return value;
}

/**
 * Assign through whatever a slot holds. Only a mutable Container accepts.
 */
export function assign(target: Val, value: Val): Val {
  if (isContainer(target)) {
    return store(target, value);
  }
  throw new ImmutableAssignmentError(typeName(target));
}
