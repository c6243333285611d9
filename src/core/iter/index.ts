// src/core/iter/index.ts

export type { Pulled, PullIterator } from "./iterator";
export {
  IterationEnd,
  pulled,
  makeIterator,
  emptyIterator,
  iteratorFromArray,
  iteratorFromIterable,
  concatIterators,
  drain,
} from "./iterator";
export { iteratorOf, spliceSlips } from "./iterate";
