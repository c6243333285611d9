// src/core/binder/index.ts

export type { ArgSyntax, Operands, Resolution } from "./singleArg";
export {
  single,
  comma,
  toSyntax,
  resolveArguments,
  resolutionIsLazy,
  resolutionIsInfinite,
  resolutionIterator,
  argumentIterator,
  argumentValues,
  argumentCount,
} from "./singleArg";
export { assignResolved, assignArray, assignArrayFrom } from "./assign";
export { makeList, makeArray, push, unshift, splice, forEachArgument } from "./construct";
export type { BindOptions } from "./bind";
export { bindToArrayParam } from "./bind";
