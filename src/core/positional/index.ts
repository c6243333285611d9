// src/core/positional/index.ts

export { list, listOf, listFromIterator, range, reifyListTo, reifyListAll, listIterator } from "./list";
export {
  newArray,
  freshSlots,
  reifyArrayTo,
  reifyArrayAll,
  arrayIterator,
  detachedIterator,
  autovivify,
  pushValues,
  unshiftValues,
  pop,
  shift,
  spliceValues,
} from "./array";
export { toSlip, slip, empty } from "./slip";
export {
  elems,
  elements,
  slotAt,
  index,
  assignAt,
  reverse,
  rotate,
  values,
  hasPending,
  isInfinite,
} from "./ops";
