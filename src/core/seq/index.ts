// src/core/seq/index.ts

export type { SeqOptions } from "./seq";
export {
  freshSeqId,
  resetSeqIds,
  toSequence,
  pull,
  cache,
  toCachedList,
  takeIterator,
  lazy,
  seqState,
} from "./seq";
export { seqMap, seqGrep, seqZip, seqTake, seqSkip } from "./combinators";
