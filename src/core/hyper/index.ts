// src/core/hyper/index.ts

export type { WorkExecutor } from "./executor";
export { createPoolExecutor, createSerialExecutor } from "./executor";
export type { HyperOptions } from "./hyper";
export {
  hyper,
  race,
  hyperForEach,
  hyperCollect,
  hyperCache,
  hyperCollectOutcome,
} from "./hyper";
