// src/core/config/index.ts
// Configuration system exports

export {
  type HyperConfig,
  type RuntimeConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
