// src/core/config/config.ts
// Configuration for the list runtime: parallel iteration defaults and the event log

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type HyperConfig = {
  /** Elements handed to one work unit */
  batch: number;
  /** Maximum work units in flight */
  degree: number;
};

export type RuntimeConfig = {
  hyper: HyperConfig;
  /** Record runtime events on the context */
  logging: boolean;
  /** Oldest events are dropped past this count */
  maxEvents: number;
};

// =========================================================================
// Default Configuration
// =========================================================================

const DEFAULT_HYPER_CONFIG: HyperConfig = {
  batch: 64,
  degree: 4,
};

export const DEFAULT_CONFIG: RuntimeConfig = {
  hyper: DEFAULT_HYPER_CONFIG,
  logging: true,
  maxEvents: 10_000,
};

// =========================================================================
// Configuration Loading
// =========================================================================

function intFromEnv(name: string): number | undefined {
  const parsed = parseInt(process.env[name] || "", 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function boolFromEnv(name: string): boolean | undefined {
  const raw = process.env[name]?.trim().toLowerCase();
  if (raw === "1" || raw === "true" || raw === "yes") return true;
  if (raw === "0" || raw === "false" || raw === "no") return false;
  return undefined;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "LISTRT"): RuntimeConfig {
  return {
    hyper: {
      batch: intFromEnv(`${prefix}_HYPER_BATCH`) ?? DEFAULT_HYPER_CONFIG.batch,
      degree: intFromEnv(`${prefix}_HYPER_DEGREE`) ?? DEFAULT_HYPER_CONFIG.degree,
    },
    logging: boolFromEnv(`${prefix}_LOGGING`) ?? DEFAULT_CONFIG.logging,
    maxEvents: intFromEnv(`${prefix}_MAX_EVENTS`) ?? DEFAULT_CONFIG.maxEvents,
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): RuntimeConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must hold an object: ${filePath}`);
  }
  return configFromObject(data);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function pickNumber(data: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const v = data[key];
    if (typeof v === "number") return v;
  }
  return undefined;
}

function pickBoolean(data: Record<string, unknown>, ...keys: string[]): boolean | undefined {
  for (const key of keys) {
    const v = data[key];
    if (typeof v === "boolean") return v;
  }
  return undefined;
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): RuntimeConfig {
  const hyperData = isRecord(data.hyper) ? data.hyper : {};

  return {
    hyper: {
      batch: pickNumber(hyperData, "batch") ?? DEFAULT_HYPER_CONFIG.batch,
      degree: pickNumber(hyperData, "degree") ?? DEFAULT_HYPER_CONFIG.degree,
    },
    logging: pickBoolean(data, "logging") ?? DEFAULT_CONFIG.logging,
    maxEvents: pickNumber(data, "maxEvents", "max_events") ?? DEFAULT_CONFIG.maxEvents,
  };
}

export type PartialConfig = {
  hyper?: Partial<HyperConfig>;
  logging?: boolean;
  maxEvents?: number;
};

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): RuntimeConfig {
  const result: RuntimeConfig = { ...DEFAULT_CONFIG, hyper: { ...DEFAULT_HYPER_CONFIG } };

  for (const cfg of configs) {
    if (cfg.hyper) {
      result.hyper = { ...result.hyper, ...cfg.hyper };
    }
    if (cfg.logging !== undefined) {
      result.logging = cfg.logging;
    }
    if (cfg.maxEvents !== undefined) {
      result.maxEvents = cfg.maxEvents;
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
}): RuntimeConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const defaultPaths = ["listrt.config.json", "listrt.config.yaml", "listrt.config.yml"];
    for (const p of defaultPaths) {
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

type YamlScalar = string | number | boolean | null;
type YamlObject = { [key: string]: YamlScalar | YamlObject };

function parseYamlScalar(value: string): YamlScalar {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

export function parseSimpleYaml(content: string): YamlObject {
  const result: YamlObject = {};
  const stack: Array<{ obj: YamlObject; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    let top = stack[stack.length - 1];
    while (stack.length > 1 && top !== undefined && top.indent >= indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }
    if (top === undefined) continue;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: YamlObject = {};
      top.obj[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      top.obj[key] = parseYamlScalar(value);
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: RuntimeConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.hyper.batch) || config.hyper.batch < 1) {
    errors.push("hyper.batch must be a positive integer");
  }
  if (!Number.isInteger(config.hyper.degree) || config.hyper.degree < 1) {
    errors.push("hyper.degree must be a positive integer");
  }
  if (config.maxEvents < 0) {
    errors.push("maxEvents must not be negative");
  }
  if (config.hyper.degree === 1) {
    warnings.push("hyper.degree is 1: parallel iteration runs one unit at a time");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
