// src/core/config/config.ts
// Configuration system for chefscript runs

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type RuntimeConfig = {
  /** Maximum instructions executed per run; 0 means unlimited */
  maxSteps: number;
  /** Maximum nesting of "Serve with" calls */
  maxCallDepth: number;
  /** Seed for "Mix ... well"; unset means Math.random */
  seed?: number;
};

export type TraceConfig = {
  /** Emit a trace event for every executed instruction */
  steps: boolean;
};

export type ChefConfig = {
  runtime: RuntimeConfig;
  trace: TraceConfig;
};

export type ConfigOverrides = {
  runtime?: Partial<RuntimeConfig>;
  trace?: Partial<TraceConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  maxSteps: 0,
  maxCallDepth: 1000,
};

export const DEFAULT_TRACE_CONFIG: TraceConfig = {
  steps: false,
};

export const DEFAULT_CONFIG: ChefConfig = {
  runtime: DEFAULT_RUNTIME_CONFIG,
  trace: DEFAULT_TRACE_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["chefscript.config.json", "chefscript.config.yaml", "chefscript.config.yml"];

// =========================================================================
// Value helpers
// =========================================================================

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

function intFrom(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^-?\d+$/.test(raw.trim())) return undefined;
  return parseInt(raw, 10);
}

function boolFrom(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  return undefined;
}

/** First of `keys` holding a number (camelCase or snake_case spellings). */
function pickNumber(obj: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "number" && Number.isFinite(v)) return v;
  }
  return undefined;
}

function pickBoolean(obj: Record<string, unknown>, ...keys: string[]): boolean | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "boolean") return v;
  }
  return undefined;
}

/** Drop undefined entries so spreading never erases a default. */
function defined<T extends Record<string, unknown>>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in obj) {
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "CHEF", env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  return {
    runtime: defined({
      maxSteps: intFrom(env[`${prefix}_MAX_STEPS`]),
      maxCallDepth: intFrom(env[`${prefix}_MAX_CALL_DEPTH`]),
      seed: intFrom(env[`${prefix}_SEED`]),
    }),
    trace: defined({
      steps: boolFrom(env[`${prefix}_TRACE_STEPS`]),
    }),
  };
}

/**
 * Create configuration overrides from a plain object (e.g., from parsed JSON/YAML).
 */
export function configFromObject(data: Record<string, unknown>): ConfigOverrides {
  const runtime = isRecord(data.runtime) ? data.runtime : {};
  const trace = isRecord(data.trace) ? data.trace : {};

  return {
    runtime: defined({
      maxSteps: pickNumber(runtime, "maxSteps", "max_steps"),
      maxCallDepth: pickNumber(runtime, "maxCallDepth", "max_call_depth"),
      seed: pickNumber(runtime, "seed"),
    }),
    trace: defined({
      steps: pickBoolean(trace, "steps"),
    }),
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): ConfigOverrides {
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

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: ConfigOverrides[]): ChefConfig {
  const result: ChefConfig = {
    runtime: { ...DEFAULT_RUNTIME_CONFIG },
    trace: { ...DEFAULT_TRACE_CONFIG },
  };

  for (const cfg of configs) {
    if (cfg.runtime) {
      result.runtime = { ...result.runtime, ...cfg.runtime };
    }
    if (cfg.trace) {
      result.trace = { ...result.trace, ...cfg.trace };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides (CLI) > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigOverrides;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): ChefConfig {
  const layers: ConfigOverrides[] = [configFromEnv("CHEF", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const found = DEFAULT_CONFIG_FILES.map((f) => path.join(cwd, f)).find((p) => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (two-level key: value maps only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  let section: Record<string, unknown> = result;

  for (const rawLine of content.split("\n")) {
    const line = rawLine.replace(/\s+#.*$/, "");
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const colon = trimmed.indexOf(":");
    if (colon < 0) continue;
    const key = trimmed.slice(0, colon).trim();
    const raw = trimmed.slice(colon + 1).trim();
    const nested = /^\s/.test(line);

    if (!nested) section = result;
    if (raw === "") {
      const child: Record<string, unknown> = {};
      result[key] = child;
      section = child;
      continue;
    }
    section[key] = yamlScalar(raw);
  }

  return result;
}

function yamlScalar(raw: string): unknown {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (raw === "null" || raw === "~") return null;
  if (/^-?\d+$/.test(raw)) return parseInt(raw, 10);
  if (/^-?\d+\.\d+$/.test(raw)) return parseFloat(raw);
  if (/^(["']).*\1$/.test(raw)) return raw.slice(1, -1);
  return raw;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: ChefConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.runtime.maxSteps) || config.runtime.maxSteps < 0) {
    errors.push("maxSteps must be a non-negative integer (0 = unlimited)");
  }
  if (!Number.isInteger(config.runtime.maxCallDepth) || config.runtime.maxCallDepth < 1) {
    errors.push("maxCallDepth must be at least 1");
  }
  if (config.runtime.seed !== undefined && !Number.isInteger(config.runtime.seed)) {
    errors.push("seed must be an integer");
  }
  if (config.runtime.maxCallDepth > 10_000) {
    warnings.push("maxCallDepth above 10000 may overflow the JavaScript stack before the limit is reached");
  }
  if (config.trace.steps && config.runtime.maxSteps === 0) {
    warnings.push("step tracing without a step limit can produce unbounded output");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
