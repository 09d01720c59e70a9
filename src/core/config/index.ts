// src/core/config/index.ts
// Configuration system exports

export {
  type RuntimeConfig,
  type TraceConfig,
  type ChefConfig,
  type ConfigOverrides,
  type ConfigValidation,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_TRACE_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
