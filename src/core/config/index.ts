// src/core/config/index.ts
// Configuration system exports

export {
  type CompilerConfig,
  type EventsConfig,
  type LoggingConfig,
  type AdtConfig,
  type PartialAdtConfig,
  type ConfigValidation,
  DEFAULT_COMPILER_CONFIG,
  DEFAULT_EVENTS_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
