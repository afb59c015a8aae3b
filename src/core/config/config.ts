// src/core/config/config.ts
// Configuration for the ADT engine: defaults, environment, JSON file, overrides

import * as fs from "fs";
import * as path from "path";
import { type LogLevel, isLogLevel } from "../log/logger";

// =========================================================================
// Configuration Types
// =========================================================================

export type CompilerConfig = {
  /** Reuse decision tables across call sites with the same clause shape */
  cacheEnabled: boolean;
  /** Upper bound on cached tables; 0 means unbounded */
  maxCacheEntries: number;
  /** Log clauses that can never run */
  warnUnreachable: boolean;
};

export type EventsConfig = {
  /** Deliver events to subscribers */
  enabled: boolean;
};

export type LoggingConfig = {
  level: LogLevel;
};

export type AdtConfig = {
  compiler: CompilerConfig;
  events: EventsConfig;
  logging: LoggingConfig;
};

export type PartialAdtConfig = {
  compiler?: Partial<CompilerConfig>;
  events?: Partial<EventsConfig>;
  logging?: Partial<LoggingConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_COMPILER_CONFIG: CompilerConfig = {
  cacheEnabled: true,
  maxCacheEntries: 0,
  warnUnreachable: true,
};

export const DEFAULT_EVENTS_CONFIG: EventsConfig = {
  enabled: true,
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: "warn",
};

export const DEFAULT_CONFIG: AdtConfig = {
  compiler: DEFAULT_COMPILER_CONFIG,
  events: DEFAULT_EVENTS_CONFIG,
  logging: DEFAULT_LOGGING_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["alembic.config.json", ".alembicrc.json"];

// =========================================================================
// Value readers
// =========================================================================

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no") return false;
  return undefined;
}

function parseCount(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isInteger(n) ? n : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSection(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = data[key];
  return isRecord(section) ? section : {};
}

function readBool(section: Record<string, unknown>, ...keys: string[]): boolean | undefined {
  for (const key of keys) {
    const v = section[key];
    if (typeof v === "boolean") return v;
  }
  return undefined;
}

function readNumber(section: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const v = section[key];
    if (typeof v === "number") return v;
  }
  return undefined;
}

function readLevel(section: Record<string, unknown>, key: string): LogLevel | undefined {
  const v = section[key];
  return typeof v === "string" && isLogLevel(v) ? v : undefined;
}

function compilerPart(
  cacheEnabled: boolean | undefined,
  maxCacheEntries: number | undefined,
  warnUnreachable: boolean | undefined
): Partial<CompilerConfig> {
  const part: Partial<CompilerConfig> = {};
  if (cacheEnabled !== undefined) part.cacheEnabled = cacheEnabled;
  if (maxCacheEntries !== undefined) part.maxCacheEntries = maxCacheEntries;
  if (warnUnreachable !== undefined) part.warnUnreachable = warnUnreachable;
  return part;
}

function eventsPart(enabled: boolean | undefined): Partial<EventsConfig> {
  return enabled === undefined ? {} : { enabled };
}

function loggingPart(level: LogLevel | undefined): Partial<LoggingConfig> {
  return level === undefined ? {} : { level };
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 * Unset or unparseable variables fall back to defaults.
 */
export function configFromEnv(prefix = "ADT", env: NodeJS.ProcessEnv = process.env): AdtConfig {
  const level = env[`${prefix}_LOG_LEVEL`];

  return mergeConfigs({
    compiler: compilerPart(
      parseBool(env[`${prefix}_CACHE_ENABLED`]),
      parseCount(env[`${prefix}_MAX_CACHE_ENTRIES`]),
      parseBool(env[`${prefix}_WARN_UNREACHABLE`])
    ),
    events: eventsPart(parseBool(env[`${prefix}_EVENTS_ENABLED`])),
    logging: loggingPart(level !== undefined && isLogLevel(level) ? level : undefined),
  });
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): PartialAdtConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Read a plain object (e.g. parsed JSON). Accepts camelCase and snake_case keys;
 * keys of the wrong type are ignored.
 */
export function configFromObject(data: Record<string, unknown>): PartialAdtConfig {
  const compiler = readSection(data, "compiler");
  const events = readSection(data, "events");
  const logging = readSection(data, "logging");

  return {
    compiler: compilerPart(
      readBool(compiler, "cacheEnabled", "cache_enabled"),
      readNumber(compiler, "maxCacheEntries", "max_cache_entries"),
      readBool(compiler, "warnUnreachable", "warn_unreachable")
    ),
    events: eventsPart(readBool(events, "enabled")),
    logging: loggingPart(readLevel(logging, "level")),
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialAdtConfig[]): AdtConfig {
  const result: AdtConfig = {
    compiler: { ...DEFAULT_CONFIG.compiler },
    events: { ...DEFAULT_CONFIG.events },
    logging: { ...DEFAULT_CONFIG.logging },
  };

  for (const cfg of configs) {
    if (cfg.compiler) {
      result.compiler = { ...result.compiler, ...cfg.compiler };
    }
    if (cfg.events) {
      result.events = { ...result.events, ...cfg.events };
    }
    if (cfg.logging) {
      result.logging = { ...result.logging, ...cfg.logging };
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
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PartialAdtConfig;
}): AdtConfig {
  let config = configFromEnv("ADT", options?.env ?? process.env);

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const candidate = path.join(cwd, name);
      if (fs.existsSync(candidate)) {
        config = mergeConfigs(config, configFromFile(candidate));
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
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: AdtConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.compiler.maxCacheEntries) || config.compiler.maxCacheEntries < 0) {
    errors.push(`compiler.maxCacheEntries must be a non-negative integer, got ${config.compiler.maxCacheEntries}`);
  }
  if (!config.compiler.cacheEnabled && config.compiler.maxCacheEntries > 0) {
    warnings.push("compiler.maxCacheEntries has no effect while the cache is disabled");
  }
  if (!isLogLevel(config.logging.level)) {
    errors.push(`logging.level must be one of silent, error, warn, info, debug`);
  }
  if (!config.events.enabled) {
    warnings.push("events are disabled; subscribers will receive nothing");
  }

  return { valid: errors.length === 0, errors, warnings };
}
