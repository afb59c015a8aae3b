// src/core/log/logger.ts
// Leveled console logger with scoped children

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

const RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  readonly level: LogLevel;
  readonly scope: string;
  error(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

/**
 * Where formatted lines go. Defaults to the console.
 */
export interface LogWriter {
  error(line: string): void;
  warn(line: string): void;
  info(line: string): void;
  debug(line: string): void;
}

const consoleWriter: LogWriter = {
  error: line => console.error(line),
  warn: line => console.warn(line),
  info: line => console.info(line),
  debug: line => console.debug(line),
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function formatLine(scope: string, level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data, bigintSafe)}` : "";
  return `[${scope}] ${level}: ${message}${suffix}`;
}

function bigintSafe(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? `${value.toString()}n` : value;
}

export function createLogger(level: LogLevel = "warn", scope = "adt", writer: LogWriter = consoleWriter): Logger {
  const enabled = (at: Exclude<LogLevel, "silent">) => RANK[at] <= RANK[level];

  return {
    level,
    scope,
    error(message, data) {
      if (enabled("error")) writer.error(formatLine(scope, "error", message, data));
    },
    warn(message, data) {
      if (enabled("warn")) writer.warn(formatLine(scope, "warn", message, data));
    },
    info(message, data) {
      if (enabled("info")) writer.info(formatLine(scope, "info", message, data));
    },
    debug(message, data) {
      if (enabled("debug")) writer.debug(formatLine(scope, "debug", message, data));
    },
    child(childScope) {
      return createLogger(level, `${scope}:${childScope}`, writer);
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
