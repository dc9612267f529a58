import { ErrorCode } from "@logfan/shared";
import { ConfigurationError } from "../errors/types.js";

/**
 * Log severity levels in ascending order of importance.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "critical";

/**
 * Coarse category a level maps to for sinks that only know three kinds of
 * event (platform event log, e-mail priority).
 */
export type LogCategory = "informational" | "warning" | "error";

/**
 * All levels, lowest first.
 */
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "critical"];

/**
 * Numeric priority for log levels (higher = more severe).
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  critical: 4,
};

/**
 * Three-character code written into every formatted line.
 */
export const LOG_LEVEL_SHORT_CODES: Record<LogLevel, string> = {
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
  critical: "CRT",
};

/**
 * Display names, as stored in the tabular store's Level column.
 */
export const LOG_LEVEL_LABELS: Record<LogLevel, string> = {
  debug: "Debug",
  info: "Info",
  warn: "Warn",
  error: "Error",
  critical: "Critical",
};

export const LOG_LEVEL_CATEGORIES: Record<LogLevel, LogCategory> = {
  debug: "informational",
  info: "informational",
  warn: "warning",
  error: "error",
  critical: "error",
};

export function rank(level: LogLevel): number {
  return LOG_LEVEL_PRIORITY[level];
}

export function shortCode(level: LogLevel): string {
  return LOG_LEVEL_SHORT_CODES[level];
}

export function category(level: LogLevel): LogCategory {
  return LOG_LEVEL_CATEGORIES[level];
}

export function levelLabel(level: LogLevel): string {
  return LOG_LEVEL_LABELS[level];
}

/**
 * Whether `level` ranks at or above `minimum`.
 */
export function isAtLeast(level: LogLevel, minimum: LogLevel): boolean {
  return rank(level) >= rank(minimum);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a level name case-insensitively. Accepts the long names and the
 * three-letter codes (`"WRN"`, `"warn"`, `"Warn"`).
 *
 * @throws ConfigurationError for anything else
 */
export function parseLogLevel(text: string): LogLevel {
  const normalized = text.trim().toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  const byCode = LOG_LEVELS.find((level) => LOG_LEVEL_SHORT_CODES[level].toLowerCase() === normalized);
  if (byCode) {
    return byCode;
  }
  throw new ConfigurationError(`Unknown log level "${text}"`, ErrorCode.INVALID_ARGUMENT, {
    context: { value: text },
  });
}
