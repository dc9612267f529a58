import { getLoggingConfig, type LoggingConfig } from "../config/logging.config.js";
import { ConsoleDestination } from "./destinations/console.js";
import { FileDestination } from "./destinations/file.js";
import type { LineStream } from "./destinations/stream.js";
import { Logger } from "./logger.js";
import type { LoggerOptions } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions extends Omit<LoggerOptions, "enabled" | "timeFormat" | "concurrent" | "historyCapacity"> {
  /** Console output stream (default: process.stdout) */
  stream?: LineStream;
}

/**
 * Build a Logger from a LoggingConfig: settings, history, and the console
 * and file destinations the config turns on (ids `console` and `file`).
 *
 * The console destination is skipped when the output is not a terminal.
 *
 * @example
 * ```typescript
 * // Preset for NODE_ENV
 * const logger = createLogger();
 *
 * // Preset plus LOGFAN_* variables
 * const logger = createLogger(loadLoggingConfig());
 *
 * // Files only, archived every 10,000 lines
 * const logger = createLogger(createLoggingConfig({
 *   console: { enabled: false, level: 'info' },
 *   file: { enabled: true, directory: './logs', level: 'info', maxLines: 10_000, maxBytes: 0 },
 * }));
 * ```
 */
export function createLogger(
  config: LoggingConfig = getLoggingConfig(),
  options: CreateLoggerOptions = {}
): Logger {
  const { stream, ...loggerOptions } = options;
  const logger = new Logger({
    ...loggerOptions,
    enabled: config.enabled,
    timeFormat: config.timeFormat,
    concurrent: config.concurrent,
    historyCapacity: config.historyCapacity > 0 ? config.historyCapacity : undefined,
  });

  const output = stream ?? process.stdout;
  if (config.console.enabled && output.isTTY === true) {
    logger.addDestination(
      new ConsoleDestination({ id: "console", minimumLevel: config.console.level, stream: output })
    );
  }

  if (config.file.enabled) {
    logger.addDestination(
      new FileDestination({
        id: "file",
        directory: config.file.directory,
        fileName: config.file.fileName,
        minimumLevel: config.file.level,
        maxLines: config.file.maxLines,
        maxBytes: config.file.maxBytes,
      })
    );
  }

  return logger;
}

let sharedLogger: Logger | null = null;

/**
 * Process-wide logger, created from the NODE_ENV preset on first use.
 * Nothing in this package uses it; code that prefers an explicit instance
 * should call createLogger() and pass the result around.
 */
export function getSharedLogger(): Logger {
  if (!sharedLogger) {
    sharedLogger = createLogger();
  }
  return sharedLogger;
}

/**
 * Drop the shared logger (or replace it, e.g. in tests).
 */
export function resetSharedLogger(logger?: Logger): void {
  sharedLogger = logger ?? null;
}
