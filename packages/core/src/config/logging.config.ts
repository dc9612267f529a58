import { ErrorCode, tryCatch } from "@logfan/shared";
import { z } from "zod";
import { ConfigurationError } from "../errors/types.js";
import { type LogLevel, parseLogLevel } from "../logger/levels.js";
import { DEFAULT_TIME_FORMAT } from "../logger/time-format.js";

/**
 * Configuration for the logger built by createLogger().
 */
export interface LoggingConfig {
  /** Global on/off switch */
  enabled: boolean;
  /** Write to destinations concurrently instead of one after the other */
  concurrent: boolean;
  /** Timestamp pattern */
  timeFormat: string;
  /** History capacity; 0 leaves history off */
  historyCapacity: number;
  /** Console destination */
  console: {
    enabled: boolean;
    level: LogLevel;
  };
  /** File destination */
  file: {
    enabled: boolean;
    /** Directory for log files (default: process.cwd()) */
    directory?: string;
    /** Fixed file name (default: one file per day) */
    fileName?: string;
    level: LogLevel;
    /** 0 = no limit */
    maxLines: number;
    /** 0 = no limit */
    maxBytes: number;
  };
}

/**
 * Development environment logging configuration.
 * - Debug output to the terminal
 * - No files
 */
export const developmentConfig: LoggingConfig = {
  enabled: true,
  concurrent: true,
  timeFormat: DEFAULT_TIME_FORMAT,
  historyCapacity: 0,
  console: {
    enabled: true,
    level: "debug",
  },
  file: {
    enabled: false,
    level: "debug",
    maxLines: 0,
    maxBytes: 0,
  },
};

/**
 * Production environment logging configuration.
 * - Info and above to daily files, archived past 10 MB
 * - No terminal output (services usually have none)
 */
export const productionConfig: LoggingConfig = {
  enabled: true,
  concurrent: true,
  timeFormat: DEFAULT_TIME_FORMAT,
  historyCapacity: 0,
  console: {
    enabled: false,
    level: "info",
  },
  file: {
    enabled: true,
    directory: "logs",
    level: "info",
    maxLines: 0,
    maxBytes: 10 * 1024 * 1024,
  },
};

/**
 * Test environment logging configuration.
 * - No destinations; lines are kept in history for assertions
 */
export const testConfig: LoggingConfig = {
  enabled: true,
  concurrent: false,
  timeFormat: DEFAULT_TIME_FORMAT,
  historyCapacity: 1000,
  console: {
    enabled: false,
    level: "warn",
  },
  file: {
    enabled: false,
    level: "warn",
    maxLines: 0,
    maxBytes: 0,
  },
};

/**
 * Get the preset for an environment.
 *
 * @param env - Environment name (defaults to NODE_ENV or 'development')
 *
 * @example
 * ```typescript
 * const config = getLoggingConfig();
 * const prodConfig = getLoggingConfig('production');
 * ```
 */
export function getLoggingConfig(env?: string): LoggingConfig {
  const environment = env ?? process.env.NODE_ENV ?? "development";

  switch (environment) {
    case "production":
      return productionConfig;
    case "test":
      return testConfig;
    default:
      return developmentConfig;
  }
}

/**
 * Create a custom logging configuration by merging with a preset.
 *
 * @param overrides - Partial configuration to merge with the preset
 * @param baseEnv - Environment whose preset is the base
 */
export function createLoggingConfig(
  overrides: Partial<LoggingConfig>,
  baseEnv?: string
): LoggingConfig {
  const base = getLoggingConfig(baseEnv);

  return {
    ...base,
    ...overrides,
    console: {
      ...base.console,
      ...overrides.console,
    },
    file: {
      ...base.file,
      ...overrides.file,
    },
  };
}

// ============================================
// Environment variables
// ============================================

const FLAG_VALUES: Record<string, boolean> = {
  true: true,
  "1": true,
  yes: true,
  on: true,
  false: false,
  "0": false,
  no: false,
  off: false,
};

const flag = z.string().transform((value, ctx) => {
  const parsed = FLAG_VALUES[value.trim().toLowerCase()];
  if (parsed === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

const level = z.string().transform((value, ctx): LogLevel => {
  const parsed = tryCatch(() => parseLogLevel(value));
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown log level "${value}"` });
    return z.NEVER;
  }
  return parsed.value;
});

const count = z.coerce.number().int().nonnegative();

const EnvSchema = z.object({
  LOGFAN_ENABLED: flag.optional(),
  LOGFAN_CONCURRENT: flag.optional(),
  LOGFAN_TIME_FORMAT: z.string().optional(),
  LOGFAN_HISTORY: count.optional(),
  LOGFAN_LOG_DIR: z.string().optional(),
  LOGFAN_LOG_FILE: z.string().optional(),
  LOGFAN_FILE_LEVEL: level.optional(),
  LOGFAN_MAX_LINES: count.optional(),
  LOGFAN_MAX_BYTES: count.optional(),
  LOGFAN_CONSOLE: flag.optional(),
  LOGFAN_CONSOLE_LEVEL: level.optional(),
});

/**
 * Names of the environment variables read by loadLoggingConfig().
 */
export const LOGGING_ENV_VARS = Object.keys(EnvSchema.shape);

/**
 * Preset for `env.NODE_ENV` with LOGFAN_* variables applied on top.
 * Empty variables are ignored. Setting LOGFAN_LOG_DIR or LOGFAN_LOG_FILE
 * turns the file destination on.
 *
 * @throws ConfigurationError naming every invalid variable
 *
 * @example
 * ```typescript
 * // LOGFAN_CONSOLE=false LOGFAN_LOG_DIR=/var/log/app LOGFAN_MAX_LINES=50000
 * const logger = createLogger(loadLoggingConfig());
 * ```
 */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const present: Record<string, string> = {};
  for (const name of LOGGING_ENV_VARS) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      present[name] = value;
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid logging environment: ${details}`, ErrorCode.CONFIG_INVALID, {
      cause: result.error,
    });
  }

  const vars = result.data;
  const base = getLoggingConfig(env.NODE_ENV);
  const fileRequested = vars.LOGFAN_LOG_DIR !== undefined || vars.LOGFAN_LOG_FILE !== undefined;

  return {
    enabled: vars.LOGFAN_ENABLED ?? base.enabled,
    concurrent: vars.LOGFAN_CONCURRENT ?? base.concurrent,
    timeFormat: vars.LOGFAN_TIME_FORMAT ?? base.timeFormat,
    historyCapacity: vars.LOGFAN_HISTORY ?? base.historyCapacity,
    console: {
      enabled: vars.LOGFAN_CONSOLE ?? base.console.enabled,
      level: vars.LOGFAN_CONSOLE_LEVEL ?? base.console.level,
    },
    file: {
      enabled: base.file.enabled || fileRequested,
      directory: vars.LOGFAN_LOG_DIR ?? base.file.directory,
      fileName: vars.LOGFAN_LOG_FILE ?? base.file.fileName,
      level: vars.LOGFAN_FILE_LEVEL ?? base.file.level,
      maxLines: vars.LOGFAN_MAX_LINES ?? base.file.maxLines,
      maxBytes: vars.LOGFAN_MAX_BYTES ?? base.file.maxBytes,
    },
  };
}
