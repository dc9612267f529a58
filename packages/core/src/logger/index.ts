export type { AttemptOptions, AttemptOutcome } from "./attempt.js";
export { attempt } from "./attempt.js";
export type { CommandType } from "./command.js";
export { QueryCommand } from "./command.js";
export * from "./destinations/index.js";
// Factory
export type { CreateLoggerOptions } from "./factory.js";
export { createLogger, getSharedLogger, resetSharedLogger } from "./factory.js";
export type { LineParts, MessageFormatter, PayloadShape } from "./formatter.js";
export { defaultFormatter, describePayload, formatBody, formatLine, stringifyValue } from "./formatter.js";
export { HistoryBuffer } from "./history.js";
export type { ProcessIdentity } from "./identity.js";
export { getProcessIdentity } from "./identity.js";
export type { LogCategory, LogLevel } from "./levels.js";
export {
  category,
  isAtLeast,
  isLogLevel,
  LOG_LEVEL_CATEGORIES,
  LOG_LEVEL_LABELS,
  LOG_LEVEL_PRIORITY,
  LOG_LEVEL_SHORT_CODES,
  LOG_LEVELS,
  levelLabel,
  parseLogLevel,
  rank,
  shortCode,
} from "./levels.js";
export { DestinationLock, lockFor } from "./lock.js";
export { DEFAULT_HISTORY_CAPACITY, Logger } from "./logger.js";
export {
  DEFAULT_TIME_FORMAT,
  formatTimestamp,
  TimeFormatBuilder,
  validateTimeFormat,
} from "./time-format.js";
export type { Destination, LogEntry, LoggerOptions } from "./types.js";
