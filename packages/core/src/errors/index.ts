// ============================================
// Logfan Errors - Barrel Export
// ============================================

export {
  ConfigurationError,
  isConfigurationError,
  isWriteFailure,
  LogfanError,
  type LogfanErrorOptions,
  WriteFailure,
} from "./types.js";
