// ============================================
// Logfan Error Codes
// ============================================

/**
 * Centralized error codes for logfan.
 * Error code ranges:
 * - 1xxx: Configuration errors (raised to the caller)
 * - 2xxx: Write errors (discarded at the destination boundary)
 */
export enum ErrorCode {
  // Configuration Errors (1xxx)
  CONFIG_INVALID = 1001,
  INVALID_IDENTIFIER = 1002,
  INVALID_TIME_FORMAT = 1003,
  INVALID_CONNECTION = 1004,
  INVALID_RECIPIENTS = 1005,
  NON_INTERACTIVE = 1006,
  INVALID_ARGUMENT = 1007,

  // Write Errors (2xxx)
  WRITE_FAILED = 2001,
  WRITE_TIMEOUT = 2002,
}

/**
 * Whether a code belongs to the configuration range.
 */
export function isConfigurationCode(code: ErrorCode): boolean {
  return code >= 1000 && code < 2000;
}
