// ============================================
// Logfan Shared Types
// ============================================

// Error codes
export { ErrorCode, isConfigurationCode } from "./errors/index.js";
// Result type
export type { Result } from "./types/result.js";
export { Err, isErr, Ok, tryCatch } from "./types/result.js";
