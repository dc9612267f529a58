// ============================================
// Logfan Core
// ============================================

/**
 * @module @logfan/core
 *
 * In-process log dispatch: one call fans out to every registered destination
 * whose level admits it.
 */

// ============================================
// Errors
// ============================================
export { ErrorCode, isConfigurationCode } from "@logfan/shared";
export * from "./errors/index.js";

// ============================================
// Configuration
// ============================================
export * from "./config/index.js";

// ============================================
// Logger
// ============================================
export * from "./logger/index.js";
