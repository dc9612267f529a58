// ============================================
// Config Module Barrel Export
// ============================================

export {
  createLoggingConfig,
  developmentConfig,
  getLoggingConfig,
  LOGGING_ENV_VARS,
  type LoggingConfig,
  loadLoggingConfig,
  productionConfig,
  testConfig,
} from "./logging.config.js";
