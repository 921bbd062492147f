/**
 * Main entry point.
 * Debounced batching reporters: collect events from many callers and hand
 * them to a sink as one ordered batch.
 */
export * from './reporter/index.js';
export {
  loadConfig,
  loadConfigFile,
  validateConfig,
  resolveReporterConfigs,
  resolveLoggerConfig,
  REPORTER_DEFAULTS,
  type BatchReporterConfig,
  type ConfigValidationError,
  type ConfigValidationResult,
  type ResolvedConfig,
  type ResolvedReporterConfig,
} from './config/index.js';
export { initLogger, createLogger, flushLogger, type LoggerConfig, type LogLevel } from './utils/logger.js';
export { SinkFailureError, ValidationError, formatError } from './utils/errors.js';
export { ErrorCategory, classifyError, logError } from './utils/error-handler.js';
