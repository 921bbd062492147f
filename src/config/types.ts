/**
 * Configuration type definitions.
 *
 * This module defines the shape of batch-reporter.config.yaml.
 */

import type { LogLevel } from '../utils/logger.js';
import type { SinkFailurePolicy } from '../reporter/types.js';

/**
 * One reporter entry under `reporters:`.
 */
export interface ReporterEntryConfig {
  /** Base name; the registry name is `<reporterName>_batch_reporter` */
  reporterName: string;
  /** Delay between the first enqueue of a cycle and its flush (default 0) */
  batchTimeMs?: number;
  /** Mailbox policy after a sink failure (default 'reset') */
  onSinkFailure?: SinkFailurePolicy;
}

/**
 * Logging configuration section.
 */
export interface LoggingConfig {
  /** Log level (trace, debug, info, warn, error, fatal, silent) */
  level?: LogLevel;
  /** Directory for the log file; file logging is enabled when set */
  dir?: string;
  /** Enable pretty printing in console */
  pretty?: boolean;
}

/**
 * Main configuration interface. All fields are optional.
 */
export interface BatchReporterConfig {
  reporters?: ReporterEntryConfig[];
  logging?: LoggingConfig;
}

/**
 * Configuration file metadata.
 */
export interface ConfigFileInfo {
  /** Path to the config file */
  path: string;
  /** Whether the file exists */
  exists: boolean;
}

/**
 * Loaded configuration with metadata.
 */
export interface LoadedConfig extends BatchReporterConfig {
  /** Source file path */
  _source?: string;
  /** Whether config was loaded from file */
  _fromFile: boolean;
}

/**
 * Configuration validation error.
 */
export interface ConfigValidationError {
  /** Field path that failed validation (e.g., 'reporters.0.batchTimeMs') */
  field: string;
  /** Human-readable error message */
  message: string;
}

export type ConfigValidationResult =
  | { valid: true; config: BatchReporterConfig; errors: ConfigValidationError[] }
  | { valid: false; errors: ConfigValidationError[] };

/**
 * Reporter entry with every default filled in.
 */
export interface ResolvedReporterConfig {
  reporterName: string;
  batchTimeMs: number;
  onSinkFailure: SinkFailurePolicy;
}
