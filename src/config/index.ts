/**
 * Configuration management.
 *
 * Reads batch-reporter.config.yaml (if present) and resolves reporter and
 * logger settings with defaults applied.
 */
import type { LoggerConfig } from '../utils/logger.js';
import { loadConfigFile, getConfigFromFile, resolveReporterConfigs, resolveLoggerConfig } from './loader.js';
import type { ResolvedReporterConfig } from './types.js';

export * from './constants.js';
export * from './types.js';
export * from './loader.js';

export interface ResolvedConfig {
  /** Path of the file the settings came from, if any */
  source?: string;
  reporters: ResolvedReporterConfig[];
  logger: LoggerConfig;
}

/**
 * Load the configuration file and resolve it in one step.
 */
export function loadConfig(filePath?: string): ResolvedConfig {
  const loaded = loadConfigFile(filePath);
  const config = getConfigFromFile(loaded);

  return {
    source: loaded._source,
    reporters: resolveReporterConfigs(config),
    logger: resolveLoggerConfig(config),
  };
}
