/**
 * Configuration file loader.
 *
 * This module handles loading, validating and resolving
 * batch-reporter.config.yaml.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { Logger } from 'pino';
import { createLogger, type LoggerConfig } from '../utils/logger.js';
import { CONFIG_FILE_NAMES, REPORTER_DEFAULTS } from './constants.js';
import type {
  BatchReporterConfig,
  ConfigFileInfo,
  ConfigValidationError,
  ConfigValidationResult,
  LoadedConfig,
  ResolvedReporterConfig,
} from './types.js';

// Resolved per call: config is usually loaded before initLogger applies it
function getLoaderLogger(): Logger {
  return createLogger('ConfigLoader');
}

const ReporterEntrySchema = z.object({
  reporterName: z.string().min(1, 'reporterName must not be empty'),
  batchTimeMs: z.number().int().nonnegative().optional(),
  onSinkFailure: z.enum(['reset', 'restart']).optional(),
});

const ConfigSchema = z.object({
  reporters: z.array(ReporterEntrySchema).optional(),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
    dir: z.string().optional(),
    pretty: z.boolean().optional(),
  }).optional(),
});

/**
 * Search paths for configuration files.
 */
function getSearchPaths(): string[] {
  return [
    process.cwd(),
    process.env.HOME ?? '',
  ].filter(Boolean);
}

/**
 * Find the configuration file in the search paths.
 */
export function findConfigFile(): ConfigFileInfo {
  for (const searchPath of getSearchPaths()) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(searchPath, fileName);
      if (existsSync(filePath)) {
        getLoaderLogger().debug({ filePath }, 'Found configuration file');
        return { path: filePath, exists: true };
      }
    }
  }

  getLoaderLogger().debug('No configuration file found, using defaults');
  return { path: '', exists: false };
}

/**
 * Validate a parsed configuration document.
 *
 * Reports every problem with its dotted field path, including reporter
 * names that would collide in the registry.
 */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const result = ConfigSchema.safeParse(raw ?? {});

  if (!result.success) {
    return {
      valid: false,
      errors: result.error.issues.map((issue) => ({
        field: issue.path.join('.') || '(root)',
        message: issue.message,
      })),
    };
  }

  const errors: ConfigValidationError[] = [];
  const seen = new Set<string>();
  (result.data.reporters ?? []).forEach((entry, index) => {
    if (seen.has(entry.reporterName)) {
      errors.push({
        field: `reporters.${index}.reporterName`,
        message: `duplicate reporter name "${entry.reporterName}"`,
      });
    }
    seen.add(entry.reporterName);
  });

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  const config: BatchReporterConfig = result.data;
  return { valid: true, config, errors: [] };
}

/**
 * Load, parse and validate the configuration file.
 *
 * @param filePath - Path to the configuration file (optional, will search if not provided)
 * @returns LoadedConfig; `_fromFile` is false when the file is missing or invalid
 *
 * @example
 * ```typescript
 * const config = loadConfigFile();
 * if (config._fromFile) {
 *   console.log(`Loaded from ${config._source}`);
 * }
 * ```
 */
export function loadConfigFile(filePath?: string): LoadedConfig {
  const fileInfo = filePath
    ? { path: resolve(filePath), exists: existsSync(resolve(filePath)) }
    : findConfigFile();

  if (!fileInfo.exists) {
    return { _fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(fileInfo.path, 'utf-8'));
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    getLoaderLogger().warn({ path: fileInfo.path, error: errorMessage }, 'Failed to parse configuration file');
    return { _fromFile: false };
  }

  if (!parsed || typeof parsed !== 'object') {
    getLoaderLogger().warn({ path: fileInfo.path }, 'Configuration file is empty or invalid');
    return { _fromFile: false };
  }

  const validation = validateConfig(parsed);
  if (!validation.valid) {
    getLoaderLogger().error({ path: fileInfo.path, errors: validation.errors }, 'Configuration file failed validation');
    return { _fromFile: false };
  }

  getLoaderLogger().info(
    { path: fileInfo.path, reporters: validation.config.reporters?.length ?? 0 },
    'Configuration file loaded successfully'
  );

  return {
    ...validation.config,
    _source: fileInfo.path,
    _fromFile: true,
  };
}

/**
 * Strip loader metadata, leaving the configuration itself.
 */
export function getConfigFromFile(fileConfig: LoadedConfig): BatchReporterConfig {
  const { _source, _fromFile, ...config } = fileConfig;
  return config;
}

/**
 * Fill in reporter defaults.
 */
export function resolveReporterConfigs(config: BatchReporterConfig): ResolvedReporterConfig[] {
  return (config.reporters ?? []).map((entry) => ({
    reporterName: entry.reporterName,
    batchTimeMs: entry.batchTimeMs ?? REPORTER_DEFAULTS.BATCH_TIME_MS,
    onSinkFailure: entry.onSinkFailure ?? REPORTER_DEFAULTS.ON_SINK_FAILURE,
  }));
}

/**
 * Translate the `logging:` section into logger options.
 */
export function resolveLoggerConfig(config: BatchReporterConfig): LoggerConfig {
  const logging = config.logging ?? {};
  return {
    level: logging.level,
    prettyPrint: logging.pretty,
    fileLogging: logging.dir !== undefined,
    logDir: logging.dir,
  };
}
