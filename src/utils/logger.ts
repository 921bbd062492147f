/**
 * Logger Factory Module
 *
 * Provides a centralized logging infrastructure using Pino with support for:
 * - Development (pretty print) vs Production (JSON) environments
 * - Optional file destination
 * - Multiple log levels (trace, debug, info, warn, error, fatal)
 * - Child loggers with context binding
 * - Sensitive data redaction
 *
 * @module utils/logger
 */

import pino, { type Logger, type LevelWithSilent, type LoggerOptions, type DestinationStream } from 'pino';
import path from 'path';
import fs from 'fs';

/**
 * Log levels supported by Pino
 */
export type LogLevel = LevelWithSilent;

/**
 * Logger configuration interface
 */
export interface LoggerConfig {
  /** Log level (default: 'info' in production, 'debug' in development, 'silent' under test) */
  level?: LogLevel;
  /** Enable pretty print (default: development outside of tests) */
  prettyPrint?: boolean;
  /** Log to file (default: false in development, true in production) */
  fileLogging?: boolean;
  /** Log directory (default: './logs') */
  logDir?: string;
  /** Fields to redact from logs */
  redact?: string[];
  /** Additional metadata to include in all logs */
  metadata?: Record<string, unknown>;
}

const LOG_FILE_NAME = 'batch-reporter.log';

const VALID_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Sensitive field patterns that should be redacted
 */
const SENSITIVE_FIELDS = [
  'apiKey',
  'token',
  'password',
  'secret',
  'authorization',
];

/**
 * Root logger instance (singleton)
 */
let rootLogger: Logger | null = null;

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production';
}

function isTest(): boolean {
  return process.env.NODE_ENV === 'test';
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default
 */
function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();

  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  if (isTest()) {
    return 'silent';
  }

  return isDevelopment() ? 'debug' : 'info';
}

function getDevelopmentConfig(): LoggerOptions {
  return {
    level: getDefaultLogLevel(),
    formatters: {
      level: (label) => {
        return { level: label };
      }
    }
  };
}

function getProductionConfig(): LoggerOptions {
  return {
    level: getDefaultLogLevel(),
    formatters: {
      level: (label) => {
        return { level: label };
      }
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err
    }
  };
}

/**
 * Environment defaults, plus the pino-pretty transport when asked for.
 * Pretty output defaults to on in development outside of tests.
 */
function getBaseConfig(prettyPrint?: boolean): LoggerOptions {
  const options = isDevelopment() ? getDevelopmentConfig() : getProductionConfig();

  if (prettyPrint ?? (isDevelopment() && !isTest())) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        singleLine: false,
        messageFormat: '[{context}] {msg}'
      }
    };
  }

  return options;
}

/**
 * Open the log file destination, creating the directory when needed.
 */
function setupFileLogging(logDir: string): DestinationStream {
  const logsPath = path.resolve(process.cwd(), logDir);

  if (!fs.existsSync(logsPath)) {
    fs.mkdirSync(logsPath, { recursive: true });
  }

  return pino.destination({
    dest: path.join(logsPath, LOG_FILE_NAME),
    sync: false,
  });
}

/**
 * Initialize the root logger
 *
 * Builds the root logger from environment defaults and `config`, replacing
 * any root created earlier (for instance by a `createLogger` call made before
 * configuration was loaded). Child loggers made before the call keep writing
 * through the previous root.
 *
 * @example
 * ```typescript
 * const logger = await initLogger({ level: 'info' });
 * logger.info('Reporters started');
 * ```
 */
export async function initLogger(config: LoggerConfig = {}): Promise<Logger> {
  const isDev = isDevelopment();
  const logDir = config.logDir ?? process.env.LOG_DIR ?? './logs';
  const fileLogging = (config.fileLogging ?? !isDev) && !isTest();

  // A pretty transport and a file destination cannot share one stream
  let options = getBaseConfig(fileLogging ? false : config.prettyPrint);

  if (config.level) {
    options.level = config.level;
  }

  if (!isDev || config.redact) {
    options = {
      ...options,
      redact: {
        paths: (config.redact ?? SENSITIVE_FIELDS).map((field) => `*.${field}`),
        remove: true
      }
    };
  }

  if (config.metadata) {
    options.base = {
      ...options.base,
      ...config.metadata
    };
  }

  let logStream: DestinationStream = process.stdout;

  if (fileLogging) {
    try {
      logStream = setupFileLogging(logDir);
    } catch (error) {
      console.warn('Failed to setup file logging, falling back to stdout:', error);
    }
  }

  rootLogger = options.transport ? pino(options) : pino(options, logStream);

  return rootLogger;
}

/**
 * Create a child logger with context
 *
 * Child loggers inherit the parent's configuration and include the context
 * field in all log entries.
 *
 * @param context - Module/component name (e.g., 'BatchReporter', 'ConfigLoader')
 * @param metadata - Additional metadata to include in all logs
 */
export function createLogger(
  context: string,
  metadata?: Record<string, unknown>
): Logger {
  return getRootLogger().child({
    context,
    ...metadata
  });
}

/**
 * Get the root logger instance, creating a default one if needed.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    const options = getBaseConfig();
    rootLogger = options.transport ? pino(options) : pino(options, process.stdout);
  }
  return rootLogger;
}

/**
 * Update the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  if (rootLogger) {
    rootLogger.level = level;
  }
}

export function isLevelEnabled(level: LogLevel): boolean {
  return getRootLogger().isLevelEnabled(level);
}

/**
 * Flush any pending log entries
 *
 * Useful for ensuring logs are written before process exit.
 */
export function flushLogger(): Promise<void> {
  const logger = rootLogger;
  if (!logger) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    logger.flush((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

/**
 * Drop the root logger so the next call builds a fresh one.
 */
export function resetLogger(): void {
  rootLogger = null;
}
