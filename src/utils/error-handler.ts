/**
 * Error Handling Module
 *
 * Provides utilities for consistent error classification and logging:
 * - Error categorization
 * - Error context enrichment
 * - Standardized error logging with Pino
 *
 * @module utils/error-handler
 */

import type { Logger } from 'pino';
import { createLogger } from './logger.js';
import { SinkFailureError, ValidationError, toError } from './errors.js';

/**
 * Error categories for classification and handling
 */
export enum ErrorCategory {
  /** Configuration errors (missing/invalid config file) */
  CONFIGURATION = 'CONFIGURATION',
  /** Validation errors (invalid input) */
  VALIDATION = 'VALIDATION',
  /** A reporter's sink failed while flushing */
  SINK = 'SINK',
  /** Network errors (timeouts, connection failures) raised inside a sink */
  NETWORK = 'NETWORK',
  /** Timeout errors */
  TIMEOUT = 'TIMEOUT',
  /** Unknown/unclassified errors */
  UNKNOWN = 'UNKNOWN'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Fatal - process should exit */
  FATAL = 'fatal',
  /** Error - operation failed but system can continue */
  ERROR = 'error'
}

/**
 * Standard error context interface
 */
export interface ErrorContext {
  category?: ErrorCategory;
  /** Additional context data */
  [key: string]: unknown;
}

/**
 * Enriched Error class with additional metadata
 */
export class AppError extends Error {
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly errorId: string;
  readonly context?: Record<string, unknown>;
  readonly originalError?: Error;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
    options: {
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'AppError';
    this.category = category;
    this.severity = severity;
    this.context = options.context;
    this.originalError = options.cause;
    this.errorId = `err_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
  }

  toJSON() {
    return {
      errorId: this.errorId,
      name: this.name,
      message: this.message,
      category: this.category,
      severity: this.severity,
      context: this.context,
      originalError: this.originalError ? {
        name: this.originalError.name,
        message: this.originalError.message
      } : undefined
    };
  }
}

// Not cached: the root logger may be replaced by initLogger
function getErrorHandlerLogger(): Logger {
  return createLogger('ErrorHandler');
}

/**
 * Classify an error based on its type and message
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof AppError) {
    return error.category;
  }

  if (error instanceof SinkFailureError) {
    const cause = error.options.cause;
    const causeCategory = cause ? classifyError(cause) : ErrorCategory.UNKNOWN;
    return causeCategory === ErrorCategory.UNKNOWN ? ErrorCategory.SINK : causeCategory;
  }

  if (error instanceof ValidationError) {
    return ErrorCategory.VALIDATION;
  }

  if (!(error instanceof Error)) {
    return ErrorCategory.UNKNOWN;
  }

  const message = error.message.toLowerCase();
  const name = error.name.toLowerCase();

  if (
    name.includes('network') ||
    message.includes('etimedout') ||
    message.includes('enotfound') ||
    message.includes('econnrefused') ||
    message.includes('econnreset')
  ) {
    return ErrorCategory.NETWORK;
  }

  if (message.includes('timeout') || name.includes('timeout')) {
    return ErrorCategory.TIMEOUT;
  }

  if (message.includes('config')) {
    return ErrorCategory.CONFIGURATION;
  }

  return ErrorCategory.UNKNOWN;
}

/**
 * Determine the severity level for an error
 */
export function getSeverity(error: unknown): ErrorSeverity {
  if (error instanceof AppError) {
    return error.severity;
  }

  // Configuration errors are fatal: nothing can start without a valid config
  if (classifyError(error) === ErrorCategory.CONFIGURATION) {
    return ErrorSeverity.FATAL;
  }

  return ErrorSeverity.ERROR;
}

/**
 * Enrich error with additional context
 */
export function enrichError(error: unknown, context: ErrorContext = {}): AppError {
  if (error instanceof AppError) {
    return new AppError(error.message, error.category, error.severity, {
      context: { ...error.context, ...context },
      cause: error.originalError ?? error
    });
  }

  const errorObj = toError(error);

  return new AppError(
    errorObj.message,
    context.category ?? classifyError(errorObj),
    getSeverity(errorObj),
    {
      context,
      cause: errorObj
    }
  );
}

/**
 * Log an error with full context using Pino
 */
export function logError(
  error: unknown,
  context: ErrorContext = {},
  customLogger?: Logger
): AppError {
  const logger = customLogger ?? getErrorHandlerLogger();
  const enriched = enrichError(error, context);

  const logData: Record<string, unknown> = {
    err: error instanceof Error ? error : undefined,
    errorId: enriched.errorId,
    category: enriched.category,
    ...context
  };

  if (enriched.severity === ErrorSeverity.FATAL) {
    logger.fatal(logData, enriched.message);
  } else {
    logger.error(logData, enriched.message);
  }

  return enriched;
}
