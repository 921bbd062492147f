/**
 * Error types raised by the batch reporter.
 *
 * Each error keeps the options it was created with and appends the cause's
 * message, so a single log line carries the whole chain.
 */

function withCause(message: string, cause?: Error): string {
  return cause ? `${message} (caused by: ${cause.message})` : message;
}

export interface SinkFailureOptions {
  /** Error thrown (or rejection reason) from the sink */
  cause?: Error;
  /** Name of the reporter whose flush failed */
  reporter?: string;
  /** Number of events in the batch that was lost */
  batchSize?: number;
}

/**
 * Raised when a reporter's sink throws or rejects during a flush.
 * The batch handed to the sink is not retried.
 */
export class SinkFailureError extends Error {
  readonly options: SinkFailureOptions;

  constructor(message: string, options: SinkFailureOptions = {}) {
    super(withCause(message, options.cause), { cause: options.cause });
    this.name = 'SinkFailureError';
    this.options = options;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      reporter: this.options.reporter,
      batchSize: this.options.batchSize,
      cause: this.options.cause?.message,
    };
  }
}

export interface ValidationErrorOptions {
  cause?: Error;
  /** Dotted path of the offending field, e.g. `reporters.0.batchTimeMs` */
  field?: string;
  value?: unknown;
}

export class ValidationError extends Error {
  readonly options: ValidationErrorOptions;

  constructor(message: string, options: ValidationErrorOptions = {}) {
    super(withCause(message, options.cause), { cause: options.cause });
    this.name = 'ValidationError';
    this.options = options;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      field: this.options.field,
      value: this.options.value,
    };
  }
}

// String() throws for values with no primitive conversion, e.g. Object.create(null)
function describeValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(describeValue(value));
}

/**
 * Format any thrown value as a one-line string.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return describeValue(error);
}
