/**
 * Tests for error handler (src/utils/error-handler.ts)
 */

import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import {
  AppError,
  ErrorCategory,
  ErrorSeverity,
  classifyError,
  enrichError,
  getSeverity,
  logError,
} from './error-handler.js';
import { SinkFailureError, ValidationError } from './errors.js';

describe('classifyError', () => {
  it('should classify a sink failure with an opaque cause as SINK', () => {
    const error = new SinkFailureError('Sink failed', { cause: new Error('bad gateway') });

    expect(classifyError(error)).toBe(ErrorCategory.SINK);
  });

  it('should classify a sink failure by its network cause', () => {
    const error = new SinkFailureError('Sink failed', { cause: new Error('connect ECONNREFUSED') });

    expect(classifyError(error)).toBe(ErrorCategory.NETWORK);
  });

  it('should classify validation errors', () => {
    expect(classifyError(new ValidationError('bad'))).toBe(ErrorCategory.VALIDATION);
  });

  it('should classify timeouts', () => {
    expect(classifyError(new Error('Request timeout after 5000ms'))).toBe(ErrorCategory.TIMEOUT);
  });

  it('should classify configuration errors', () => {
    expect(classifyError(new Error('Missing config file'))).toBe(ErrorCategory.CONFIGURATION);
  });

  it('should return UNKNOWN for non-errors', () => {
    expect(classifyError('oops')).toBe(ErrorCategory.UNKNOWN);
  });

  it('should keep the category of an AppError', () => {
    expect(classifyError(new AppError('x', ErrorCategory.SINK))).toBe(ErrorCategory.SINK);
  });
});

describe('getSeverity', () => {
  it('should treat configuration errors as fatal', () => {
    expect(getSeverity(new Error('invalid config'))).toBe(ErrorSeverity.FATAL);
  });

  it('should default to error', () => {
    expect(getSeverity(new SinkFailureError('Sink failed'))).toBe(ErrorSeverity.ERROR);
  });
});

describe('enrichError', () => {
  it('should wrap an error with category and context', () => {
    const cause = new SinkFailureError('Sink failed');

    const enriched = enrichError(cause, { reporter: 'influx_batch_reporter' });

    expect(enriched).toBeInstanceOf(AppError);
    expect(enriched.message).toBe('Sink failed');
    expect(enriched.category).toBe(ErrorCategory.SINK);
    expect(enriched.originalError).toBe(cause);
    expect(enriched.context).toEqual({ reporter: 'influx_batch_reporter' });
  });

  it('should let context override the category', () => {
    const enriched = enrichError(new Error('x'), { category: ErrorCategory.VALIDATION });

    expect(enriched.category).toBe(ErrorCategory.VALIDATION);
  });

  it('should merge context into an existing AppError', () => {
    const original = new AppError('x', ErrorCategory.SINK, ErrorSeverity.FATAL, { context: { a: 1 } });

    const enriched = enrichError(original, { b: 2 });

    expect(enriched.severity).toBe(ErrorSeverity.FATAL);
    expect(enriched.context).toEqual({ a: 1, b: 2 });
  });
});

describe('logError', () => {
  it('should log sink failures at error level with context', () => {
    const logger = pino({ level: 'silent' });
    const errorSpy = vi.spyOn(logger, 'error');
    const error = new SinkFailureError('Sink failed');

    const enriched = logError(error, { reporter: 'influx_batch_reporter' }, logger);

    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        err: error,
        errorId: enriched.errorId,
        category: ErrorCategory.SINK,
        reporter: 'influx_batch_reporter',
      }),
      'Sink failed'
    );
  });

  it('should log configuration errors at fatal level', () => {
    const logger = pino({ level: 'silent' });
    const fatalSpy = vi.spyOn(logger, 'fatal');

    logError(new Error('config file unreadable'), {}, logger);

    expect(fatalSpy).toHaveBeenCalledTimes(1);
  });

  it('should keep the severity of an AppError', () => {
    const logger = pino({ level: 'silent' });
    const fatalSpy = vi.spyOn(logger, 'fatal');

    logError(new AppError('sink misconfigured', ErrorCategory.SINK, ErrorSeverity.FATAL), {}, logger);

    expect(fatalSpy).toHaveBeenCalledWith(expect.objectContaining({ category: ErrorCategory.SINK }), 'sink misconfigured');
  });
});
