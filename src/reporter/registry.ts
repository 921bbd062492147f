/**
 * ReporterRegistry - named batch reporters.
 *
 * Lets callers address a reporter by the name derived from its configuration
 * instead of passing the instance around.
 */

import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import { REPORTER_DEFAULTS } from '../config/constants.js';
import type { ResolvedReporterConfig } from '../config/types.js';
import { BatchReporter } from './batch-reporter.js';
import type { BatchReporterOptions, ReportFn } from './types.js';

/**
 * Derive the registry name for a reporter configuration.
 *
 * @example
 * ```typescript
 * getReporterName({ reporterName: 'influx' }); // 'influx_batch_reporter'
 * ```
 */
export function getReporterName(config: { reporterName: string }): string {
  return `${config.reporterName}${REPORTER_DEFAULTS.NAME_SUFFIX}`;
}

/**
 * Holds running reporters of one event type, keyed by name.
 */
export class ReporterRegistry<E = unknown> {
  private readonly reporters = new Map<string, BatchReporter<E>>();
  private readonly customLogger?: Logger;

  constructor(logger?: Logger) {
    this.customLogger = logger;
  }

  // The default registry is built at import time, before initLogger runs
  private get logger(): Logger {
    return this.customLogger ?? createLogger('ReporterRegistry');
  }

  /**
   * Start a reporter and register it under `name`.
   *
   * @throws ValidationError if a reporter with that name is already running
   */
  start(
    name: string,
    reportFn: ReportFn<E>,
    batchTime = 0,
    options: Omit<BatchReporterOptions, 'name'> = {}
  ): BatchReporter<E> {
    if (this.reporters.has(name)) {
      throw new ValidationError(`Reporter "${name}" already started`, { field: 'name', value: name });
    }

    const reporter = new BatchReporter(reportFn, batchTime, { ...options, name });
    this.reporters.set(name, reporter);
    this.logger.debug({ name, batchTime }, 'Reporter registered');
    return reporter;
  }

  lookup(name: string): BatchReporter<E> | undefined {
    return this.reporters.get(name);
  }

  has(name: string): boolean {
    return this.reporters.has(name);
  }

  names(): string[] {
    return [...this.reporters.keys()];
  }

  /**
   * Enqueue on the named reporter. Unknown names are logged and ignored.
   */
  enqueue(name: string, event: E): void {
    const reporter = this.lookup(name);
    if (!reporter) {
      this.logger.warn({ name }, 'No reporter registered under name, event dropped');
      return;
    }
    reporter.enqueue(event);
  }

  /**
   * Stop and unregister a reporter. Returns false if the name was unknown.
   */
  stop(name: string): boolean {
    const reporter = this.reporters.get(name);
    if (!reporter) {
      return false;
    }
    reporter.stop();
    this.reporters.delete(name);
    return true;
  }

  stopAll(): void {
    for (const name of this.names()) {
      this.stop(name);
    }
  }
}

/**
 * Process-wide registry for callers that do not need a typed one.
 */
export const defaultRegistry = new ReporterRegistry<unknown>();

/**
 * Start one reporter per resolved configuration, each under its derived name.
 *
 * @param sinkFor - Builds the sink for a given reporter configuration
 */
export function startReporters<E>(
  configs: readonly ResolvedReporterConfig[],
  sinkFor: (config: ResolvedReporterConfig) => ReportFn<E>,
  registry: ReporterRegistry<E>
): BatchReporter<E>[] {
  return configs.map((config) =>
    registry.start(getReporterName(config), sinkFor(config), config.batchTimeMs, {
      onSinkFailure: config.onSinkFailure,
    })
  );
}
