/**
 * BatchReporter - debounced batching actor.
 *
 * Producers call `enqueue()` from anywhere; the reporter collects the events
 * and hands them to its sink as one ordered batch, at most one flush pending
 * at a time. All state changes happen inside a single mailbox loop, so no two
 * handlers ever run concurrently.
 *
 * Usage:
 * ```typescript
 * const reporter = start(async (points) => {
 *   await influx.writePoints(points);
 * }, 500);
 *
 * reporter.enqueue({ measurement: 'http_request', duration: 12 });
 * ```
 *
 * With `batchTime = 0` the flush is posted to the back of the mailbox, so
 * enqueues already waiting there land in the same batch.
 */

import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { logError } from '../utils/error-handler.js';
import { SinkFailureError, ValidationError, toError } from '../utils/errors.js';
import type {
  BatchReporterOptions,
  ReportFn,
  ReporterMessage,
  ReporterState,
  SinkFailurePolicy,
} from './types.js';

const DEFAULT_NAME = 'batch_reporter';

export class BatchReporter<E = unknown> {
  readonly name: string;

  private readonly state: ReporterState<E>;
  private readonly onSinkFailure: SinkFailurePolicy;
  private readonly onError?: (error: SinkFailureError) => void;
  private readonly logger: Logger;

  private mailbox: ReporterMessage<E>[] = [];
  private processing = false;
  private stopped = false;
  private timer?: NodeJS.Timeout;
  private idleWaiters: Array<() => void> = [];

  constructor(reportFn: ReportFn<E>, batchTime = 0, options: BatchReporterOptions = {}) {
    if (!Number.isInteger(batchTime) || batchTime < 0) {
      throw new ValidationError('batchTime must be a non-negative integer (milliseconds)', {
        field: 'batchTime',
        value: batchTime,
      });
    }

    this.name = options.name ?? DEFAULT_NAME;
    this.onSinkFailure = options.onSinkFailure ?? 'reset';
    this.onError = options.onError;
    this.logger = options.logger ?? createLogger('BatchReporter', { reporter: this.name });

    this.state = {
      reportFn,
      batchTime,
      reportScheduled: false,
      unreportedEvents: [],
    };

    this.logger.info({ batchTime, onSinkFailure: this.onSinkFailure }, 'Reporter started');
  }

  get batchTime(): number {
    return this.state.batchTime;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  get isReportScheduled(): boolean {
    return this.state.reportScheduled;
  }

  /** Events buffered for the next flush (not counting those still in the mailbox) */
  get pendingCount(): number {
    return this.state.unreportedEvents.length;
  }

  /**
   * Queue an event for the next batch. Never blocks and never throws.
   */
  enqueue(event: E): void {
    if (this.stopped) {
      this.logger.warn('Enqueue on stopped reporter, event dropped');
      return;
    }
    this.post({ type: 'enqueue', event });
  }

  /**
   * Resolves once the mailbox is empty and no handler is running.
   * A delayed flush whose timer has not fired yet is not waited for.
   */
  whenIdle(): Promise<void> {
    if (!this.processing) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Shut the reporter down. Buffered and queued events are discarded.
   */
  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }

    const discarded = this.state.unreportedEvents.length +
      this.mailbox.filter((message) => message.type === 'enqueue').length;
    this.mailbox = [];
    this.state.unreportedEvents = [];
    this.state.reportScheduled = false;

    this.logger.info({ discarded }, 'Reporter stopped');

    if (!this.processing) {
      this.notifyIdle();
    }
  }

  private post(message: ReporterMessage<E>): void {
    this.mailbox.push(message);
    if (!this.processing) {
      this.processing = true;
      queueMicrotask(() => {
        void this.processMailbox();
      });
    }
  }

  private async processMailbox(): Promise<void> {
    try {
      let message = this.mailbox.shift();
      while (message && !this.stopped) {
        try {
          await this.handleMessage(message);
        } catch (error) {
          this.logger.error({ err: toError(error), message: message.type }, 'Mailbox handler failed');
        }
        message = this.mailbox.shift();
      }
    } finally {
      this.processing = false;
      this.notifyIdle();
    }
  }

  private async handleMessage(message: ReporterMessage<E>): Promise<void> {
    if (message.type === 'enqueue') {
      this.handleEnqueue(message.event);
    } else {
      await this.handleReport();
    }
  }

  private handleEnqueue(event: E): void {
    this.state.unreportedEvents.push(event);
    this.maybeScheduleReport();
  }

  private maybeScheduleReport(): void {
    if (this.state.reportScheduled) {
      return;
    }
    if (this.state.unreportedEvents.length === 0) {
      return;
    }

    if (this.state.batchTime > 0) {
      this.timer = setTimeout(() => {
        this.timer = undefined;
        this.post({ type: 'report' });
      }, this.state.batchTime);
    } else {
      this.post({ type: 'report' });
    }

    this.state.reportScheduled = true;
    this.logger.debug({ batchTime: this.state.batchTime }, 'Report scheduled');
  }

  private async handleReport(): Promise<void> {
    const events = this.state.unreportedEvents;

    if (events.length === 0) {
      this.state.reportScheduled = false;
      return;
    }

    let failure: SinkFailureError | undefined;
    try {
      failure = await this.invokeSink(events);
    } finally {
      this.state.unreportedEvents = [];
      this.state.reportScheduled = false;
    }

    // A reporter stopped while its sink was running reports nothing further
    if (failure && !this.stopped) {
      this.handleSinkFailure(failure);
    }
  }

  /**
   * Run the sink to completion. Returns the failure instead of throwing so
   * the caller always reaches the state reset.
   */
  private async invokeSink(events: readonly E[]): Promise<SinkFailureError | undefined> {
    const startedAt = Date.now();
    try {
      await this.state.reportFn(events);
      this.logger.debug({ batchSize: events.length, durationMs: Date.now() - startedAt }, 'Batch reported');
      return undefined;
    } catch (error) {
      return new SinkFailureError('Sink failed to report batch', {
        cause: toError(error),
        reporter: this.name,
        batchSize: events.length,
      });
    }
  }

  private handleSinkFailure(failure: SinkFailureError): void {
    logError(failure, {
      reporter: this.name,
      batchSize: failure.options.batchSize,
      policy: this.onSinkFailure,
    }, this.logger);

    if (this.onSinkFailure === 'restart') {
      const dropped = this.mailbox.length;
      this.mailbox = [];
      this.logger.warn({ dropped }, 'Reporter restarted with fresh state');
    }

    if (this.onError) {
      try {
        this.onError(failure);
      } catch (error) {
        this.logger.error({ err: toError(error) }, 'onError handler threw');
      }
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}

/**
 * Start a reporter that flushes to `reportFn` at most every `batchTime` ms.
 */
export function start<E>(
  reportFn: ReportFn<E>,
  batchTime = 0,
  options: BatchReporterOptions = {}
): BatchReporter<E> {
  return new BatchReporter(reportFn, batchTime, options);
}

export function enqueue<E>(reporter: BatchReporter<E>, event: E): void {
  reporter.enqueue(event);
}
