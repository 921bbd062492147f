/**
 * Type definitions for the batch reporter actor.
 */

import type { Logger } from 'pino';
import type { SinkFailureError } from '../utils/errors.js';

/**
 * Downstream sink. Receives a non-empty batch, oldest event first.
 * A returned promise holds the reporter until it settles.
 */
export type ReportFn<E> = (events: readonly E[]) => void | Promise<void>;

/**
 * What the reporter does with its mailbox after a sink failure.
 *
 * - `reset`: keep processing queued messages with a clean buffer
 * - `restart`: also drop queued messages, as a fresh actor would start
 */
export type SinkFailurePolicy = 'reset' | 'restart';

export interface BatchReporterOptions {
  /** Name used in log lines and by the registry */
  name?: string;
  /** Logger to use instead of the `BatchReporter` child logger */
  logger?: Logger;
  /** Default: 'reset' */
  onSinkFailure?: SinkFailurePolicy;
  /** Called after a failed flush, once state has been reset */
  onError?: (error: SinkFailureError) => void;
}

/**
 * Mutable state owned by a single reporter.
 */
export interface ReporterState<E> {
  readonly reportFn: ReportFn<E>;
  /** Milliseconds between scheduling and flushing; 0 flushes on the next turn */
  readonly batchTime: number;
  reportScheduled: boolean;
  /** Buffered events in enqueue order */
  unreportedEvents: E[];
}

export type ReporterMessage<E> =
  | { type: 'enqueue'; event: E }
  | { type: 'report' };
