/**
 * Application-wide constants.
 */

/**
 * Reporter defaults applied when a configuration entry leaves a field out
 */
export const REPORTER_DEFAULTS = {
  /** Flush on the next mailbox turn */
  BATCH_TIME_MS: 0,

  /** Keep processing queued messages after a sink failure */
  ON_SINK_FAILURE: 'reset',

  /** Appended to `reporterName` to form the registry name */
  NAME_SUFFIX: '_batch_reporter',
} as const;

/**
 * Configuration file names to search for, in priority order.
 */
export const CONFIG_FILE_NAMES = [
  'batch-reporter.config.yaml',
  'batch-reporter.config.yml',
] as const;
