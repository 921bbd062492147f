export { BatchReporter, start, enqueue } from './batch-reporter.js';
export { ReporterRegistry, defaultRegistry, getReporterName, startReporters } from './registry.js';
export type {
  BatchReporterOptions,
  ReportFn,
  ReporterMessage,
  ReporterState,
  SinkFailurePolicy,
} from './types.js';
