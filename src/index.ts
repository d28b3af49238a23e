/**
 * cluely-watch
 *
 * Point-in-time and continuous detection of Cluely monitoring software and
 * the evasion techniques its windows use, on top of a platform-native
 * detection engine.
 *
 *   engine     — raw counters from the native engine (koffi binding)
 *   detection  — classification into severity + techniques, snapshots
 *   runtime    — scheduled polling with edge-triggered callbacks
 *   detector   — stateless queries and monitor factory
 */

export * from './engine/index.js';
export * from './detection/index.js';
export * from './runtime/index.js';

export {
  Detector,
  createDetector,
  type DetectorOptions,
  type BasicDetection,
} from './detector.js';

export {
  MonitorConfigSchema,
  IntervalSchema,
  resolveMonitorConfig,
  DEFAULT_INTERVAL_MS,
  DEFAULT_STOP_TIMEOUT_MS,
  type MonitorConfig,
} from './config.js';

export {
  MonitorUsageError,
  MonitorConfigError,
  AcquisitionError,
  ResourceNotFoundError,
} from './errors.js';

export { consoleLogger, silentLogger, type Logger } from './logger.js';
