/**
 * Monitor
 *
 * Scheduled polling with edge-triggered detection callbacks.
 */

export type {
  MonitorCallbacks,
  CallbackName,
  MonitorOptions,
  MonitorState,
} from './types.js';

export { DetectionMonitor } from './monitor.js';
