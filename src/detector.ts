/**
 * Detector
 *
 * Stateless queries against a signal source, and the entry point for
 * creating monitors over the same source.
 *
 * @example
 * ```typescript
 * import { createDetector, openNativeSource, summarize } from 'cluely-watch';
 *
 * const detector = createDetector(await openNativeSource());
 * console.log(summarize(detector.detectDetailed()));
 *
 * const monitor = detector.createMonitor();
 * monitor.start(5000, {
 *   onDetected: (snapshot) => console.log('Detected', snapshot.assessment.severity),
 *   onRemoved: () => console.log('Gone'),
 * });
 * ```
 */

import type { SignalSource } from './engine/types.js';
import type { Snapshot } from './detection/types.js';
import type { Logger } from './logger.js';
import type { MonitorOptions } from './runtime/types.js';
import { acquireSnapshot, readReport } from './detection/snapshot.js';
import { DetectionMonitor } from './runtime/monitor.js';
import { AcquisitionError, errorMessage } from './errors.js';
import { consoleLogger } from './logger.js';

export interface DetectorOptions {
  logger?: Logger;
  now?: () => number;
}

export interface BasicDetection {
  isDetected: boolean;
  windowCount: number;
}

export class Detector {
  private readonly source: SignalSource;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(source: SignalSource, options?: DetectorOptions) {
    this.source = source;
    this.logger = options?.logger ?? consoleLogger;
    this.now = options?.now ?? Date.now;
  }

  isDetected(): boolean {
    return this.detect().isDetected;
  }

  detect(): BasicDetection {
    const signal = guard('Detection query', () => this.source.queryDetection());
    return { isDetected: signal.isDetected, windowCount: signal.windowCount };
  }

  /**
   * Full snapshot: counters, classification, report text and timestamp.
   */
  detectDetailed(): Snapshot {
    return acquireSnapshot(this.source, this.now);
  }

  getReport(): string {
    return readReport(this.source);
  }

  getWindowCount(): number {
    return guard('Window count query', () => this.source.queryWindowCount());
  }

  /**
   * Monitor over this detector's source. Inherits its logger and clock
   * unless overridden.
   */
  createMonitor(options?: MonitorOptions): DetectionMonitor {
    return new DetectionMonitor(this.source, {
      ...options,
      logger: options?.logger ?? this.logger,
      now: options?.now ?? this.now,
    });
  }
}

export function createDetector(source: SignalSource, options?: DetectorOptions): Detector {
  return new Detector(source, options);
}

function guard<T>(what: string, query: () => T): T {
  try {
    return query();
  } catch (err) {
    if (err instanceof AcquisitionError) throw err;
    throw new AcquisitionError(`${what} failed: ${errorMessage(err)}`, { cause: err });
  }
}
