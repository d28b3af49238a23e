/**
 * Detection — Snapshot Acquisition
 *
 * One poll against the engine: a detection query, a report query, and the
 * release of the engine's report buffer on every path.
 */

import type { RawSignal, ReportHandle, SignalSource } from '../engine/types.js';
import type { DetectionRecord, Snapshot } from './types.js';
import { classify, describeTechnique } from './classifier.js';
import { AcquisitionError, errorMessage } from '../errors.js';

export const NO_REPORT = 'No report available';

// ─── Report Buffers ──────────────────────────────────────────

/**
 * Fetch the engine report as an owned string. The buffer is released
 * even when decoding throws.
 */
export function readReport(source: SignalSource): string {
  let handle: ReportHandle | null;
  try {
    handle = source.queryReport();
  } catch (err) {
    throw new AcquisitionError(`Report query failed: ${errorMessage(err)}`, { cause: err });
  }

  if (handle === null) {
    return NO_REPORT;
  }

  try {
    const text = source.decodeReport(handle);
    return text || NO_REPORT;
  } catch (err) {
    throw new AcquisitionError(`Report decode failed: ${errorMessage(err)}`, { cause: err });
  } finally {
    source.releaseReport(handle);
  }
}

// ─── Acquisition ─────────────────────────────────────────────

export function acquireSnapshot(
  source: SignalSource,
  now: () => number = Date.now,
): Snapshot {
  let signal: RawSignal;
  try {
    signal = source.queryDetection();
  } catch (err) {
    if (err instanceof AcquisitionError) throw err;
    throw new AcquisitionError(`Detection query failed: ${errorMessage(err)}`, { cause: err });
  }

  const report = readReport(source);

  return createSnapshot(signal, report, now());
}

export function createSnapshot(signal: RawSignal, report: string, timestamp: number): Snapshot {
  return Object.freeze({
    signal: Object.freeze({ ...signal }),
    assessment: classify(signal),
    report,
    timestamp,
  });
}

// ─── Presentation Helpers ────────────────────────────────────

export function hasEvasionTechniques(snapshot: Snapshot): boolean {
  return snapshot.assessment.techniques.length > 0;
}

/**
 * One-line description, e.g.
 * "Cluely detected (High severity) - 3 window(s) - using 2 evasion technique(s)"
 */
export function summarize(snapshot: Snapshot): string {
  if (!snapshot.signal.isDetected) {
    return 'No Cluely monitoring detected';
  }

  const parts = [`Cluely detected (${snapshot.assessment.severity} severity)`];
  if (snapshot.signal.windowCount > 0) {
    parts.push(`${snapshot.signal.windowCount} window(s)`);
  }
  if (hasEvasionTechniques(snapshot)) {
    parts.push(`using ${snapshot.assessment.techniques.length} evasion technique(s)`);
  }
  return parts.join(' - ');
}

export function toDetectionRecord(snapshot: Snapshot): DetectionRecord {
  const { signal, assessment } = snapshot;
  return {
    detected: signal.isDetected,
    window_count: signal.windowCount,
    screen_capture_evasion_count: signal.screenCaptureEvasionCount,
    elevated_layer_count: signal.elevatedLayerCount,
    max_layer_detected: signal.maxLayerDetected,
    severity: assessment.severity,
    evasion_techniques: assessment.techniques.map(describeTechnique),
    report: snapshot.report,
    timestamp: new Date(snapshot.timestamp).toISOString(),
  };
}
