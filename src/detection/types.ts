/**
 * Detection — Type Definitions
 */

import type { RawSignal } from '../engine/types.js';

// ─── Severity ────────────────────────────────────────────────

export type SeverityTier = 'None' | 'Low' | 'Medium' | 'High';

export const SEVERITY_RANK: Record<SeverityTier, number> = {
  None: 0,
  Low: 1,
  Medium: 2,
  High: 3,
};

// ─── Evasion Techniques ──────────────────────────────────────

export type TechniqueId = 'screen-capture-evasion' | 'elevated-layer';

export interface TechniqueDescriptor {
  /** Stable tag */
  readonly id: TechniqueId;

  /** Human-readable name */
  readonly label: string;

  /** Windows exhibiting this technique */
  readonly windowCount: number;
}

// ─── Assessment ──────────────────────────────────────────────

export interface Assessment {
  readonly severity: SeverityTier;

  /** Screen-capture evasion first, then elevated layer */
  readonly techniques: readonly TechniqueDescriptor[];
}

// ─── Snapshot ────────────────────────────────────────────────

/** One frozen capture of a poll. Superseded, never edited. */
export interface Snapshot {
  readonly signal: RawSignal;
  readonly assessment: Assessment;

  /** Engine report text, or NO_REPORT */
  readonly report: string;

  /** Capture time (epoch ms) */
  readonly timestamp: number;
}

/** JSON shape for hosts that print or ship a snapshot. */
export interface DetectionRecord {
  detected: boolean;
  window_count: number;
  screen_capture_evasion_count: number;
  elevated_layer_count: number;
  max_layer_detected: number;
  severity: SeverityTier;
  evasion_techniques: string[];
  report: string;
  timestamp: string;
}
