/**
 * Detection — Classifier
 *
 * Maps raw engine counters to a severity tier and the evasion techniques
 * in use. Pure; safe to call from anywhere.
 */

import type { RawSignal } from '../engine/types.js';
import type {
  Assessment,
  SeverityTier,
  TechniqueDescriptor,
  TechniqueId,
} from './types.js';
import { SEVERITY_RANK } from './types.js';

// ─── Evasion Signals ─────────────────────────────────────────

interface EvasionSignal {
  id: TechniqueId;
  label: string;
  count: (signal: RawSignal) => number;
}

/**
 * Every recognized evasion signal, in reporting order.
 * Severity scales with how many of these are present.
 */
export const EVASION_SIGNALS: readonly EvasionSignal[] = [
  {
    id: 'screen-capture-evasion',
    label: 'Screen capture evasion',
    count: (s) => s.screenCaptureEvasionCount,
  },
  {
    id: 'elevated-layer',
    label: 'Elevated layer positioning',
    count: (s) => s.elevatedLayerCount,
  },
];

const TIERS_BY_TECHNIQUE_COUNT: readonly SeverityTier[] = ['Low', 'Medium', 'High'];

const NOT_DETECTED: Assessment = Object.freeze({
  severity: 'None',
  techniques: Object.freeze([]),
});

// ─── Classification ──────────────────────────────────────────

export function classify(signal: RawSignal): Assessment {
  // isDetected wins over any stray sub-counts
  if (!signal.isDetected) {
    return NOT_DETECTED;
  }

  const techniques: TechniqueDescriptor[] = [];
  for (const evasion of EVASION_SIGNALS) {
    const windowCount = evasion.count(signal);
    if (windowCount > 0) {
      techniques.push(Object.freeze({ id: evasion.id, label: evasion.label, windowCount }));
    }
  }

  const tier = Math.min(techniques.length, TIERS_BY_TECHNIQUE_COUNT.length - 1);

  return Object.freeze({
    severity: TIERS_BY_TECHNIQUE_COUNT[tier],
    techniques: Object.freeze(techniques),
  });
}

/**
 * e.g. "Screen capture evasion (2 windows)"
 */
export function describeTechnique(technique: TechniqueDescriptor): string {
  return `${technique.label} (${technique.windowCount} windows)`;
}

export function compareSeverity(a: SeverityTier, b: SeverityTier): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}
