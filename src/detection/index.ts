/**
 * Detection
 *
 * Classification of raw engine counters and immutable per-poll snapshots.
 *
 * @module
 */

export type {
  SeverityTier,
  TechniqueId,
  TechniqueDescriptor,
  Assessment,
  Snapshot,
  DetectionRecord,
} from './types.js';

export { SEVERITY_RANK } from './types.js';

export {
  EVASION_SIGNALS,
  classify,
  describeTechnique,
  compareSeverity,
} from './classifier.js';

export {
  NO_REPORT,
  readReport,
  acquireSnapshot,
  createSnapshot,
  hasEvasionTechniques,
  summarize,
  toDetectionRecord,
} from './snapshot.js';
