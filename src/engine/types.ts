/**
 * Detection Engine — Type Definitions
 *
 * Contract consumed from the platform-native engine that inspects OS windows.
 */

// ─── Raw Counters ────────────────────────────────────────────

export interface RawSignal {
  /** True if any monitoring window was found */
  readonly isDetected: boolean;

  /** Total number of monitoring windows */
  readonly windowCount: number;

  /** Windows excluded from screen capture */
  readonly screenCaptureEvasionCount: number;

  /** Windows positioned above the normal window layer */
  readonly elevatedLayerCount: number;

  /** Highest window layer seen */
  readonly maxLayerDetected: number;
}

// ─── Report Buffers ──────────────────────────────────────────

/**
 * Opaque handle to a report buffer owned by the engine.
 * Only the source that produced it can decode or release it.
 */
export type ReportHandle = unknown;

// ─── Signal Source ───────────────────────────────────────────

export interface SignalSource {
  /** One detection query */
  queryDetection(): RawSignal;

  /** Fetch the engine's report buffer, or null when it produced none */
  queryReport(): ReportHandle | null;

  /** Copy the buffer's text into a JS string */
  decodeReport(handle: ReportHandle): string;

  /** Release a buffer returned by queryReport. Exactly once per handle. */
  releaseReport(handle: ReportHandle): void;

  /** Window count, independent of queryDetection */
  queryWindowCount(): number;
}

// ─── Native Binding ──────────────────────────────────────────

export interface NativeSourceOptions {
  /** Candidate paths for the engine's dynamic library, tried in order */
  libraryPaths?: string[];

  /** Host platform (defaults to process.platform) */
  platform?: NodeJS.Platform;
}
