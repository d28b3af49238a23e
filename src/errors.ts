/**
 * Error types raised across the library.
 */

// ─── Lifecycle ───────────────────────────────────────────────

/** Misuse of the monitor lifecycle, e.g. starting a running monitor. */
export class MonitorUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MonitorUsageError';
  }
}

export class MonitorConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = 'MonitorConfigError';
  }
}

// ─── Engine ──────────────────────────────────────────────────

/**
 * The engine could not be queried, or returned something unusable.
 * Recovered locally by the monitor; thrown to direct callers.
 */
export class AcquisitionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AcquisitionError';
  }
}

/** The native engine library could not be found or cannot run here. */
export class ResourceNotFoundError extends Error {
  constructor(
    message: string,
    public readonly searchedPaths: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ResourceNotFoundError';
  }
}

// ─── Helpers ─────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
