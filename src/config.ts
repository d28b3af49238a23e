/**
 * Monitor configuration.
 *
 * Partial configs merge onto defaults and are validated with zod.
 */

import { z } from 'zod';

import { MonitorConfigError } from './errors.js';
import { formatIssues } from './engine/schema.js';

export const DEFAULT_INTERVAL_MS = 10_000;
export const DEFAULT_STOP_TIMEOUT_MS = 5_000;

/** Delay between cycle starts (0 = back to back) */
export const IntervalSchema = z.number().int().nonnegative().finite();

export const MonitorConfigSchema = z.object({
  /** Default poll interval when start() is called without one */
  intervalMs: IntervalSchema.default(DEFAULT_INTERVAL_MS),
  /** Upper bound stop() waits for the poll loop to exit */
  stopTimeoutMs: z.number().int().positive().finite().default(DEFAULT_STOP_TIMEOUT_MS),
});

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

export function resolveMonitorConfig(config?: Partial<MonitorConfig>): MonitorConfig {
  const result = MonitorConfigSchema.safeParse(config ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new MonitorConfigError(`Invalid monitor config: ${issues.join(', ')}`, issues);
  }
  return result.data;
}
