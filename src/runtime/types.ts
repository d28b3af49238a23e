/**
 * Monitor — Type Definitions
 */

import type { Snapshot } from '../detection/types.js';
import type { MonitorConfig } from '../config.js';
import type { Logger } from '../logger.js';

// ─── Callbacks ───────────────────────────────────────────────

/**
 * Optional callback slots. A returned promise is awaited before the cycle
 * moves on; a throw or rejection is logged and does not stop the loop.
 */
export interface MonitorCallbacks {
  /** Detection started: first poll of a session, or not-detected → detected */
  onDetected?: (snapshot: Snapshot) => void | Promise<void>;

  /** Detection ended: detected → not-detected */
  onRemoved?: () => void | Promise<void>;

  /** Every successful poll, transition or not */
  onChange?: (snapshot: Snapshot) => void | Promise<void>;
}

export type CallbackName = keyof MonitorCallbacks;

// ─── Options ─────────────────────────────────────────────────

export interface MonitorOptions extends Partial<MonitorConfig> {
  /** Diagnostics sink (defaults to the console) */
  logger?: Logger;

  /** Clock for snapshot timestamps */
  now?: () => number;
}

// ─── Session State ───────────────────────────────────────────

/**
 * State of one start()..stop() session. A new session gets a new object,
 * so a loop still winding down never writes into its successor.
 */
export interface MonitorState {
  /** Cleared by stop(); checked before each cycle and around each sleep */
  running: boolean;

  /** Delay between cycle starts */
  readonly intervalMs: number;

  /** Frozen for the whole session */
  readonly callbacks: Readonly<MonitorCallbacks>;

  /** Replaced (never edited) after each successful poll */
  lastSnapshot: Snapshot | null;

  /** Aborted by stop() to cut the inter-cycle sleep short */
  readonly wake: AbortController;

  /** Set once the poll loop has exited, normally or by failing */
  exited: boolean;

  /** Settles once the poll loop has exited; never rejects */
  done: Promise<void>;
}
