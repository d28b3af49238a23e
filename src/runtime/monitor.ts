/**
 * Detection Monitor
 *
 * Polls the engine on a schedule and raises edge-triggered callbacks when
 * detection starts or ends. Cycles run strictly one after another; stop()
 * is cooperative and observed before each cycle and around each sleep.
 */

import type { SignalSource } from '../engine/types.js';
import type { Snapshot } from '../detection/types.js';
import type { Logger } from '../logger.js';
import type { MonitorConfig } from '../config.js';
import type { CallbackName, MonitorCallbacks, MonitorOptions, MonitorState } from './types.js';
import { acquireSnapshot } from '../detection/snapshot.js';
import { IntervalSchema, resolveMonitorConfig } from '../config.js';
import { MonitorUsageError, errorMessage } from '../errors.js';
import { consoleLogger } from '../logger.js';

// ─── Detection Monitor ───────────────────────────────────────

export class DetectionMonitor {
  private readonly source: SignalSource;
  private readonly config: MonitorConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private state: MonitorState | null = null;

  constructor(source: SignalSource, options?: MonitorOptions) {
    this.source = source;
    this.config = resolveMonitorConfig({
      intervalMs: options?.intervalMs,
      stopTimeoutMs: options?.stopTimeoutMs,
    });
    this.logger = options?.logger ?? consoleLogger;
    this.now = options?.now ?? Date.now;
  }

  /**
   * Begin polling. The first poll runs right after start() returns.
   *
   * @throws MonitorUsageError if already running, if the previous session's
   *   loop has not exited yet, or if the interval is invalid
   */
  start(intervalMs: number = this.config.intervalMs, callbacks: MonitorCallbacks = {}): void {
    if (this.state?.running) {
      throw new MonitorUsageError('Monitor is already running');
    }
    if (this.state && !this.state.exited) {
      throw new MonitorUsageError('Previous poll loop has not exited yet');
    }

    const interval = IntervalSchema.safeParse(intervalMs);
    if (!interval.success) {
      throw new MonitorUsageError(`Invalid poll interval: ${intervalMs}`);
    }

    const state: MonitorState = {
      running: true,
      intervalMs: interval.data,
      callbacks: Object.freeze({ ...callbacks }),
      lastSnapshot: null,
      wake: new AbortController(),
      exited: false,
      done: Promise.resolve(),
    };
    state.done = this.runLoop(state).then(
      () => {
        state.exited = true;
      },
      (err: unknown) => {
        state.running = false;
        state.exited = true;
        this.reportLoopFailure(err);
      },
    );
    this.state = state;

    this.logger.info?.(`Monitoring started (interval ${state.intervalMs}ms)`);
  }

  /**
   * Stop polling and wait for the loop to exit, at most stopTimeoutMs.
   * A cycle already in flight finishes, callbacks included; no new one starts.
   * If the bound expires first, start() is refused until that cycle ends, so
   * two sessions never poll the source at once.
   */
  async stop(): Promise<void> {
    const state = this.state;
    if (!state || !state.running) return;

    state.running = false;
    state.wake.abort();

    const exited = await settlesWithin(state.done, this.config.stopTimeoutMs);
    if (exited) {
      this.logger.info?.('Monitoring stopped');
    } else {
      this.logger.warn(
        `Poll loop still busy after ${this.config.stopTimeoutMs}ms; it will exit at its next checkpoint`,
      );
    }
  }

  /**
   * Snapshot from the most recent successful poll, or null before the
   * first one. Kept after stop() until the next start().
   */
  getLastDetection(): Snapshot | null {
    return this.state?.lastSnapshot ?? null;
  }

  isRunning(): boolean {
    return this.state?.running ?? false;
  }

  // ─── Poll Loop ─────────────────────────────────────────────

  private async runLoop(state: MonitorState): Promise<void> {
    // Let start() return before the first cycle
    await Promise.resolve();

    while (state.running) {
      const startedAt = Date.now();
      await this.runCycle(state);

      if (!state.running) break;

      const elapsed = Date.now() - startedAt;
      await sleep(Math.max(0, state.intervalMs - elapsed), state.wake.signal);
    }

    this.logger.debug?.('Poll loop exited');
  }

  private async runCycle(state: MonitorState): Promise<void> {
    let snapshot: Snapshot;
    try {
      snapshot = acquireSnapshot(this.source, this.now);
    } catch (err) {
      this.logger.warn(`Poll failed, keeping last snapshot: ${errorMessage(err)}`);
      return;
    }

    const previous = state.lastSnapshot;
    const detected = snapshot.signal.isDetected;
    const { onDetected, onRemoved, onChange } = state.callbacks;

    if (detected && (previous === null || !previous.signal.isDetected)) {
      this.logger.debug?.(`Detection started (${snapshot.assessment.severity} severity)`);
      await this.dispatch('onDetected', onDetected && (() => onDetected(snapshot)));
    } else if (!detected && previous?.signal.isDetected) {
      this.logger.debug?.('Detection ended');
      await this.dispatch('onRemoved', onRemoved);
    }

    await this.dispatch('onChange', onChange && (() => onChange(snapshot)));

    state.lastSnapshot = snapshot;
  }

  private reportLoopFailure(err: unknown): void {
    const message = `Poll loop failed: ${errorMessage(err)}`;
    try {
      this.logger.error(message);
    } catch {
      consoleLogger.error(message);
    }
  }

  private async dispatch(
    name: CallbackName,
    invoke: (() => void | Promise<void>) | undefined,
  ): Promise<void> {
    if (!invoke) return;

    try {
      await invoke();
    } catch (err) {
      this.logger.error(`${name} callback failed: ${errorMessage(err)}`);
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────

/**
 * Resolves after ms, or as soon as the signal aborts.
 */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const wake = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', wake);
      resolve();
    };
    const timer = setTimeout(wake, ms);
    signal.addEventListener('abort', wake, { once: true });
  });
}

/**
 * True if the promise settles within ms, false if the bound expires first.
 */
function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    const settle = () => {
      clearTimeout(timer);
      resolve(true);
    };
    void promise.then(settle, settle);
  });
}
