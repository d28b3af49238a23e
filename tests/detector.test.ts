/**
 * Detector Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createDetector, Detector } from "../src/detector.js";
import { AcquisitionError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { ScriptedSource, detected, signal } from "./helpers/scripted-source.js";

describe("Detector", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("reports whether detection is active", () => {
    expect(createDetector(new ScriptedSource([detected()])).isDetected()).toBe(true);
    expect(createDetector(new ScriptedSource([signal()])).isDetected()).toBe(false);
  });

  it("returns the basic counters", () => {
    const detector = createDetector(new ScriptedSource([detected({ windowCount: 3 })]));
    expect(detector.detect()).toEqual({ isDetected: true, windowCount: 3 });
  });

  it("returns a full snapshot stamped by its clock", () => {
    const detector = new Detector(
      new ScriptedSource([detected({ screenCaptureEvasionCount: 1, elevatedLayerCount: 1 })], {
        report: "two evasive windows",
      }),
      { now: () => 1000 },
    );

    const snapshot = detector.detectDetailed();
    expect(snapshot.assessment.severity).toBe("High");
    expect(snapshot.report).toBe("two evasive windows");
    expect(snapshot.timestamp).toBe(1000);
  });

  it("returns the report text and releases the buffer", () => {
    const source = new ScriptedSource([], { report: "window 42 hidden from capture" });
    expect(createDetector(source).getReport()).toBe("window 42 hidden from capture");
    expect(source.released).toHaveLength(1);
  });

  it("returns the window count", () => {
    expect(createDetector(new ScriptedSource([], { windowCount: 2 })).getWindowCount()).toBe(2);
  });

  it("wraps engine failures in AcquisitionError", () => {
    const detector = createDetector(new ScriptedSource([new Error("no access")]));
    try {
      detector.detect();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AcquisitionError);
      if (err instanceof AcquisitionError) {
        expect(err.message).toBe("Detection query failed: no access");
      }
    }
  });

  it("keeps its logger when monitor options leave it undefined", async () => {
    vi.useFakeTimers();
    const info: string[] = [];
    const detector = createDetector(new ScriptedSource([signal()]), {
      logger: { info: (msg) => info.push(msg), warn: () => {}, error: () => {} },
    });
    const monitor = detector.createMonitor({ logger: undefined, now: undefined, intervalMs: 100 });

    monitor.start();
    await vi.advanceTimersByTimeAsync(0);
    await monitor.stop();

    expect(info).toEqual(["Monitoring started (interval 100ms)", "Monitoring stopped"]);
    expect(typeof monitor.getLastDetection()?.timestamp).toBe("number");
  });

  it("creates monitors sharing its source and clock", async () => {
    vi.useFakeTimers();
    const detector = createDetector(new ScriptedSource([detected()]), {
      logger: silentLogger,
      now: () => 7,
    });
    const monitor = detector.createMonitor({ intervalMs: 100 });

    monitor.start();
    await vi.advanceTimersByTimeAsync(0);
    await monitor.stop();

    expect(monitor.getLastDetection()?.timestamp).toBe(7);
  });
});
