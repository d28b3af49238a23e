/**
 * Detection Engine — koffi Wiring Tests
 *
 * koffi is replaced by an in-process fake that records what gets bound and
 * keeps named types process-wide, as the real library does.
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openNativeSource, LIBRARY_NAME } from "../../src/engine/native.js";
import { acquireSnapshot, NO_REPORT } from "../../src/detection/snapshot.js";
import { ResourceNotFoundError } from "../../src/errors.js";

interface BoundFunction {
  name: string;
  result: unknown;
  args: unknown[];
}

interface Decoded {
  ptr: unknown;
  type: unknown;
  len: unknown;
}

interface FakeKoffi {
  typeNames: Set<string>;
  loaded: string[];
  bound: BoundFunction[];
  decoded: Decoded[];
  freed: unknown[];
  report: { text: string } | null;
  loadError: Error | null;
}

const fake = vi.hoisted(() => {
  const state: FakeKoffi = {
    typeNames: new Set(),
    loaded: [],
    bound: [],
    decoded: [],
    freed: [],
    report: null,
    loadError: null,
  };
  return state;
});

vi.mock("koffi", () => {
  const implementations: Record<string, (...args: unknown[]) => unknown> = {
    detect_cluely: () => ({
      is_detected: true,
      window_count: 1,
      screen_capture_evasion_count: 0,
      elevated_layer_count: 1,
      max_layer_detected: 25,
    }),
    get_cluely_report: () => fake.report,
    free_cluely_report: (ptr) => {
      fake.freed.push(ptr);
    },
    get_cluely_window_count: () => 1,
  };

  const koffi = {
    struct: (nameOrDef: unknown) => {
      if (typeof nameOrDef === "string") {
        if (fake.typeNames.has(nameOrDef)) {
          throw new Error(`Duplicate type name '${nameOrDef}'`);
        }
        fake.typeNames.add(nameOrDef);
      }
      return { kind: "struct" };
    },
    load: (path: string) => {
      if (fake.loadError) throw fake.loadError;
      fake.loaded.push(path);
      return {
        func: (name: string, result: unknown, args: unknown[]) => {
          fake.bound.push({ name, result, args });
          const impl = implementations[name];
          if (!impl) throw new Error(`Cannot find function '${name}' in shared library`);
          return impl;
        },
      };
    },
    decode: (ptr: unknown, type: unknown, len: unknown) => {
      fake.decoded.push({ ptr, type, len });
      return fake.report?.text;
    },
  };

  return { default: koffi };
});

describe("openNativeSource (koffi)", () => {
  let dir = "";
  let libraryPath = "";

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "cluely-watch-native-"));
    libraryPath = join(dir, LIBRARY_NAME);
    await writeFile(libraryPath, "");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    fake.loaded.length = 0;
    fake.bound.length = 0;
    fake.decoded.length = 0;
    fake.freed.length = 0;
    fake.report = null;
    fake.loadError = null;
  });

  function open() {
    return openNativeSource({ platform: "darwin", libraryPaths: [libraryPath] });
  }

  it("loads the located library and binds the engine symbols", async () => {
    await open();

    expect(fake.loaded).toEqual([libraryPath]);
    expect(fake.bound.map((f) => f.name)).toEqual([
      "detect_cluely",
      "get_cluely_report",
      "free_cluely_report",
      "get_cluely_window_count",
    ]);
    expect(fake.bound[1]).toMatchObject({ result: "void *", args: [] });
    expect(fake.bound[2]).toMatchObject({ result: "void", args: ["void *"] });
    expect(fake.bound[3]).toMatchObject({ result: "uint32", args: [] });
  });

  it("reads counters through the bound functions", async () => {
    const source = await open();

    expect(source.queryDetection()).toEqual({
      isDetected: true,
      windowCount: 1,
      screenCaptureEvasionCount: 0,
      elevatedLayerCount: 1,
      maxLayerDetected: 25,
    });
    expect(source.queryWindowCount()).toBe(1);
  });

  it("maps a NULL report to the sentinel without freeing", async () => {
    const snapshot = acquireSnapshot(await open(), () => 0);

    expect(snapshot.report).toBe(NO_REPORT);
    expect(fake.decoded).toEqual([]);
    expect(fake.freed).toEqual([]);
  });

  it("decodes a report as a NUL-terminated string and frees it once", async () => {
    const buffer = { text: "1 window above the screen saver layer" };
    fake.report = buffer;

    const snapshot = acquireSnapshot(await open(), () => 0);

    expect(snapshot.report).toBe("1 window above the screen saver layer");
    expect(fake.decoded).toEqual([{ ptr: buffer, type: "char", len: -1 }]);
    expect(fake.freed).toEqual([buffer]);
  });

  it("opens more than once in the same process", async () => {
    const first = await open();
    const second = await open();

    expect(first.queryDetection().isDetected).toBe(true);
    expect(second.queryDetection().isDetected).toBe(true);
    expect(fake.loaded).toEqual([libraryPath, libraryPath]);
  });

  it("reports an unloadable library as ResourceNotFoundError", async () => {
    const cause = new Error("not a mach-o file");
    fake.loadError = cause;

    const err = await open().then(
      () => undefined,
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(ResourceNotFoundError);
    if (err instanceof ResourceNotFoundError) {
      expect(err.message).toBe(`Could not load ${libraryPath}: not a mach-o file`);
      expect(err.searchedPaths).toEqual([libraryPath]);
      expect(err.cause).toBe(cause);
    }
  });
});
