/**
 * Detection Engine — Native Binding
 *
 * Binds the engine's C ABI through koffi. The library is macOS-only; on any
 * other host, or when the dylib cannot be found, opening fails up front.
 */

import { existsSync } from 'node:fs';
import { z } from 'zod';

import type { NativeSourceOptions, RawSignal, ReportHandle, SignalSource } from './types.js';
import {
  NativeDetectionResultSchema,
  WindowCountSchema,
  formatIssues,
  toRawSignal,
} from './schema.js';
import { AcquisitionError, ResourceNotFoundError, errorMessage } from '../errors.js';

type Koffi = typeof import('koffi');

export const LIBRARY_NAME = 'libno_cluely_driver.dylib';

export const DEFAULT_LIBRARY_PATHS: string[] = [
  `/usr/local/lib/${LIBRARY_NAME}`,
  `/opt/homebrew/lib/${LIBRARY_NAME}`,
];

// ─── Bindings ────────────────────────────────────────────────

/**
 * Raw foreign functions. Return values are unchecked until parsed.
 */
export interface NativeBindings {
  detect(): unknown;
  getReport(): unknown;
  decodeReport(ptr: unknown): unknown;
  freeReport(ptr: unknown): void;
  getWindowCount(): unknown;
}

// ─── Source ──────────────────────────────────────────────────

export class NativeSignalSource implements SignalSource {
  constructor(private readonly bindings: NativeBindings) {}

  queryDetection(): RawSignal {
    const parsed = NativeDetectionResultSchema.safeParse(this.bindings.detect());
    if (!parsed.success) {
      throw new AcquisitionError(
        `Engine returned an unusable detection result: ${formatIssues(parsed.error).join(', ')}`,
      );
    }
    return toRawSignal(parsed.data);
  }

  queryReport(): ReportHandle | null {
    const ptr = this.bindings.getReport();
    return ptr === null || ptr === undefined ? null : ptr;
  }

  decodeReport(handle: ReportHandle): string {
    const parsed = z.string().safeParse(this.bindings.decodeReport(handle));
    if (!parsed.success) {
      throw new AcquisitionError('Engine report is not a string');
    }
    return parsed.data;
  }

  releaseReport(handle: ReportHandle): void {
    this.bindings.freeReport(handle);
  }

  queryWindowCount(): number {
    const parsed = WindowCountSchema.safeParse(this.bindings.getWindowCount());
    if (!parsed.success) {
      throw new AcquisitionError('Engine returned an unusable window count');
    }
    return parsed.data;
  }
}

// ─── Loading ─────────────────────────────────────────────────

/**
 * First existing path among the candidates.
 */
export function locateLibrary(candidates: string[]): string {
  const found = candidates.find((candidate) => existsSync(candidate));
  if (!found) {
    throw new ResourceNotFoundError(
      `Could not find ${LIBRARY_NAME} in any of the expected locations:\n${candidates.join('\n')}`,
      candidates,
    );
  }
  return found;
}

/**
 * Load the engine library and bind its functions.
 */
export async function openNativeSource(options?: NativeSourceOptions): Promise<NativeSignalSource> {
  const platform = options?.platform ?? process.platform;
  if (platform !== 'darwin') {
    throw new ResourceNotFoundError(`The detection engine is only available on macOS (host: ${platform})`);
  }

  const libraryPath = locateLibrary(options?.libraryPaths ?? DEFAULT_LIBRARY_PATHS);

  // koffi loads only once the engine is opened
  const { default: koffi } = await import('koffi');

  // Anonymous: koffi keeps named types process-wide, so a name would clash on reopen
  const DetectionResult = koffi.struct({
    is_detected: 'bool',
    window_count: 'uint32',
    screen_capture_evasion_count: 'uint32',
    elevated_layer_count: 'uint32',
    max_layer_detected: 'int32',
  });

  let functions: ReturnType<typeof bind>;
  try {
    const lib = koffi.load(libraryPath);
    functions = bind(lib, DetectionResult);
  } catch (err) {
    throw new ResourceNotFoundError(
      `Could not load ${libraryPath}: ${errorMessage(err)}`,
      [libraryPath],
      { cause: err },
    );
  }
  const { detect, getReport, freeReport, getWindowCount } = functions;

  return new NativeSignalSource({
    detect: () => detect(),
    getReport: () => getReport(),
    decodeReport: (ptr) => koffi.decode(ptr, 'char', -1),
    freeReport: (ptr) => {
      freeReport(ptr);
    },
    getWindowCount: () => getWindowCount(),
  });
}

function bind(lib: ReturnType<Koffi['load']>, detectionResult: ReturnType<Koffi['struct']>) {
  return {
    detect: lib.func('detect_cluely', detectionResult, []),
    getReport: lib.func('get_cluely_report', 'void *', []),
    freeReport: lib.func('free_cluely_report', 'void', ['void *']),
    getWindowCount: lib.func('get_cluely_window_count', 'uint32', []),
  };
}
