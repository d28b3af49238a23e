/**
 * Detection Engine
 *
 * Contract for the platform-native engine that reports raw window counters,
 * plus the koffi binding to its dynamic library.
 *
 * @module
 */

export type {
  RawSignal,
  ReportHandle,
  SignalSource,
  NativeSourceOptions,
} from './types.js';

export {
  NativeDetectionResultSchema,
  WindowCountSchema,
  toRawSignal,
  type NativeDetectionResult,
} from './schema.js';

export {
  LIBRARY_NAME,
  DEFAULT_LIBRARY_PATHS,
  NativeSignalSource,
  locateLibrary,
  openNativeSource,
  type NativeBindings,
} from './native.js';
