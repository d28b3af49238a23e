/**
 * Validation for values crossing the native boundary.
 */

import { z } from 'zod';

import type { RawSignal } from './types.js';

const u32 = z.number().int().min(0).max(0xffff_ffff);
const i32 = z.number().int().min(-0x8000_0000).max(0x7fff_ffff);

/** Struct as laid out by the engine's C header. */
export const NativeDetectionResultSchema = z.object({
  is_detected: z.boolean(),
  window_count: u32,
  screen_capture_evasion_count: u32,
  elevated_layer_count: u32,
  max_layer_detected: i32,
});

export const WindowCountSchema = u32;

export type NativeDetectionResult = z.infer<typeof NativeDetectionResultSchema>;

export function toRawSignal(result: NativeDetectionResult): RawSignal {
  return {
    isDetected: result.is_detected,
    windowCount: result.window_count,
    screenCaptureEvasionCount: result.screen_capture_evasion_count,
    elevatedLayerCount: result.elevated_layer_count,
    maxLayerDetected: result.max_layer_detected,
  };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}
