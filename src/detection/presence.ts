import type { Detection } from "./types.ts";

export const DEFAULT_TARGET_LABEL = "person";
export const DEFAULT_MIN_CONFIDENCE = 0.5;

/** True when any detection matches `targetLabel` at or above `minConfidence`. */
export function classify(
  detections: readonly Detection[],
  targetLabel: string = DEFAULT_TARGET_LABEL,
  minConfidence: number = DEFAULT_MIN_CONFIDENCE,
): boolean {
  return detections.some(
    (detection) => detection.label === targetLabel && detection.confidence >= minConfidence,
  );
}
