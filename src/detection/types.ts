import type { Frame } from "../camera/types.ts";

/** Pixel coordinates in the frame the detection came from. */
export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface Detection {
  label: string;
  confidence: number;
  box: BoundingBox;
}

export interface Detector {
  detect(frame: Frame): Promise<Detection[]>;
}
