import type { Frame } from "../camera/types.ts";
import type { Detection, Detector } from "./types.ts";

export interface MockDetectorOptions {
  label?: string;
  confidence?: number;
  /** Frames the subject stays in view. */
  presentFrames?: number;
  /** Frames the subject is gone before it comes back. */
  absentFrames?: number;
}

/** Scripted detector for demo runs: the subject walks in and out on a fixed cycle. */
export class MockDetector implements Detector {
  private label: string;
  private confidence: number;
  private presentFrames: number;
  private absentFrames: number;
  private calls = 0;

  constructor(options: MockDetectorOptions = {}) {
    this.label = options.label ?? "person";
    this.confidence = options.confidence ?? 0.9;
    this.presentFrames = Math.max(0, options.presentFrames ?? 30);
    this.absentFrames = Math.max(0, options.absentFrames ?? 90);
  }

  async detect(frame: Frame): Promise<Detection[]> {
    const cycle = this.presentFrames + this.absentFrames;
    const position = cycle === 0 ? 0 : this.calls % cycle;
    this.calls++;
    if (position >= this.presentFrames) {
      return [];
    }
    const { width, height } = frame;
    return [
      {
        label: this.label,
        confidence: this.confidence,
        box: { x1: width * 0.25, y1: height * 0.1, x2: width * 0.6, y2: height * 0.95 },
      },
    ];
  }
}
