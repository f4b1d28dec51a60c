import { setTimeout as sleep } from "node:timers/promises";
import { DeviceOpenError, ReadError } from "../errors.ts";
import type { CameraSource, Frame } from "./types.ts";

export type PatternName = "gradient" | "checkerboard" | "bars";

export const PATTERNS: readonly PatternName[] = ["gradient", "checkerboard", "bars"];

export const isPatternName = (value: string): value is PatternName =>
  (PATTERNS as readonly string[]).includes(value);

export interface MockCameraOptions {
  deviceIndex?: number;
  width: number;
  height: number;
  fps: number;
  pattern?: PatternName;
  /** Make `open` reject, as an unplugged device would. */
  failOpen?: boolean;
  /** Reject `nextFrame` with a ReadError once this many frames were served. */
  failAfterFrames?: number;
}

/** Synthetic camera for demo runs and tests. Frames are paced at `fps`. */
export class MockCamera implements CameraSource {
  readonly deviceIndex: number;
  private width: number;
  private height: number;
  private fps: number;
  private failOpen: boolean;
  private failAfterFrames: number | undefined;
  private running = false;
  private t = 0;
  pattern: PatternName;

  /** Number of times `close` actually released the device. */
  releaseCount = 0;
  framesServed = 0;

  constructor(options: MockCameraOptions) {
    this.deviceIndex = options.deviceIndex ?? 0;
    this.width = options.width;
    this.height = options.height;
    this.fps = options.fps;
    this.pattern = options.pattern ?? "gradient";
    this.failOpen = options.failOpen ?? false;
    this.failAfterFrames = options.failAfterFrames;
  }

  async open(): Promise<void> {
    if (this.failOpen) {
      throw new DeviceOpenError(this.deviceIndex, "mock device unavailable");
    }
    this.running = true;
    this.t = 0;
  }

  async nextFrame(): Promise<Frame> {
    if (!this.running) {
      throw new ReadError("camera is not open");
    }
    if (this.failAfterFrames !== undefined && this.framesServed >= this.failAfterFrames) {
      throw new ReadError("mock stream ended");
    }
    if (this.fps > 0) {
      await sleep(1000 / this.fps);
    }
    if (!this.running) {
      throw new ReadError("camera closed");
    }
    this.framesServed++;
    return this.generateFrame();
  }

  close(): void {
    if (!this.running) return;
    this.running = false;
    this.releaseCount++;
  }

  isOpen(): boolean {
    return this.running;
  }

  private generateFrame(): Frame {
    const { width, height } = this;
    const data = new Uint8ClampedArray(width * height * 4);
    const t = this.t++;

    switch (this.pattern) {
      case "gradient":
        this.drawGradient(data, width, height, t);
        break;
      case "checkerboard":
        this.drawCheckerboard(data, width, height, t);
        break;
      case "bars":
        this.drawBars(data, width, height, t);
        break;
    }

    return { width, height, data, timestamp: performance.now() };
  }

  private drawGradient(data: Uint8ClampedArray, w: number, h: number, t: number): void {
    const speed = t * 0.02;
    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        const v = (Math.sin((x / w) * Math.PI + speed) + Math.sin((y / h) * Math.PI + speed * 0.7)) * 0.5;
        setGray(data, (y * w + x) * 4, Math.floor(((v + 1) / 2) * 255));
      }
    }
  }

  private drawCheckerboard(data: Uint8ClampedArray, w: number, h: number, t: number): void {
    const size = 4;
    const offset = Math.floor(t * 0.3);
    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        const cx = Math.floor((x + offset) / size);
        const cy = Math.floor((y + offset) / size);
        setGray(data, (y * w + x) * 4, (cx + cy) % 2 === 0 ? 240 : 15);
      }
    }
  }

  private drawBars(data: Uint8ClampedArray, w: number, h: number, t: number): void {
    const barCount = 8;
    const barWidth = Math.max(1, Math.floor(w / barCount));
    const offset = Math.floor(t * 0.5) % w;
    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        const barIndex = Math.min(barCount - 1, Math.floor(((x + offset) % w) / barWidth));
        setGray(data, (y * w + x) * 4, Math.floor((barIndex / (barCount - 1)) * 255));
      }
    }
  }
}

function setGray(data: Uint8ClampedArray, i: number, bright: number): void {
  data[i] = bright;
  data[i + 1] = bright;
  data[i + 2] = bright;
  data[i + 3] = 255;
}
