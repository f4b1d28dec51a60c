import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable } from "node:stream";
import { DeviceOpenError, ReadError } from "../errors.ts";
import { getLogger } from "../logger.ts";
import type { CameraSource, Frame } from "./types.ts";

const logger = getLogger("ffmpeg-camera");

/** The parts of a spawned ffmpeg child process the camera uses. */
export type FfmpegProcess = EventEmitter & {
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
};

export type SpawnFfmpeg = (command: string, args: string[]) => FfmpegProcess;

export interface FfmpegCameraOptions {
  deviceIndex: number;
  width: number;
  height: number;
  fps: number;
  /** ffmpeg demuxer, e.g. "avfoundation" or "v4l2". Defaults by platform. */
  inputFormat?: string;
  ffmpegPath?: string;
  openTimeoutMs?: number;
  platform?: NodeJS.Platform;
  spawnProcess?: SpawnFfmpeg;
}

type FrameWaiter = {
  resolve: (frame: Frame) => void;
  reject: (error: ReadError) => void;
};

const DEFAULT_OPEN_TIMEOUT_MS = 5000;

const spawnWithPipes: SpawnFfmpeg = (command, args) =>
  spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

export function buildInputArgs(
  deviceIndex: number,
  fps: number,
  platform: NodeJS.Platform,
  inputFormat?: string,
): string[] {
  const format = inputFormat ?? (platform === "darwin" ? "avfoundation" : platform === "linux" ? "v4l2" : undefined);
  if (!format) {
    throw new DeviceOpenError(deviceIndex, `no default capture format for platform "${platform}", pass --input-format`);
  }
  const input = format === "v4l2" ? `/dev/video${deviceIndex}` : String(deviceIndex);
  return ["-f", format, "-framerate", String(fps), "-i", input];
}

/**
 * Reads raw RGBA frames from an ffmpeg child process. Only the newest
 * complete frame is kept, so a slow consumer always gets a fresh frame
 * instead of a backlog.
 */
export class FfmpegCamera implements CameraSource {
  readonly deviceIndex: number;
  private width: number;
  private height: number;
  private fps: number;
  private inputFormat: string | undefined;
  private ffmpegPath: string;
  private openTimeoutMs: number;
  private platform: NodeJS.Platform;
  private spawnProcess: SpawnFfmpeg;

  private proc: FfmpegProcess | null = null;
  private running = false;
  private ended: ReadError | null = null;
  private latest: Frame | null = null;
  private waiters: FrameWaiter[] = [];
  private lastStderr = "";

  private pending: Buffer;
  private offset = 0;

  constructor(options: FfmpegCameraOptions) {
    this.deviceIndex = options.deviceIndex;
    this.width = options.width;
    this.height = options.height;
    this.fps = options.fps;
    this.inputFormat = options.inputFormat;
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.openTimeoutMs = options.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS;
    this.platform = options.platform ?? process.platform;
    this.spawnProcess = options.spawnProcess ?? spawnWithPipes;
    this.pending = Buffer.alloc(this.frameSize * 2);
  }

  private get frameSize(): number {
    return this.width * this.height * 4;
  }

  async open(): Promise<void> {
    if (this.running) return;
    const { width, height, fps, deviceIndex } = this;

    // Let the device capture at its native size and have ffmpeg scale
    const args = [
      ...buildInputArgs(deviceIndex, fps, this.platform, this.inputFormat),
      "-vf", `scale=${width}:${height}`,
      "-pix_fmt", "rgba",
      "-f", "rawvideo",
      "-v", "error",
      "pipe:1",
    ];

    let proc: FfmpegProcess;
    try {
      proc = this.spawnProcess(this.ffmpegPath, args);
    } catch (error) {
      throw new DeviceOpenError(deviceIndex, "could not start ffmpeg", error);
    }

    this.proc = proc;
    this.running = true;
    this.ended = null;
    this.latest = null;
    this.offset = 0;
    this.lastStderr = "";

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        fail(new DeviceOpenError(deviceIndex, `no frame within ${this.openTimeoutMs}ms`));
      }, this.openTimeoutMs);

      const fail = (error: DeviceOpenError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.close();
        reject(error);
      };

      this.waiters.push({
        resolve: (frame) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          this.latest = frame;
          resolve();
        },
        reject: (error) => fail(new DeviceOpenError(deviceIndex, this.lastStderr || error.message, error)),
      });

      proc.stdout.on("data", (chunk: Buffer) => this.handleData(chunk));
      proc.stderr.on("data", (chunk: Buffer) => this.handleStderr(chunk));
      proc.once("error", (error: Error) => {
        this.finish(new ReadError(`ffmpeg failed: ${error.message}`, error));
      });
      proc.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
        this.finish(new ReadError(`ffmpeg exited (code ${code ?? "none"}, signal ${signal ?? "none"})`));
      });
    });

    logger.debug("Camera opened", { deviceIndex, width, height, fps });
  }

  nextFrame(): Promise<Frame> {
    if (this.ended) return Promise.reject(this.ended);
    if (!this.running) return Promise.reject(new ReadError("camera is not open"));

    const frame = this.latest;
    if (frame) {
      this.latest = null;
      return Promise.resolve(frame);
    }
    return new Promise<Frame>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): void {
    if (!this.running && !this.proc) return;
    this.running = false;
    const proc = this.proc;
    this.proc = null;
    if (proc) {
      proc.stdout.removeAllListeners("data");
      proc.stderr.removeAllListeners("data");
      proc.kill();
    }
    this.finish(new ReadError("camera closed"));
    logger.debug("Camera closed", { deviceIndex: this.deviceIndex });
  }

  isOpen(): boolean {
    return this.running && this.ended === null;
  }

  private handleData(chunk: Buffer): void {
    const frameSize = this.frameSize;

    // Grow buffer if needed
    if (this.offset + chunk.length > this.pending.length) {
      const grown = Buffer.alloc(Math.max(this.pending.length * 2, this.offset + chunk.length));
      this.pending.copy(grown, 0, 0, this.offset);
      this.pending = grown;
    }
    chunk.copy(this.pending, this.offset);
    this.offset += chunk.length;

    // Extract complete frames
    while (this.offset >= frameSize) {
      const data = new Uint8ClampedArray(frameSize);
      data.set(this.pending.subarray(0, frameSize));
      this.pending.copyWithin(0, frameSize, this.offset);
      this.offset -= frameSize;
      this.deliver({ width: this.width, height: this.height, data, timestamp: performance.now() });
    }
  }

  private handleStderr(chunk: Buffer): void {
    const text = chunk.toString("utf8").trim();
    if (!text) return;
    this.lastStderr = text.split("\n").at(-1) ?? text;
    logger.warn("ffmpeg reported an error", { deviceIndex: this.deviceIndex, output: text });
  }

  private deliver(frame: Frame): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
    } else {
      this.latest = frame;
    }
  }

  private finish(error: ReadError): void {
    if (this.ended) return;
    this.ended = error;
    this.latest = null;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }
}
