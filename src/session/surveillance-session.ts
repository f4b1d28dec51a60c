import { AlertStateMachine, type AlertRaisedEvent, type AlertStatus } from "../alert/state-machine.ts";
import type { CameraSource, Frame } from "../camera/types.ts";
import { classify } from "../detection/presence.ts";
import type { Detection, Detector } from "../detection/types.ts";
import { DetectionError, DeviceOpenError, ReadError, WatchpostError, describeError } from "../errors.ts";
import { getLogger, type Logger } from "../logger.ts";
import type { Notifier } from "../notify/notifier.ts";
import { createNotificationRequest } from "../notify/types.ts";

export interface SessionConfig {
  targetLabel: string;
  minConfidence: number;
  cooldownSeconds: number;
  destination: string;
}

export type SessionPhase = "idle" | "opening" | "running" | "stopped" | "failed";

export interface SessionSummary {
  reason: "stopped";
  framesProcessed: number;
  alertsRaised: number;
}

export interface SessionStatus {
  phase: SessionPhase;
  deviceIndex: number | null;
  fps: number;
  framesProcessed: number;
  alertsRaised: number;
  alertState: AlertStatus;
  present: boolean;
  notificationsInFlight: number;
}

export interface SurveillanceSessionOptions {
  camera: CameraSource;
  detector: Detector;
  notifier: Notifier;
  config: SessionConfig;
  /** Monotonic milliseconds. */
  clock?: () => number;
  logger?: Logger;
}

/**
 * Runs the frame loop for one camera: read, detect, classify, advance the
 * alert state, dispatch on a new episode. Frames are handled strictly one
 * after another. The camera is closed exactly once on every exit path.
 */
export class SurveillanceSession {
  private camera: CameraSource;
  private detector: Detector;
  private notifier: Notifier;
  private config: SessionConfig;
  private clock: () => number;
  private logger: Logger;
  private machine: AlertStateMachine;

  private phase: SessionPhase = "idle";
  private stopRequested = false;
  private awaitingFrame = false;
  private present = false;

  private framesProcessed = 0;
  private alertsRaised = 0;

  // FPS tracking
  private frameCount = 0;
  private lastFpsTime = 0;
  private currentFps = 0;

  constructor(options: SurveillanceSessionOptions) {
    this.camera = options.camera;
    this.detector = options.detector;
    this.notifier = options.notifier;
    this.config = options.config;
    this.clock = options.clock ?? (() => performance.now());
    this.logger = options.logger ?? getLogger("session");
    this.machine = new AlertStateMachine({
      cooldownSeconds: options.config.cooldownSeconds,
      clock: this.clock,
      onAlert: (event) => this.raiseAlert(event),
      onTransition: (event) => {
        this.logger.debug("Alert state changed", { ...event });
      },
    });
  }

  async start(): Promise<SessionSummary> {
    if (this.phase !== "idle") {
      throw new Error(`Session cannot start from phase "${this.phase}"`);
    }
    if (this.stopRequested) {
      this.phase = "stopped";
      return this.summary();
    }

    const deviceIndex = this.camera.deviceIndex;
    this.phase = "opening";
    try {
      await this.camera.open();
    } catch (error) {
      this.camera.close();
      if (this.stopRequested) {
        this.phase = "stopped";
        return this.summary();
      }
      this.phase = "failed";
      throw error instanceof DeviceOpenError
        ? error
        : new DeviceOpenError(deviceIndex, describeError(error), error);
    }

    this.phase = "running";
    this.lastFpsTime = this.clock();
    this.logger.info("Surveillance started", {
      deviceIndex,
      targetLabel: this.config.targetLabel,
      minConfidence: this.config.minConfidence,
      cooldownSeconds: this.config.cooldownSeconds,
    });

    try {
      while (!this.stopRequested) {
        const frame = await this.readFrame();
        if (this.stopRequested) break;
        await this.processFrame(frame);
      }
    } catch (error) {
      if (!this.stopRequested) {
        this.phase = "failed";
        this.logger.error("Surveillance stopped on error", {
          deviceIndex,
          code: error instanceof WatchpostError ? error.code : undefined,
          reason: describeError(error),
          framesProcessed: this.framesProcessed,
        });
        throw error;
      }
      this.logger.debug("Frame loop interrupted by stop", { reason: describeError(error) });
    } finally {
      this.camera.close();
    }

    this.phase = "stopped";
    this.logger.info("Surveillance stopped", { ...this.summary() });
    return this.summary();
  }

  /** Safe at any time. The current frame finishes; in-flight notifications are left alone. */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    if (this.awaitingFrame || this.phase === "opening") {
      // Unblocks a pending open or read; start() sees stopRequested and exits
      this.camera.close();
    }
  }

  getStatus(): SessionStatus {
    return {
      phase: this.phase,
      deviceIndex: this.phase === "idle" ? null : this.camera.deviceIndex,
      fps: this.currentFps,
      framesProcessed: this.framesProcessed,
      alertsRaised: this.alertsRaised,
      alertState: this.machine.getSnapshot().state.status,
      present: this.present,
      notificationsInFlight: this.notifier.inFlight,
    };
  }

  private async readFrame(): Promise<Frame> {
    this.awaitingFrame = true;
    try {
      return await this.camera.nextFrame();
    } catch (error) {
      throw error instanceof ReadError ? error : new ReadError(describeError(error), error);
    } finally {
      this.awaitingFrame = false;
    }
  }

  private async processFrame(frame: Frame): Promise<void> {
    let detections: Detection[];
    try {
      detections = await this.detector.detect(frame);
    } catch (error) {
      throw error instanceof DetectionError ? error : new DetectionError(describeError(error), error);
    }

    this.present = classify(detections, this.config.targetLabel, this.config.minConfidence);
    this.machine.update(this.present, this.clock());
    this.framesProcessed++;
    this.trackFps();
  }

  private raiseAlert(event: AlertRaisedEvent): void {
    this.alertsRaised++;
    this.logger.warn(`${this.config.targetLabel} detected, sending alert`, {
      episode: event.episode,
      destination: this.config.destination,
    });
    this.notifier.dispatch(
      createNotificationRequest({
        destination: this.config.destination,
        targetLabel: this.config.targetLabel,
      }),
    );
  }

  private trackFps(): void {
    this.frameCount++;
    const now = this.clock();
    if (now - this.lastFpsTime >= 1000) {
      this.currentFps = Math.round((this.frameCount * 1000) / (now - this.lastFpsTime));
      this.frameCount = 0;
      this.lastFpsTime = now;
    }
  }

  private summary(): SessionSummary {
    return {
      reason: "stopped",
      framesProcessed: this.framesProcessed,
      alertsRaised: this.alertsRaised,
    };
  }
}
