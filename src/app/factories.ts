import { FixedDeviceSelector, PromptDeviceSelector, type DeviceSelector } from "../camera/device-selector.ts";
import { FfmpegCamera } from "../camera/ffmpeg-camera.ts";
import { MockCamera } from "../camera/mock-camera.ts";
import type { CameraFactory } from "../camera/types.ts";
import type { AppConfig } from "../config.ts";
import { HttpDetector } from "../detection/http-detector.ts";
import { MockDetector } from "../detection/mock-detector.ts";
import type { Detector } from "../detection/types.ts";
import { ConfigError } from "../errors.ts";
import { LogTransport } from "../notify/log-transport.ts";
import { SmtpTransport } from "../notify/smtp-transport.ts";
import type { NotificationTransport } from "../notify/types.ts";
import { WebhookTransport } from "../notify/webhook-transport.ts";

export function createCameraFactory(config: AppConfig): CameraFactory {
  if (config.mock) {
    return (deviceIndex) =>
      new MockCamera({
        deviceIndex,
        width: config.width,
        height: config.height,
        fps: config.fps,
        pattern: config.mockPattern,
      });
  }
  return (deviceIndex) =>
    new FfmpegCamera({
      deviceIndex,
      width: config.width,
      height: config.height,
      fps: config.fps,
      inputFormat: config.inputFormat,
    });
}

/** A detector URL always wins, so `--mock --detector-url` sends the synthetic frames to the service. */
export function createDetector(config: AppConfig): Detector {
  if (config.detectorUrl) {
    return new HttpDetector({ url: config.detectorUrl });
  }
  if (config.mock) {
    return new MockDetector({ label: config.targetLabel, presentFrames: config.fps * 3, absentFrames: config.fps * 10 });
  }
  throw new ConfigError(["a detector URL is required"]);
}

export function createTransport(config: AppConfig): NotificationTransport {
  switch (config.transport) {
    case "smtp":
      if (!config.smtp) throw new ConfigError(["smtp credentials are missing"]);
      return new SmtpTransport(config.smtp);
    case "webhook":
      if (!config.webhookUrl) throw new ConfigError(["a webhook URL is required"]);
      return new WebhookTransport({ url: config.webhookUrl });
    case "log":
      return new LogTransport();
  }
}

export function createSelector(config: AppConfig, interactive = Boolean(process.stdin.isTTY)): DeviceSelector {
  if (config.cameraIndex !== undefined || config.mock || !interactive) {
    return new FixedDeviceSelector(config.cameraIndex);
  }
  return new PromptDeviceSelector();
}
