export type WatchpostErrorCode =
  | "DEVICE_PROBE_FAILED"
  | "NO_DEVICE_AVAILABLE"
  | "DEVICE_SELECTION_CANCELLED"
  | "DEVICE_OPEN_FAILED"
  | "FRAME_READ_FAILED"
  | "DETECTION_FAILED"
  | "NOTIFICATION_DISPATCH_FAILED"
  | "INVALID_CONFIG";

export class WatchpostError extends Error {
  readonly code: WatchpostErrorCode;

  constructor(code: WatchpostErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DeviceProbeError extends WatchpostError {
  readonly deviceIndex: number;

  constructor(deviceIndex: number, cause?: unknown) {
    super("DEVICE_PROBE_FAILED", `Probe failed for camera ${deviceIndex}`, { cause });
    this.deviceIndex = deviceIndex;
  }
}

export class NoDeviceAvailableError extends WatchpostError {
  constructor(maxDevices: number) {
    super("NO_DEVICE_AVAILABLE", `No available cameras found (probed ${Math.max(0, maxDevices)} indices)`);
  }
}

export class DeviceSelectionCancelledError extends WatchpostError {
  constructor() {
    super("DEVICE_SELECTION_CANCELLED", "Camera selection cancelled");
  }
}

export class DeviceOpenError extends WatchpostError {
  readonly deviceIndex: number;

  constructor(deviceIndex: number, reason: string, cause?: unknown) {
    super("DEVICE_OPEN_FAILED", `Failed to open camera ${deviceIndex}: ${reason}`, { cause });
    this.deviceIndex = deviceIndex;
  }
}

export class ReadError extends WatchpostError {
  constructor(reason: string, cause?: unknown) {
    super("FRAME_READ_FAILED", `Failed to read frame: ${reason}`, { cause });
  }
}

export class DetectionError extends WatchpostError {
  constructor(reason: string, cause?: unknown) {
    super("DETECTION_FAILED", `Detection failed: ${reason}`, { cause });
  }
}

export class NotificationDispatchError extends WatchpostError {
  readonly destination: string;

  constructor(destination: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("NOTIFICATION_DISPATCH_FAILED", `Failed to send notification to ${destination}: ${reason}`, { cause });
    this.destination = destination;
  }
}

export class ConfigError extends WatchpostError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super("INVALID_CONFIG", `Invalid configuration: ${problems.join("; ")}`);
    this.problems = problems;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
