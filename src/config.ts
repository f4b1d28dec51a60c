import { DEFAULT_COOLDOWN_SECONDS } from "./alert/state-machine.ts";
import { DEFAULT_MAX_DEVICES } from "./camera/device-enumerator.ts";
import { isPatternName, PATTERNS, type PatternName } from "./camera/mock-camera.ts";
import { DEFAULT_MIN_CONFIDENCE, DEFAULT_TARGET_LABEL } from "./detection/presence.ts";
import { parseNumeric, readEnv, type RuntimeEnv } from "./env.ts";
import { ConfigError } from "./errors.ts";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "./logger.ts";
import { DEFAULT_SMTP_HOST, DEFAULT_SMTP_PORT } from "./notify/smtp-transport.ts";

export type TransportKind = "smtp" | "webhook" | "log";

const TRANSPORTS: readonly TransportKind[] = ["smtp", "webhook", "log"];

export interface SmtpConfig {
  sender: string;
  password: string;
  host: string;
  port: number;
}

export interface AppConfig {
  mock: boolean;
  mockPattern: PatternName;
  dryRun: boolean;
  cameraIndex: number | undefined;
  maxDevices: number;
  fps: number;
  width: number;
  height: number;
  inputFormat: string | undefined;
  targetLabel: string;
  minConfidence: number;
  cooldownSeconds: number;
  detectorUrl: string | undefined;
  transport: TransportKind;
  smtp: SmtpConfig | undefined;
  webhookUrl: string | undefined;
  /** Recipient address, or the webhook URL when no recipient is set. */
  destination: string;
  statusIntervalSeconds: number;
  logLevel: LogLevel | undefined;
}

const DEFAULT_WIDTH = 1280;
const DEFAULT_HEIGHT = 720;
const DEFAULT_FPS = 10;

const MAX_CAMERA_INDEX = 63;

/** Out-of-range indices are rejected, never clamped. */
const parseDeviceIndex = (value: string | undefined): number | undefined => {
  const trimmed = value?.trim();
  if (!trimmed || !/^\d+$/.test(trimmed)) return undefined;
  const index = Number.parseInt(trimmed, 10);
  return index <= MAX_CAMERA_INDEX ? index : undefined;
};

const isTransportKind = (value: string): value is TransportKind =>
  (TRANSPORTS as readonly string[]).includes(value);

const isHttpUrl = (value: string): boolean => {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
};

export function parseConfig(
  args: readonly string[] = process.argv.slice(2),
  env: RuntimeEnv = process.env,
): AppConfig {
  function getArg(name: string): string | undefined {
    const idx = args.indexOf(`--${name}`);
    if (idx === -1) return undefined;
    const value = args[idx + 1];
    return value === undefined || value.startsWith("--") ? undefined : value;
  }

  function hasFlag(name: string): boolean {
    return args.includes(`--${name}`);
  }

  const problems: string[] = [];
  const mock = hasFlag("mock");
  const dryRun = hasFlag("dry-run");

  const cameraRaw = getArg("camera") ?? readEnv(env, "WATCHPOST_CAMERA");
  const cameraIndex = parseDeviceIndex(cameraRaw);
  if (cameraRaw !== undefined && cameraIndex === undefined) {
    problems.push(`--camera must be a device index from 0 to ${MAX_CAMERA_INDEX}, got "${cameraRaw}"`);
  }

  let width = DEFAULT_WIDTH;
  let height = DEFAULT_HEIGHT;
  const resolution = getArg("resolution");
  if (resolution) {
    const parts = resolution.split("x");
    if (parts.length === 2) {
      width = parseNumeric(parts[0], { min: 16, max: 7680, integer: true }) ?? DEFAULT_WIDTH;
      height = parseNumeric(parts[1], { min: 16, max: 4320, integer: true }) ?? DEFAULT_HEIGHT;
    } else {
      problems.push(`--resolution must look like 1280x720, got "${resolution}"`);
    }
  }

  const patternRaw = getArg("pattern") ?? "gradient";
  if (!isPatternName(patternRaw)) {
    problems.push(`--pattern must be one of ${PATTERNS.join(", ")}`);
  }

  const transportRaw = getArg("transport") ?? readEnv(env, "WATCHPOST_TRANSPORT");
  let transport: TransportKind = mock || dryRun ? "log" : "smtp";
  if (transportRaw !== undefined && !dryRun) {
    if (isTransportKind(transportRaw)) {
      transport = transportRaw;
    } else {
      problems.push(`--transport must be one of ${TRANSPORTS.join(", ")}, got "${transportRaw}"`);
    }
  }

  const detectorUrl = getArg("detector-url") ?? readEnv(env, "WATCHPOST_DETECTOR_URL");
  if (!detectorUrl) {
    if (!mock) problems.push("a detector URL is required (--detector-url or WATCHPOST_DETECTOR_URL)");
  } else if (!isHttpUrl(detectorUrl)) {
    problems.push(`detector URL must be http(s), got "${detectorUrl}"`);
  }

  const recipient = getArg("to") ?? readEnv(env, "ALERT_RECIPIENT");
  let smtp: SmtpConfig | undefined;
  if (transport === "smtp") {
    const sender = getArg("sender") ?? readEnv(env, "SMTP_SENDER");
    const password = readEnv(env, "SMTP_PASSWORD");
    if (!sender) problems.push("a sender address is required (--sender or SMTP_SENDER)");
    if (!password) problems.push("SMTP_PASSWORD is required for the smtp transport");
    if (!recipient) problems.push("a recipient address is required (--to or ALERT_RECIPIENT)");
    if (sender && password) {
      smtp = {
        sender,
        password,
        host: readEnv(env, "SMTP_HOST") ?? DEFAULT_SMTP_HOST,
        port: parseNumeric(readEnv(env, "SMTP_PORT"), { min: 1, max: 65535, integer: true }) ?? DEFAULT_SMTP_PORT,
      };
    }
  }

  const webhookUrl = getArg("webhook-url") ?? readEnv(env, "WATCHPOST_WEBHOOK_URL");
  if (transport === "webhook") {
    if (!webhookUrl) {
      problems.push("a webhook URL is required (--webhook-url or WATCHPOST_WEBHOOK_URL)");
    } else if (!isHttpUrl(webhookUrl)) {
      problems.push(`webhook URL must be http(s), got "${webhookUrl}"`);
    }
  }

  const targetLabel = (getArg("label") ?? readEnv(env, "WATCHPOST_TARGET_LABEL") ?? DEFAULT_TARGET_LABEL).trim();
  if (targetLabel.length === 0) {
    problems.push("--label must not be empty");
  }

  const logLevelRaw = getArg("log-level")?.toLowerCase();
  if (logLevelRaw !== undefined && !isLogLevel(logLevelRaw)) {
    problems.push(`--log-level must be one of ${LOG_LEVELS.join(", ")}`);
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    mock,
    mockPattern: isPatternName(patternRaw) ? patternRaw : "gradient",
    dryRun,
    cameraIndex,
    maxDevices:
      parseNumeric(getArg("max-devices") ?? readEnv(env, "WATCHPOST_MAX_DEVICES"), { min: 0, max: 64, integer: true }) ??
      DEFAULT_MAX_DEVICES,
    fps: parseNumeric(getArg("fps"), { min: 1, max: 60, integer: true }) ?? DEFAULT_FPS,
    width,
    height,
    inputFormat: getArg("input-format"),
    targetLabel,
    minConfidence:
      parseNumeric(getArg("confidence") ?? readEnv(env, "WATCHPOST_MIN_CONFIDENCE"), { min: 0, max: 1 }) ??
      DEFAULT_MIN_CONFIDENCE,
    cooldownSeconds:
      parseNumeric(getArg("cooldown") ?? readEnv(env, "WATCHPOST_COOLDOWN_SECONDS"), { min: 0, max: 86_400 }) ??
      DEFAULT_COOLDOWN_SECONDS,
    detectorUrl,
    transport,
    smtp,
    webhookUrl,
    destination: recipient ?? webhookUrl ?? "log",
    statusIntervalSeconds: parseNumeric(getArg("status-interval"), { min: 0, max: 3600 }) ?? 0,
    logLevel: logLevelRaw !== undefined && isLogLevel(logLevelRaw) ? logLevelRaw : undefined,
  };
}
