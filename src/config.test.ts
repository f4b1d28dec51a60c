import { expect, test } from "vitest";
import { parseConfig } from "./config.ts";
import { ConfigError } from "./errors.ts";

function problemsOf(args: string[], env: Record<string, string> = {}): string[] {
  try {
    parseConfig(args, env);
  } catch (error) {
    if (error instanceof ConfigError) return error.problems;
    throw error;
  }
  return [];
}

test("mock mode needs no detector or credentials", () => {
  expect(parseConfig(["--mock"], {})).toEqual({
    mock: true,
    mockPattern: "gradient",
    dryRun: false,
    cameraIndex: undefined,
    maxDevices: 5,
    fps: 10,
    width: 1280,
    height: 720,
    inputFormat: undefined,
    targetLabel: "person",
    minConfidence: 0.5,
    cooldownSeconds: 60,
    detectorUrl: undefined,
    transport: "log",
    smtp: undefined,
    webhookUrl: undefined,
    destination: "log",
    statusIntervalSeconds: 0,
    logLevel: undefined,
  });
});

test("every missing requirement is reported at once", () => {
  expect(problemsOf([])).toEqual([
    "a detector URL is required (--detector-url or WATCHPOST_DETECTOR_URL)",
    "a sender address is required (--sender or SMTP_SENDER)",
    "SMTP_PASSWORD is required for the smtp transport",
    "a recipient address is required (--to or ALERT_RECIPIENT)",
  ]);
});

test("the error message joins the problems", () => {
  expect(() => parseConfig(["--mock", "--transport", "pigeon"], {})).toThrow(
    'Invalid configuration: --transport must be one of smtp, webhook, log, got "pigeon"',
  );
});

test("smtp settings come from the environment", () => {
  const config = parseConfig([], {
    WATCHPOST_DETECTOR_URL: "http://localhost:8000/detect",
    SMTP_SENDER: "camera@example.com",
    SMTP_PASSWORD: "test-secret",
    ALERT_RECIPIENT: "owner@example.com",
    SMTP_PORT: "465",
  });

  expect(config.transport).toBe("smtp");
  expect(config.smtp).toEqual({
    sender: "camera@example.com",
    password: "test-secret",
    host: "smtp.gmail.com",
    port: 465,
  });
  expect(config.destination).toBe("owner@example.com");
  expect(config.detectorUrl).toBe("http://localhost:8000/detect");
});

test("flags take precedence over the environment", () => {
  const config = parseConfig(["--mock", "--label", "cat", "--cooldown", "5"], {
    WATCHPOST_TARGET_LABEL: "dog",
    WATCHPOST_COOLDOWN_SECONDS: "30",
  });
  expect(config.targetLabel).toBe("cat");
  expect(config.cooldownSeconds).toBe(5);
});

test("numeric settings are clamped into range", () => {
  const config = parseConfig(
    ["--mock", "--confidence", "1.5", "--cooldown", "-5", "--fps", "500", "--max-devices", "0"],
    {},
  );
  expect(config.minConfidence).toBe(1);
  expect(config.cooldownSeconds).toBe(0);
  expect(config.fps).toBe(60);
  expect(config.maxDevices).toBe(0);
});

test("resolution and camera index are parsed", () => {
  const config = parseConfig(["--mock", "--resolution", "640x480", "--camera", "2"], {});
  expect(config.width).toBe(640);
  expect(config.height).toBe(480);
  expect(config.cameraIndex).toBe(2);
});

test("malformed values are rejected", () => {
  expect(problemsOf(["--mock", "--camera", "front", "--resolution", "big", "--pattern", "plaid"])).toEqual([
    '--camera must be a device index from 0 to 63, got "front"',
    '--resolution must look like 1280x720, got "big"',
    "--pattern must be one of gradient, checkerboard, bars",
  ]);
});

test("the webhook transport needs an http url", () => {
  expect(problemsOf(["--mock", "--transport", "webhook", "--webhook-url", "ftp://example.com"])).toEqual([
    'webhook URL must be http(s), got "ftp://example.com"',
  ]);

  const config = parseConfig(["--mock", "--transport", "webhook", "--webhook-url", "https://example.com/hook"], {});
  expect(config.destination).toBe("https://example.com/hook");
});

test("dry run always logs instead of sending", () => {
  const config = parseConfig(["--dry-run", "--transport", "smtp", "--detector-url", "http://localhost:8000"], {});
  expect(config.transport).toBe("log");
  expect(config.smtp).toBeUndefined();
});

test("a blank label is rejected", () => {
  expect(problemsOf(["--mock", "--label", "  "])).toEqual(["--label must not be empty"]);
});

test("log level flag is case-insensitive", () => {
  expect(parseConfig(["--mock", "--log-level", "DEBUG"], {}).logLevel).toBe("debug");
  expect(problemsOf(["--mock", "--log-level", "loud"])).toEqual([
    "--log-level must be one of debug, info, warn, error, fatal",
  ]);
});

test("a camera index out of range is rejected, not clamped", () => {
  expect(problemsOf(["--mock", "--camera", "-1"])).toEqual([
    '--camera must be a device index from 0 to 63, got "-1"',
  ]);
  expect(problemsOf(["--mock", "--camera", "99"])).toEqual([
    '--camera must be a device index from 0 to 63, got "99"',
  ]);
  expect(problemsOf(["--mock"], { WATCHPOST_CAMERA: "1.5" })).toEqual([
    '--camera must be a device index from 0 to 63, got "1.5"',
  ]);
  expect(parseConfig(["--mock", "--camera", "63"], {}).cameraIndex).toBe(63);
});

test("mock mode accepts an optional detector URL", () => {
  expect(parseConfig(["--mock", "--detector-url", "http://localhost:9003/detect"], {}).detectorUrl).toBe(
    "http://localhost:9003/detect",
  );
  expect(problemsOf(["--mock", "--detector-url", "ftp://localhost/detect"])).toEqual([
    'detector URL must be http(s), got "ftp://localhost/detect"',
  ]);
});
