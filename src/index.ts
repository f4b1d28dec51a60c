import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";
import { emitKeypressEvents } from "node:readline";
import { formatHelp, getAction, type Action } from "./app/controls.ts";
import { createCameraFactory, createDetector, createSelector, createTransport } from "./app/factories.ts";
import { formatStatus } from "./app/status-line.ts";
import { createCameraProbe } from "./camera/device-enumerator.ts";
import { selectCameraIndex } from "./camera/device-selector.ts";
import { parseConfig } from "./config.ts";
import { DeviceSelectionCancelledError, WatchpostError, describeError } from "./errors.ts";
import { configureLogging, getLogger } from "./logger.ts";
import { Notifier } from "./notify/notifier.ts";
import { SurveillanceSession } from "./session/surveillance-session.ts";

dotenvExpand.expand(dotenv.config());

const logger = getLogger("cli");

function bindKeys(onAction: (action: Action) => void): () => void {
  const stdin = process.stdin;
  if (!stdin.isTTY) return () => {};

  emitKeypressEvents(stdin);
  stdin.setRawMode(true);
  const listener = (_text: string | undefined, key: { name?: string; ctrl?: boolean } | undefined) => {
    const action = getAction(key?.name, key?.ctrl ?? false);
    if (action) onAction(action);
  };
  stdin.on("keypress", listener);
  stdin.resume();

  return () => {
    stdin.off("keypress", listener);
    stdin.setRawMode(false);
    stdin.pause();
  };
}

async function main(): Promise<void> {
  const config = parseConfig();
  configureLogging(process.env, { level: config.logLevel });

  logger.info("Starting watchpost", {
    mock: config.mock,
    dryRun: config.dryRun,
    transport: config.transport,
    targetLabel: config.targetLabel,
    minConfidence: config.minConfidence,
    cooldownSeconds: config.cooldownSeconds,
  });

  const cameraFactory = createCameraFactory(config);
  const deviceIndex = await selectCameraIndex({
    probe: createCameraProbe(cameraFactory),
    selector: createSelector(config),
    maxDevices: config.maxDevices,
  });

  const notifier = new Notifier({ transport: createTransport(config) });
  const session = new SurveillanceSession({
    camera: cameraFactory(deviceIndex),
    detector: createDetector(config),
    notifier,
    config: {
      targetLabel: config.targetLabel,
      minConfidence: config.minConfidence,
      cooldownSeconds: config.cooldownSeconds,
      destination: config.destination,
    },
  });

  const stop = () => session.stop();
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);

  const unbindKeys = bindKeys((action) => {
    switch (action) {
      case "quit":
        session.stop();
        break;
      case "show-status":
        logger.info(formatStatus(session.getStatus()));
        break;
    }
  });
  if (process.stdin.isTTY) {
    logger.info(formatHelp());
  }

  const statusTimer =
    config.statusIntervalSeconds > 0
      ? setInterval(() => logger.info(formatStatus(session.getStatus())), config.statusIntervalSeconds * 1000)
      : null;

  try {
    const summary = await session.start();
    logger.info("Session ended", { ...summary });
  } finally {
    if (statusTimer) clearInterval(statusTimer);
    unbindKeys();
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
    if (notifier.inFlight > 0) {
      logger.info("Waiting for notifications in flight", { inFlight: notifier.inFlight });
    }
    await notifier.drain();
  }
}

void main()
  .catch((error: unknown) => {
    if (error instanceof DeviceSelectionCancelledError) {
      logger.info(error.message);
      return;
    }
    logger.fatal(describeError(error), {
      code: error instanceof WatchpostError ? error.code : undefined,
    });
    process.exitCode = 1;
  })
  .finally(() => logger.flush());
