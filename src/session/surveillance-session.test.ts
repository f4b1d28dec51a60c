import { expect, test } from "vitest";
import { FfmpegCamera } from "../camera/ffmpeg-camera.ts";
import { MockCamera } from "../camera/mock-camera.ts";
import type { CameraSource } from "../camera/types.ts";
import { DetectionError, DeviceOpenError, ReadError } from "../errors.ts";
import { Notifier } from "../notify/notifier.ts";
import { createTestLogger, FakeFfmpeg, FakeTransport, ScriptedDetector } from "../testing/fakes.ts";
import { SurveillanceSession, type SessionConfig } from "./surveillance-session.ts";

const T = true;
const F = false;

const config = (cooldownSeconds: number): SessionConfig => ({
  targetLabel: "person",
  minConfidence: 0.5,
  cooldownSeconds,
  destination: "owner@example.com",
});

/**
 * Frame i is processed at i seconds. The session is stopped while the last
 * frame of the trace is being handled.
 */
function setup(
  trace: boolean[],
  cooldownSeconds: number,
  camera: CameraSource = new MockCamera({ width: 4, height: 4, fps: 0 }),
) {
  let now = 0;
  const transport = new FakeTransport();
  const logger = createTestLogger();
  const notifier = new Notifier({ transport, logger });
  const holder: { session?: SurveillanceSession } = {};
  const detector = new ScriptedDetector(trace, (index) => {
    now = index * 1000;
    if (index === trace.length - 1) holder.session?.stop();
  });
  const session = new SurveillanceSession({
    camera,
    detector,
    notifier,
    config: config(cooldownSeconds),
    clock: () => now,
    logger,
  });
  holder.session = session;
  return { session, camera, detector, notifier, transport, logger };
}

test("one notification while the subject stays within the cooldown", async () => {
  const { session, notifier, transport } = setup([T, T, T, F, F, T, T], 2);
  const summary = await session.start();
  await notifier.drain();

  expect(summary).toEqual({ reason: "stopped", framesProcessed: 7, alertsRaised: 1 });
  expect(transport.requests).toHaveLength(1);
  expect(transport.requests[0]?.destination).toBe("owner@example.com");
  expect(transport.requests[0]?.message).toBe("A person has been detected in the surveillance area!");
});

test("a shorter cooldown splits the same trace into two episodes", async () => {
  const { session, notifier, transport } = setup([T, T, T, F, F, T, T], 1);
  const summary = await session.start();
  await notifier.drain();

  expect(summary.alertsRaised).toBe(2);
  expect(transport.requests).toHaveLength(2);
});

test("a failing transport does not disturb the frame loop", async () => {
  const { session, notifier, transport, logger } = setup([T, F, F, T, F], 0);
  transport.mode = "reject";

  const summary = await session.start();
  await notifier.drain();

  expect(summary).toEqual({ reason: "stopped", framesProcessed: 5, alertsRaised: 2 });
  expect(notifier.getStats()).toEqual({ sent: 0, failed: 2, inFlight: 0 });
  expect(logger.error).toHaveBeenCalledTimes(2);
});

test("stop releases the camera once and leaves notifications in flight", async () => {
  const camera = new MockCamera({ width: 4, height: 4, fps: 0 });
  const { session, notifier, transport, detector } = setup([F, T, T], 60, camera);
  transport.mode = "hold";

  const summary = await session.start();

  expect(summary.framesProcessed).toBe(3);
  expect(detector.calls).toBe(3);
  expect(camera.framesServed).toBe(3);
  expect(camera.releaseCount).toBe(1);
  expect(camera.isOpen()).toBe(false);
  expect(notifier.inFlight).toBe(1);
  expect(session.getStatus().phase).toBe("stopped");

  transport.pending[0]?.resolve();
  await notifier.drain();
  expect(notifier.getStats()).toEqual({ sent: 1, failed: 0, inFlight: 0 });

  session.stop();
  expect(camera.releaseCount).toBe(1);
});

test("stop while waiting for a frame ends the session cleanly", async () => {
  const camera = new MockCamera({ width: 4, height: 4, fps: 20 });
  const { session } = setup([T], 60, camera);

  const running = session.start();
  setTimeout(() => session.stop(), 10);
  const summary = await running;

  expect(summary).toEqual({ reason: "stopped", framesProcessed: 0, alertsRaised: 0 });
  expect(camera.releaseCount).toBe(1);
});

test("stop while the camera is opening does not wait for the open timeout", async () => {
  const proc = new FakeFfmpeg();
  const camera = new FfmpegCamera({
    deviceIndex: 0,
    width: 2,
    height: 2,
    fps: 15,
    platform: "linux",
    openTimeoutMs: 60_000,
    spawnProcess: () => proc,
  });
  const { session, detector } = setup([T], 60, camera);

  const running = session.start();
  expect(session.getStatus().phase).toBe("opening");
  session.stop();

  expect(await running).toEqual({ reason: "stopped", framesProcessed: 0, alertsRaised: 0 });
  expect(proc.killCount).toBe(1);
  expect(detector.calls).toBe(0);
  expect(session.getStatus().phase).toBe("stopped");
});

test("stop before start never opens the camera", async () => {
  const camera = new MockCamera({ width: 4, height: 4, fps: 0 });
  const { session } = setup([T], 60, camera);
  session.stop();
  expect(await session.start()).toEqual({ reason: "stopped", framesProcessed: 0, alertsRaised: 0 });
  expect(camera.framesServed).toBe(0);
  expect(camera.releaseCount).toBe(0);
});

test("a read failure ends the session and releases the camera", async () => {
  const camera = new MockCamera({ width: 4, height: 4, fps: 0, failAfterFrames: 2 });
  const { session } = setup([F, F, F, F], 60, camera);

  await expect(session.start()).rejects.toBeInstanceOf(ReadError);
  expect(camera.releaseCount).toBe(1);
  expect(session.getStatus()).toMatchObject({ phase: "failed", framesProcessed: 2 });
});

test("a camera that cannot open stops the session before any frame", async () => {
  const camera = new MockCamera({ deviceIndex: 2, width: 4, height: 4, fps: 0, failOpen: true });
  const { session, detector } = setup([T], 60, camera);

  await expect(session.start()).rejects.toThrow(DeviceOpenError);
  expect(detector.calls).toBe(0);
  expect(session.getStatus().phase).toBe("failed");
});

test("a detector failure is fatal to the session", async () => {
  const camera = new MockCamera({ width: 4, height: 4, fps: 0 });
  const notifier = new Notifier({ transport: new FakeTransport(), logger: createTestLogger() });
  const session = new SurveillanceSession({
    camera,
    detector: {
      detect: async () => {
        throw new Error("model crashed");
      },
    },
    notifier,
    config: config(60),
    logger: createTestLogger(),
  });

  await expect(session.start()).rejects.toThrow(new DetectionError("model crashed"));
  expect(camera.releaseCount).toBe(1);
});

test("a session starts only once", async () => {
  const { session } = setup([F], 60);
  await session.start();
  await expect(session.start()).rejects.toThrow('Session cannot start from phase "stopped"');
});

test("status reflects the alert state", async () => {
  const { session } = setup([F, T], 60);
  expect(session.getStatus()).toEqual({
    phase: "idle",
    deviceIndex: null,
    fps: 0,
    framesProcessed: 0,
    alertsRaised: 0,
    alertState: "IDLE",
    present: false,
    notificationsInFlight: 0,
  });
  await session.start();
  expect(session.getStatus()).toMatchObject({
    phase: "stopped",
    deviceIndex: 0,
    alertState: "ALERTED",
    present: true,
    alertsRaised: 1,
  });
});
