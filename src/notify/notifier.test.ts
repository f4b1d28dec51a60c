import { expect, test } from "vitest";
import { createTestLogger, FakeTransport } from "../testing/fakes.ts";
import { Notifier } from "./notifier.ts";
import { createNotificationRequest } from "./types.ts";

const request = createNotificationRequest({
  destination: "owner@example.com",
  targetLabel: "person",
  raisedAt: new Date("2024-05-01T12:00:00.000Z"),
});

test("alert request carries the fixed subject and message", () => {
  expect(request).toEqual({
    subject: "Intruder Alert!",
    message: "A person has been detected in the surveillance area!",
    destination: "owner@example.com",
    raisedAt: "2024-05-01T12:00:00.000Z",
  });
  expect(Object.isFrozen(request)).toBe(true);
  expect(createNotificationRequest({ destination: "x", targetLabel: "animal" }).message).toBe(
    "An animal has been detected in the surveillance area!",
  );
});

test("dispatch returns before the transport finishes", async () => {
  const transport = new FakeTransport();
  transport.mode = "hold";
  const notifier = new Notifier({ transport, logger: createTestLogger() });

  expect(notifier.dispatch(request)).toBeUndefined();
  expect(notifier.inFlight).toBe(1);

  await Promise.resolve();
  await Promise.resolve();
  transport.pending[0]?.resolve();
  await notifier.drain();
  expect(notifier.getStats()).toEqual({ sent: 1, failed: 0, inFlight: 0 });
});

test("a rejected send is logged and goes no further", async () => {
  const transport = new FakeTransport();
  transport.mode = "reject";
  const logger = createTestLogger();
  const notifier = new Notifier({ transport, logger });

  notifier.dispatch(request);
  await notifier.drain();

  expect(notifier.getStats()).toEqual({ sent: 0, failed: 1, inFlight: 0 });
  expect(logger.error).toHaveBeenCalledWith(
    "Failed to send notification to owner@example.com: connection refused",
    { code: "NOTIFICATION_DISPATCH_FAILED", transport: "fake", raisedAt: "2024-05-01T12:00:00.000Z" },
  );
});

test("a transport that throws synchronously cannot break the caller", async () => {
  const transport = new FakeTransport();
  transport.mode = "throw";
  const logger = createTestLogger();
  const notifier = new Notifier({ transport, logger });

  expect(() => notifier.dispatch(request)).not.toThrow();
  await notifier.drain();
  expect(logger.error).toHaveBeenCalledTimes(1);
});

test("independent dispatches settle independently", async () => {
  const transport = new FakeTransport();
  transport.mode = "hold";
  const notifier = new Notifier({ transport, logger: createTestLogger() });

  notifier.dispatch(request);
  notifier.dispatch(request);
  await Promise.resolve();
  await Promise.resolve();
  expect(transport.pending).toHaveLength(2);

  transport.pending[1]?.reject(new Error("timeout"));
  transport.pending[0]?.resolve();
  await notifier.drain();
  expect(notifier.getStats()).toEqual({ sent: 1, failed: 1, inFlight: 0 });
});
