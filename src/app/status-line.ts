import type { SessionStatus } from "../session/surveillance-session.ts";

export function formatStatus(info: SessionStatus): string {
  const parts: string[] = [];

  parts.push("WATCHPOST");
  parts.push(info.phase.toUpperCase());
  parts.push(info.deviceIndex === null ? "cam:-" : `cam:${info.deviceIndex}`);
  parts.push(`${info.fps}fps`);
  parts.push(`${info.framesProcessed} frames`);
  parts.push(info.alertState === "ALERTED" ? "ALERTED" : "idle");
  parts.push(info.present ? "subject:in-view" : "subject:none");
  parts.push(`alerts:${info.alertsRaised}`);

  if (info.notificationsInFlight > 0) {
    parts.push(`sending:${info.notificationsInFlight}`);
  }

  return parts.join(" | ");
}
