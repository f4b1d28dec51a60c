export interface NotificationRequest {
  readonly subject: string;
  readonly message: string;
  readonly destination: string;
  /** Wall-clock ISO time the alert was raised. */
  readonly raisedAt: string;
}

/** Best-effort delivery. Rejects on any failure; never retries. */
export interface NotificationTransport {
  readonly name: string;
  send(request: NotificationRequest): Promise<void>;
}

export const DEFAULT_ALERT_SUBJECT = "Intruder Alert!";

export function buildAlertMessage(targetLabel: string): string {
  const article = /^[aeiou]/i.test(targetLabel) ? "An" : "A";
  return `${article} ${targetLabel} has been detected in the surveillance area!`;
}

export function createNotificationRequest(input: {
  destination: string;
  targetLabel: string;
  raisedAt?: Date;
  subject?: string;
}): NotificationRequest {
  return Object.freeze({
    subject: input.subject ?? DEFAULT_ALERT_SUBJECT,
    message: buildAlertMessage(input.targetLabel),
    destination: input.destination,
    raisedAt: (input.raisedAt ?? new Date()).toISOString(),
  });
}
