import { getLogger, type Logger } from "../logger.ts";
import type { NotificationRequest, NotificationTransport } from "./types.ts";

/** Writes alerts to the log instead of delivering them (mock and dry runs). */
export class LogTransport implements NotificationTransport {
  readonly name = "log";
  private logger: Logger;

  constructor(logger: Logger = getLogger("log-transport")) {
    this.logger = logger;
  }

  async send(request: NotificationRequest): Promise<void> {
    this.logger.warn(`[alert] ${request.subject} ${request.message}`, {
      destination: request.destination,
      raisedAt: request.raisedAt,
    });
  }
}
