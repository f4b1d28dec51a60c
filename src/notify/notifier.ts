import { NotificationDispatchError } from "../errors.ts";
import { getLogger, type Logger } from "../logger.ts";
import type { NotificationRequest, NotificationTransport } from "./types.ts";

export interface NotifierOptions {
  transport: NotificationTransport;
  logger?: Logger;
}

/**
 * Fire-and-forget dispatch. Each request runs as its own task; failures
 * end at the task boundary as a logged NotificationDispatchError.
 */
export class Notifier {
  private transport: NotificationTransport;
  private logger: Logger;
  private tasks = new Set<Promise<void>>();
  private sent = 0;
  private failed = 0;

  constructor(options: NotifierOptions) {
    this.transport = options.transport;
    this.logger = options.logger ?? getLogger("notifier");
  }

  dispatch(request: NotificationRequest): void {
    const task = this.run(request).finally(() => {
      this.tasks.delete(task);
    });
    this.tasks.add(task);
  }

  get inFlight(): number {
    return this.tasks.size;
  }

  getStats(): { sent: number; failed: number; inFlight: number } {
    return { sent: this.sent, failed: this.failed, inFlight: this.tasks.size };
  }

  /** Settles once every task dispatched so far has finished. Never rejects. */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(this.tasks);
    }
  }

  private async run(request: NotificationRequest): Promise<void> {
    try {
      await this.transport.send(request);
      this.sent += 1;
      this.logger.info("Notification sent", {
        transport: this.transport.name,
        destination: request.destination,
        raisedAt: request.raisedAt,
      });
    } catch (error) {
      this.failed += 1;
      const failure = new NotificationDispatchError(request.destination, error);
      this.logger.error(failure.message, {
        code: failure.code,
        transport: this.transport.name,
        raisedAt: request.raisedAt,
      });
    }
  }
}
