import type { NotificationRequest, NotificationTransport } from "./types.ts";

export interface WebhookTransportOptions {
  url: string;
  fetchImpl?: typeof fetch;
}

export class WebhookTransport implements NotificationTransport {
  readonly name = "webhook";
  private url: string;
  private fetchImpl: typeof fetch;

  constructor(options: WebhookTransportOptions) {
    this.url = options.url;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(request: NotificationRequest): Promise<void> {
    const response = await this.fetchImpl(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        subject: request.subject,
        message: request.message,
        destination: request.destination,
        raisedAt: request.raisedAt,
      }),
    });
    if (!response.ok) {
      throw new Error(`Webhook answered ${response.status} ${response.statusText}`.trim());
    }
  }
}
