import nodemailer from "nodemailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport";
import type { NotificationRequest, NotificationTransport } from "./types.ts";

export interface SmtpCredentials {
  sender: string;
  password: string;
}

/** The slice of a nodemailer transporter used per alert. */
export interface MailTransporter {
  sendMail(mail: nodemailer.SendMailOptions): Promise<unknown>;
  close(): void;
}

export interface SmtpTransportOptions extends SmtpCredentials {
  host?: string;
  port?: number;
  createTransport?: (options: SMTPTransport.Options) => MailTransporter;
}

export const DEFAULT_SMTP_HOST = "smtp.gmail.com";
export const DEFAULT_SMTP_PORT = 587;

/** One connection per alert: connect, STARTTLS, log in, send, close. */
export class SmtpTransport implements NotificationTransport {
  readonly name = "smtp";
  private options: SmtpTransportOptions;

  constructor(options: SmtpTransportOptions) {
    this.options = options;
  }

  async send(request: NotificationRequest): Promise<void> {
    const { sender, password, host = DEFAULT_SMTP_HOST, port = DEFAULT_SMTP_PORT } = this.options;
    const create: (options: SMTPTransport.Options) => MailTransporter =
      this.options.createTransport ?? ((options) => nodemailer.createTransport(options));

    const transporter = create({
      host,
      port,
      secure: port === 465,
      requireTLS: port !== 465,
      auth: { user: sender, pass: password },
    });

    try {
      await transporter.sendMail({
        from: sender,
        to: request.destination,
        subject: request.subject,
        text: request.message,
        date: new Date(request.raisedAt),
      });
    } finally {
      transporter.close();
    }
  }
}
