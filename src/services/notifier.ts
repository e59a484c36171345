// src/services/notifier.ts
import type { Logger } from "pino";
import type { AppConfig } from "../config/env";
import { serializeError } from "../config/logger";
import { renderEmail } from "./emailTemplates";

export type Notification =
  | { kind: "welcome"; to: string; data: { firstName: string } }
  | {
      kind: "application-submitted";
      to: string;
      data: { firstName: string; jobTitle: string; company: string };
    }
  | {
      kind: "application-received";
      to: string;
      data: { firstName: string; jobTitle: string; applicantName: string };
    }
  | { kind: "job-approved"; to: string; data: { firstName: string; jobTitle: string } }
  | {
      kind: "job-rejected";
      to: string;
      data: { firstName: string; jobTitle: string; reason?: string };
    };

export interface Notifier {
  notify(notification: Notification): Promise<void>;
}

export class MailDeliveryError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "MailDeliveryError";
  }
}

/**
 * Posts rendered mail to a transactional mail HTTP API
 * (`POST <url>` with `{ from, to, subject, html, text }`).
 */
export class HttpMailNotifier implements Notifier {
  constructor(
    private readonly options: { apiUrl: string; apiKey?: string; from: string },
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async notify(notification: Notification): Promise<void> {
    const email = renderEmail(notification);

    const response = await this.fetchImpl(this.options.apiUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...(this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {}),
      },
      body: JSON.stringify({ from: this.options.from, to: notification.to, ...email }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new MailDeliveryError(`Mail API failed (${response.status}): ${text}`, response.status);
    }
  }
}

/** Used when no mail API is configured. */
export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async notify(notification: Notification): Promise<void> {
    const { subject } = renderEmail(notification);
    this.logger.info(
      { event: "mail_skipped", kind: notification.kind, to: notification.to, subject },
      "No MAIL_API_URL set, skipping email"
    );
  }
}

export function createNotifier(mail: AppConfig["mail"], logger: Logger): Notifier {
  if (!mail.apiUrl) return new LogNotifier(logger);
  return new HttpMailNotifier({ apiUrl: mail.apiUrl, apiKey: mail.apiKey, from: mail.from });
}

/**
 * Fire-and-forget delivery. Called after the triggering transaction commits;
 * nothing a notifier throws or rejects with reaches the caller.
 */
export class NotificationDispatcher {
  constructor(
    private readonly notifier: Notifier,
    private readonly logger: Logger
  ) {}

  dispatch(notification: Notification): void {
    let pending: Promise<void>;
    try {
      pending = this.notifier.notify(notification);
    } catch (err) {
      this.logFailure(notification, err);
      return;
    }
    void pending.catch((err: unknown) => this.logFailure(notification, err));
  }

  private logFailure(notification: Notification, err: unknown): void {
    this.logger.warn(
      { event: "notification_failed", kind: notification.kind, to: notification.to, error: serializeError(err) },
      `Failed to send ${notification.kind} email`
    );
  }
}
