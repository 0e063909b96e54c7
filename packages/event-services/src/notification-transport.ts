/**
 * Notification transport: the seam between the dispatcher and whatever
 * actually delivers email.
 *
 * Payload construction is pure and testable. The shipped transport
 * simulates delivery by logging the message.
 */

import type { CampusEvent, Logger, NotificationKind } from "@campus-events/shared";

// ---------------------------------------------------------------------------
// Message shape
// ---------------------------------------------------------------------------

export interface NotificationMessage {
  readonly kind: NotificationKind;
  readonly recipientId: string;
  readonly recipientName: string;
  readonly recipientEmail: string;
  readonly eventId: string;
  readonly subject: string;
  readonly body: string;
  readonly urgent: boolean;
}

/**
 * Delivers one message. Returns true on success; a false return or a
 * thrown error both mean the recipient was not notified.
 */
export interface NotificationTransport {
  send(message: NotificationMessage): boolean;
}

// ---------------------------------------------------------------------------
// Payload construction
// ---------------------------------------------------------------------------

export interface EmailContent {
  subject: string;
  body: string;
}

const URGENT_PREFIX = "[URGENT] ";

export function buildCancellationEmail(
  event: CampusEvent,
  recipientName: string,
  urgent: boolean,
): EmailContent {
  return {
    subject: `${urgent ? URGENT_PREFIX : ""}Canceled: ${event.title}`,
    body: [
      `Hi ${recipientName},`,
      "",
      `"${event.title}" scheduled for ${event.start_at} at ${event.location || "TBA"} has been canceled.`,
      `Reason: ${event.cancellation_reason ?? "No reason provided"}`,
    ].join("\n"),
  };
}

export function buildRestorationEmail(
  event: CampusEvent,
  recipientName: string,
  urgent: boolean,
): EmailContent {
  return {
    subject: `${urgent ? URGENT_PREFIX : ""}Back on: ${event.title}`,
    body: [
      `Hi ${recipientName},`,
      "",
      `The cancellation of "${event.title}" was reversed. It takes place as scheduled on ${event.start_at}.`,
    ].join("\n"),
  };
}

// ---------------------------------------------------------------------------
// Simulated transport
// ---------------------------------------------------------------------------

/** Logs each message instead of sending it; always succeeds. */
export class LoggingNotificationTransport implements NotificationTransport {
  constructor(private readonly logger: Logger) {}

  send(message: NotificationMessage): boolean {
    this.logger.info("email sent", {
      kind: message.kind,
      to: `${message.recipientName} <${message.recipientEmail}>`,
      eventId: message.eventId,
      subject: message.subject,
      urgent: message.urgent,
    });
    return true;
  }
}
