/**
 * Notification dispatcher: fans a cancellation or restoration out to every
 * student holding a CONFIRMED RSVP, and keeps an append-only log of each
 * delivery.
 *
 * Urgency uses the same hours-until-start computation and threshold as the
 * cancellation validator (see time.ts), so the two always agree.
 */

import {
  AppendOnlyLog,
  LATE_CANCELLATION_THRESHOLD_HOURS,
  NoopLogger,
  describeError,
  generateId,
  hoursUntilEvent,
  isWithinNoticeWindow,
  systemClock,
  toIso,
} from "@campus-events/shared";
import type {
  CampusEvent,
  Clock,
  Logger,
  NotificationKind,
  NotificationLogEntry,
  Rsvp,
} from "@campus-events/shared";
import type { RsvpStore } from "./rsvp-store";
import {
  buildCancellationEmail,
  buildRestorationEmail,
} from "./notification-transport";
import type { EmailContent, NotificationTransport } from "./notification-transport";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface NotificationDispatcherOptions {
  now?: Clock;
  logger?: Logger;
  /** Notice threshold below which notifications are flagged urgent. */
  lateCancellationHours?: number;
}

export interface NotificationSummary {
  eventId: string;
  eventTitle: string;
  kind: NotificationKind;
  /** Confirmed RSVPs found for the event. */
  rsvpCount: number;
  /** Deliveries that succeeded (one log entry each). */
  notificationsSent: number;
  urgent: boolean;
  hoursUntilEvent: number;
  /** Student ids notified, in RSVP store order. */
  notifiedRecipientIds: string[];
  timestamp: string;
}

export interface NotificationLogFilter {
  eventId?: string;
  recipientId?: string;
}

// ---------------------------------------------------------------------------
// NotificationDispatcher
// ---------------------------------------------------------------------------

export class NotificationDispatcher {
  private readonly rsvps: RsvpStore;
  private readonly transport: NotificationTransport;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly lateCancellationHours: number;
  private readonly log = new AppendOnlyLog<NotificationLogEntry>();

  constructor(
    rsvps: RsvpStore,
    transport: NotificationTransport,
    options: NotificationDispatcherOptions = {},
  ) {
    this.rsvps = rsvps;
    this.transport = transport;
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? new NoopLogger();
    this.lateCancellationHours =
      options.lateCancellationHours ?? LATE_CANCELLATION_THRESHOLD_HOURS;
  }

  /** Tell every confirmed attendee that the event was canceled. */
  notifyCancellation(event: CampusEvent): NotificationSummary {
    return this.dispatch(event, "CANCELLATION", buildCancellationEmail);
  }

  /** Tell every confirmed attendee that a cancellation was reversed. */
  notifyRestoration(event: CampusEvent): NotificationSummary {
    return this.dispatch(event, "RESTORATION", buildRestorationEmail);
  }

  /** Logged deliveries, optionally filtered (filters combine with AND). */
  getLogs(filter: NotificationLogFilter = {}): NotificationLogEntry[] {
    return this.log.filter(
      (entry) =>
        (filter.eventId === undefined || entry.event_id === filter.eventId) &&
        (filter.recipientId === undefined || entry.recipient_id === filter.recipientId),
    );
  }

  private dispatch(
    event: CampusEvent,
    kind: NotificationKind,
    compose: (event: CampusEvent, recipientName: string, urgent: boolean) => EmailContent,
  ): NotificationSummary {
    const nowMs = this.now();
    const timestamp = toIso(nowMs);
    const hours = hoursUntilEvent(event, nowMs);
    const urgent = isWithinNoticeWindow(hours, this.lateCancellationHours);

    const rsvps = this.rsvps.getConfirmed(event.id);
    const notified: string[] = [];

    for (const rsvp of rsvps) {
      if (this.deliver(event, kind, rsvp, urgent, compose)) {
        this.log.append({
          id: generateId("notification"),
          recipient_id: rsvp.student_id,
          recipient_name: rsvp.student_name,
          recipient_email: rsvp.student_email,
          event_id: event.id,
          event_title: event.title,
          kind,
          sent_at: timestamp,
          urgent,
        });
        notified.push(rsvp.student_id);
      }
    }

    this.logger.info("notifications dispatched", {
      eventId: event.id,
      kind,
      rsvpCount: rsvps.length,
      sent: notified.length,
      urgent,
    });

    return {
      eventId: event.id,
      eventTitle: event.title,
      kind,
      rsvpCount: rsvps.length,
      notificationsSent: notified.length,
      urgent,
      hoursUntilEvent: hours,
      notifiedRecipientIds: notified,
      timestamp,
    };
  }

  private deliver(
    event: CampusEvent,
    kind: NotificationKind,
    rsvp: Rsvp,
    urgent: boolean,
    compose: (event: CampusEvent, recipientName: string, urgent: boolean) => EmailContent,
  ): boolean {
    const content = compose(event, rsvp.student_name, urgent);
    try {
      return this.transport.send({
        kind,
        recipientId: rsvp.student_id,
        recipientName: rsvp.student_name,
        recipientEmail: rsvp.student_email,
        eventId: event.id,
        subject: content.subject,
        body: content.body,
        urgent,
      });
    } catch (err) {
      // One failed recipient must not block the rest
      this.logger.error("notification delivery failed", {
        eventId: event.id,
        recipientId: rsvp.student_id,
        error: describeError(err),
      });
      return false;
    }
  }
}
