/**
 * Alert subscriptions: users subscribe to alert categories (seminars,
 * workshops, career fairs) and can switch alert delivery off entirely.
 *
 * Subscription is set membership keyed by alert_id; subscribe and
 * unsubscribe report what happened instead of failing on repeats.
 */

import {
  AppendOnlyLog,
  NoopLogger,
  generateId,
  systemClock,
  toIso,
} from "@campus-events/shared";
import type { Clock, Logger } from "@campus-events/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Alert {
  readonly alert_id: string;
  /** Category of event the alert covers, e.g. "seminar". */
  readonly event_type: string;
  readonly description: string;
}

export const ALERT_TYPES = ["reminder", "new_event", "site_maintenance"] as const;

export type AlertType = (typeof ALERT_TYPES)[number];

export type SubscribeOutcome = "subscribed" | "already_subscribed";

export type UnsubscribeOutcome = "unsubscribed" | "not_subscribed";

export interface SentAlert {
  readonly user_id: string;
  readonly type: AlertType;
  readonly message: string;
  readonly sent_at: string;
}

export interface AlertSubscriptionsOptions {
  now?: Clock;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function createAlert(eventType: string, description: string): Alert {
  return { alert_id: generateId("alert"), event_type: eventType, description };
}

export function buildAlertMessage(type: AlertType, eventTitle: string): string {
  switch (type) {
    case "reminder":
      return `Reminder: ${eventTitle} is coming up!`;
    case "new_event":
      return `New event: ${eventTitle} has been added!`;
    case "site_maintenance":
      return `Site maintenance: the event system will be down. ${eventTitle} details may be temporarily unavailable.`;
  }
}

// ---------------------------------------------------------------------------
// AlertSubscriptions
// ---------------------------------------------------------------------------

export class AlertSubscriptions {
  private readonly subscriptions = new Map<string, Map<string, Alert>>();
  private readonly disabled = new Set<string>();
  private readonly sent = new AppendOnlyLog<SentAlert>();
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(options: AlertSubscriptionsOptions = {}) {
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? new NoopLogger();
  }

  subscribe(userId: string, alert: Alert): SubscribeOutcome {
    let alerts = this.subscriptions.get(userId);
    if (!alerts) {
      alerts = new Map();
      this.subscriptions.set(userId, alerts);
    }
    if (alerts.has(alert.alert_id)) {
      return "already_subscribed";
    }
    alerts.set(alert.alert_id, alert);
    return "subscribed";
  }

  unsubscribe(userId: string, alertId: string): UnsubscribeOutcome {
    return this.subscriptions.get(userId)?.delete(alertId) ? "unsubscribed" : "not_subscribed";
  }

  /** A user's subscriptions, in subscription order. */
  list(userId: string): Alert[] {
    return [...(this.subscriptions.get(userId)?.values() ?? [])];
  }

  /** Users subscribed to any alert of the given event type. */
  subscribersFor(eventType: string): string[] {
    const users: string[] = [];
    for (const [userId, alerts] of this.subscriptions) {
      if ([...alerts.values()].some((a) => a.event_type === eventType)) {
        users.push(userId);
      }
    }
    return users;
  }

  setAlertsEnabled(userId: string, enabled: boolean): void {
    if (enabled) {
      this.disabled.delete(userId);
    } else {
      this.disabled.add(userId);
    }
    this.logger.info("alert preferences updated", { userId, enabled });
  }

  alertsEnabled(userId: string): boolean {
    return !this.disabled.has(userId);
  }

  /** Deliver an alert. Returns false, sending nothing, when the user turned alerts off. */
  sendAlert(userId: string, type: AlertType, eventTitle: string): boolean {
    if (!this.alertsEnabled(userId)) {
      this.logger.debug("alert suppressed", { userId, type });
      return false;
    }
    const message = buildAlertMessage(type, eventTitle);
    this.sent.append({ user_id: userId, type, message, sent_at: toIso(this.now()) });
    this.logger.info("alert sent", { userId, type });
    return true;
  }

  sentAlerts(userId?: string): SentAlert[] {
    return this.sent.filter((a) => userId === undefined || a.user_id === userId);
  }
}
