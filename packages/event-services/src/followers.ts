import type { CampusEvent, Logger } from "@campus-events/shared";

/** Notifies users following an event (as opposed to RSVP'd attendees). */
export interface FollowerNotifier {
  notifyFollowers(event: CampusEvent): void;
}

/** Simulated follower notifier: logs and counts per event. */
export class LoggingFollowerNotifier implements FollowerNotifier {
  private readonly counts = new Map<string, number>();

  constructor(private readonly logger: Logger) {}

  notifyFollowers(event: CampusEvent): void {
    this.counts.set(event.id, this.notifiedCount(event.id) + 1);
    this.logger.info("followers notified", {
      eventId: event.id,
      title: event.title,
      status: event.status,
    });
  }

  /** How many times followers of this event have been notified. */
  notifiedCount(eventId: string): number {
    return this.counts.get(eventId) ?? 0;
  }
}
