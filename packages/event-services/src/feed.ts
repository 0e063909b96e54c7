/**
 * Event feed: the list of events shown to users.
 *
 * Both operations are idempotent. Adding a present event, adding a
 * canceled event, or removing an absent event is a no-op.
 */

import type { CampusEvent } from "@campus-events/shared";

export interface EventFeed {
  /** Add the event unless it is canceled or already listed. */
  add(event: CampusEvent): void;
  /** Remove the event if listed. */
  remove(event: CampusEvent): void;
  has(eventId: string): boolean;
  /** Listed events, in the order they were added. */
  list(): CampusEvent[];
}

export class InMemoryEventFeed implements EventFeed {
  private readonly events = new Map<string, CampusEvent>();

  add(event: CampusEvent): void {
    if (event.status === "CANCELED" || this.events.has(event.id)) {
      return;
    }
    this.events.set(event.id, event);
  }

  remove(event: CampusEvent): void {
    this.events.delete(event.id);
  }

  has(eventId: string): boolean {
    return this.events.has(eventId);
  }

  list(): CampusEvent[] {
    return [...this.events.values()];
  }
}
