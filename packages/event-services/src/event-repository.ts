import type { CampusEvent } from "@campus-events/shared";

/** Event storage used by the event-creation side of the system. */
export interface EventRepository {
  save(event: CampusEvent): void;
  get(eventId: string): CampusEvent | null;
  list(): CampusEvent[];
}

/**
 * Holds events by reference: the cancellation manager mutates the same
 * objects the repository returns.
 */
export class InMemoryEventRepository implements EventRepository {
  private readonly events = new Map<string, CampusEvent>();

  save(event: CampusEvent): void {
    this.events.set(event.id, event);
  }

  get(eventId: string): CampusEvent | null {
    return this.events.get(eventId) ?? null;
  }

  list(): CampusEvent[] {
    return [...this.events.values()];
  }
}
