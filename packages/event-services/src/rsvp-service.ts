/**
 * Student-facing RSVP operations on top of an RsvpStore.
 *
 * Duplicate prevention lives here: a student holds at most one CONFIRMED
 * RSVP per event. Re-RSVPing after withdrawing creates a new record, so
 * the history of withdrawals is kept.
 */

import {
  generateId,
  InvalidInputError,
  NoopLogger,
  systemClock,
  toIso,
} from "@campus-events/shared";
import type { CampusEvent, Clock, Logger, Rsvp, User } from "@campus-events/shared";
import type { RsvpStore } from "./rsvp-store";

export interface RsvpServiceOptions {
  now?: Clock;
  logger?: Logger;
}

export interface CreateRsvpResult {
  rsvp: Rsvp;
  /** False when the student already had a CONFIRMED RSVP, which is returned instead. */
  created: boolean;
}

export class RsvpService {
  private readonly store: RsvpStore;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(store: RsvpStore, options: RsvpServiceOptions = {}) {
    this.store = store;
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * RSVP a student to an event.
   *
   * @throws InvalidInputError if the event is canceled
   */
  createRsvp(event: CampusEvent, student: User): CreateRsvpResult {
    if (event.status === "CANCELED") {
      throw new InvalidInputError(`Cannot RSVP to canceled event ${event.id}`);
    }

    const existing = this.findActive(event.id, student.user_id);
    if (existing) {
      return { rsvp: existing, created: false };
    }

    const rsvp: Rsvp = {
      id: generateId("rsvp"),
      event_id: event.id,
      student_id: student.user_id,
      student_name: student.name,
      student_email: student.email,
      status: "CONFIRMED",
      created_at: toIso(this.now()),
    };
    this.store.add(rsvp);
    this.logger.info("rsvp created", { rsvpId: rsvp.id, eventId: event.id, studentId: student.user_id });
    return { rsvp, created: true };
  }

  /** Withdraw the student's active RSVP. Returns null when there is none. */
  cancelRsvp(event: CampusEvent, student: User): Rsvp | null {
    const active = this.findActive(event.id, student.user_id);
    if (!active) {
      return null;
    }
    const updated = this.store.updateStatus(active.id, "CANCELED");
    this.logger.info("rsvp canceled", { rsvpId: active.id, eventId: event.id });
    return updated;
  }

  /** A student's CONFIRMED RSVPs across all events. */
  listActiveRsvps(studentId: string): Rsvp[] {
    return this.store.listByStudent(studentId).filter((r) => r.status === "CONFIRMED");
  }

  private findActive(eventId: string, studentId: string): Rsvp | null {
    return (
      this.store
        .listByStudent(studentId)
        .find((r) => r.event_id === eventId && r.status === "CONFIRMED") ?? null
    );
  }
}
