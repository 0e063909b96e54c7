/**
 * RSVP storage.
 *
 * The store appends unconditionally: duplicate prevention belongs to
 * RsvpService, not to this layer.
 */

import type { Rsvp, RsvpStatus } from "@campus-events/shared";

/**
 * RSVP store interface. Decoupled from any database so services can be
 * constructed with an isolated in-memory instance per test.
 */
export interface RsvpStore {
  /** Append an RSVP. No uniqueness check. */
  add(rsvp: Rsvp): void;

  /** Look up a single RSVP by id. */
  get(rsvpId: string): Rsvp | null;

  /** CONFIRMED RSVPs for an event, in insertion order. */
  getConfirmed(eventId: string): Rsvp[];

  /** Number of CONFIRMED RSVPs for an event. */
  count(eventId: string): number;

  /** Every RSVP (any status) made by a student, in insertion order. */
  listByStudent(studentId: string): Rsvp[];

  /** Change an RSVP's status. Returns the updated record, or null if unknown. */
  updateStatus(rsvpId: string, status: RsvpStatus): Rsvp | null;
}

export class InMemoryRsvpStore implements RsvpStore {
  private readonly rsvps: Rsvp[] = [];

  add(rsvp: Rsvp): void {
    this.rsvps.push({ ...rsvp });
  }

  get(rsvpId: string): Rsvp | null {
    const found = this.rsvps.find((r) => r.id === rsvpId);
    return found ? { ...found } : null;
  }

  getConfirmed(eventId: string): Rsvp[] {
    return this.rsvps
      .filter((r) => r.event_id === eventId && r.status === "CONFIRMED")
      .map((r) => ({ ...r }));
  }

  count(eventId: string): number {
    return this.getConfirmed(eventId).length;
  }

  listByStudent(studentId: string): Rsvp[] {
    return this.rsvps
      .filter((r) => r.student_id === studentId)
      .map((r) => ({ ...r }));
  }

  updateStatus(rsvpId: string, status: RsvpStatus): Rsvp | null {
    const found = this.rsvps.find((r) => r.id === rsvpId);
    if (!found) return null;
    found.status = status;
    return { ...found };
  }
}
