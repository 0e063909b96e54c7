/**
 * @campus-events/shared -- Domain types for the campus event system.
 *
 * Records use snake_case field names (they mirror stored rows); service
 * result objects use camelCase.
 */

import type {
  EVENT_STATUSES,
  RSVP_STATUSES,
  USER_ROLES,
  NOTIFICATION_KINDS,
} from "./constants";

// ---------------------------------------------------------------------------
// Union / enum-like types
// ---------------------------------------------------------------------------

/** Closed set of user roles. */
export type UserRole = (typeof USER_ROLES)[number];

/**
 * Event lifecycle status.
 *
 *   SCHEDULED -> CANCELED   (cancelEvent)
 *   CANCELED  -> SCHEDULED  (undoCancel, inside the undo window)
 */
export type EventStatus = (typeof EVENT_STATUSES)[number];

/** RSVP status. CANCELED means the student withdrew. */
export type RsvpStatus = (typeof RSVP_STATUSES)[number];

/** Kind of notification delivered to a recipient. */
export type NotificationKind = (typeof NOTIFICATION_KINDS)[number];

// ---------------------------------------------------------------------------
// Users
// ---------------------------------------------------------------------------

export interface User {
  readonly user_id: string;
  readonly name: string;
  readonly email: string;
  readonly role: UserRole;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/**
 * A scheduled campus event (review session, seminar, club meeting).
 *
 * Invariant: `canceled_at` and `canceled_by` are non-null iff
 * `status === "CANCELED"`. `cancellation_reason` is null for every
 * SCHEDULED event and may be null for a CANCELED one that was canceled
 * outside the late-cancellation window without a reason.
 *
 * Only the cancellation manager writes the status and cancellation fields.
 */
export interface CampusEvent {
  readonly id: string;
  title: string;
  description: string;
  /** ISO 8601 start timestamp. */
  start_at: string;
  /** ISO 8601 end timestamp. */
  end_at: string;
  location: string;
  readonly organizer_id: string;
  organizer_name: string;
  status: EventStatus;
  cancellation_reason: string | null;
  canceled_at: string | null;
  canceled_by: string | null;
  readonly created_at: string;
  /** Course the event belongs to, when created through the course service. */
  course_code?: string;
}

// ---------------------------------------------------------------------------
// RSVPs
// ---------------------------------------------------------------------------

export interface Rsvp {
  readonly id: string;
  readonly event_id: string;
  readonly student_id: string;
  readonly student_name: string;
  readonly student_email: string;
  status: RsvpStatus;
  readonly created_at: string;
}

// ---------------------------------------------------------------------------
// Append-only log records
// ---------------------------------------------------------------------------

/** One delivered notification. Entries are frozen once logged. */
export interface NotificationLogEntry {
  readonly id: string;
  readonly recipient_id: string;
  readonly recipient_name: string;
  readonly recipient_email: string;
  readonly event_id: string;
  readonly event_title: string;
  readonly kind: NotificationKind;
  readonly sent_at: string;
  readonly urgent: boolean;
}

/** One calendar-integration push attempt, successful or not. */
export interface SyncResult {
  readonly id: string;
  readonly event_id: string;
  readonly integration: string;
  readonly success: boolean;
  readonly timestamp: string;
  readonly message: string;
}
