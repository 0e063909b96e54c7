/**
 * Event cancellation / undo state machine.
 *
 *   SCHEDULED --cancelEvent--> CANCELED --undoCancel--> SCHEDULED
 *
 * Current state is inferred from `event.status` plus the cancellation record
 * kept per event id; there is no separate state field.
 *
 * Invariants:
 * - Every precondition (permission, status, late-cancellation reason, undo
 *   window) is checked before any write, so a rejected call leaves the event
 *   and the record untouched.
 * - At most one meaningful record per event. A new cancellation replaces a
 *   stale (undone) record; a second cancellation of a CANCELED event is
 *   rejected and never overwrites the live record.
 * - The undo window is measured from the cancellation instant and is fixed
 *   per manager instance.
 * - Undone records are kept and marked, not deleted.
 *
 * Notification and feed side effects are best-effort: a failure is logged
 * and reported in the result flags, and never rolls back the transition.
 *
 * Single-threaded: the check-then-write sequences assume no concurrent
 * callers.
 */

import {
  AlreadyCanceledError,
  DEFAULT_UNDO_WINDOW_MINUTES,
  LATE_CANCELLATION_THRESHOLD_HOURS,
  MS_PER_MINUTE,
  MS_PER_SECOND,
  NoCancellationHistoryError,
  NoopLogger,
  NotCanceledError,
  PermissionError,
  UndoExpiredError,
  describeError,
  systemClock,
  toIso,
} from "@campus-events/shared";
import type { CampusEvent, Clock, EventStatus, Logger, User } from "@campus-events/shared";
import { isBlankReason, validateCancellationReason } from "./cancellation-validator";
import type { CancellationValidation } from "./cancellation-validator";
import type { EventFeed } from "./feed";
import type { NotificationSummary } from "./notification-dispatcher";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The subset of NotificationDispatcher the manager drives. */
export interface CancellationNotifier {
  notifyCancellation(event: CampusEvent): NotificationSummary;
  notifyRestoration(event: CampusEvent): NotificationSummary;
}

/** Audit record of one cancel episode. */
export interface CancellationRecord {
  readonly event_id: string;
  readonly previous_status: EventStatus;
  readonly canceled_by: string;
  readonly reason: string | null;
  readonly canceled_at: string;
  /** canceled_at + undo window. */
  readonly undo_deadline: string;
  readonly undone_at: string | null;
  readonly undone_by: string | null;
}

export interface CancelResult {
  eventId: string;
  status: EventStatus;
  canceledBy: string;
  canceledAt: string;
  reason: string | null;
  undoDeadline: string;
  validation: CancellationValidation;
  /** False if the notification side effect failed. */
  notificationsSent: boolean;
  notifiedCount: number;
  removedFromFeed: boolean;
}

export interface UndoResult {
  eventId: string;
  status: EventStatus;
  undoneBy: string;
  undoneAt: string;
  originalCancellationTime: string;
  elapsedSeconds: number;
  restoredToFeed: boolean;
  notificationsSent: boolean;
  notifiedCount: number;
}

export type UndoEligibilityReason = "available" | "no_history" | "already_undone" | "expired";

export interface UndoEligibility {
  canUndo: boolean;
  reason: UndoEligibilityReason;
  undoDeadline: string | null;
}

export interface EventCancellationManagerOptions {
  notifications: CancellationNotifier;
  feed: EventFeed;
  undoWindowMinutes?: number;
  lateCancellationHours?: number;
  now?: Clock;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Permission policy
// ---------------------------------------------------------------------------

/**
 * Teachers may cancel or undo any event; anyone else only the events they
 * organize. No delegation, no per-event ACL.
 */
export function canManageEvent(event: Pick<CampusEvent, "organizer_id">, actor: User): boolean {
  return actor.role === "teacher" || actor.user_id === event.organizer_id;
}

// ---------------------------------------------------------------------------
// EventCancellationManager
// ---------------------------------------------------------------------------

export class EventCancellationManager {
  private readonly records = new Map<string, CancellationRecord>();
  private readonly notifications: CancellationNotifier;
  private readonly feed: EventFeed;
  private readonly undoWindowMinutes: number;
  private readonly lateCancellationHours: number;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(options: EventCancellationManagerOptions) {
    this.notifications = options.notifications;
    this.feed = options.feed;
    this.undoWindowMinutes = options.undoWindowMinutes ?? DEFAULT_UNDO_WINDOW_MINUTES;
    this.lateCancellationHours = options.lateCancellationHours ?? LATE_CANCELLATION_THRESHOLD_HOURS;
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Cancel a scheduled event.
   *
   * @throws PermissionError if the actor is neither teacher nor organizer
   * @throws AlreadyCanceledError if the event is already CANCELED
   * @throws ValidationError for a late cancellation without a reason
   */
  cancelEvent(event: CampusEvent, actor: User, reason?: string | null): CancelResult {
    this.assertPermission(event, actor, "cancel");
    if (event.status === "CANCELED") {
      throw new AlreadyCanceledError(event.id);
    }

    const nowMs = this.now();
    const validation = validateCancellationReason(event, reason, {
      nowMs,
      thresholdHours: this.lateCancellationHours,
    });

    // All checks passed -- writes start here
    const canceledAt = toIso(nowMs);
    const storedReason = isBlankReason(reason) ? null : (reason ?? "").trim();
    const record: CancellationRecord = {
      event_id: event.id,
      previous_status: event.status,
      canceled_by: actor.user_id,
      reason: storedReason,
      canceled_at: canceledAt,
      undo_deadline: toIso(nowMs + this.undoWindowMinutes * MS_PER_MINUTE),
      undone_at: null,
      undone_by: null,
    };
    this.records.set(event.id, record);

    event.status = "CANCELED";
    event.cancellation_reason = storedReason;
    event.canceled_at = canceledAt;
    event.canceled_by = actor.user_id;

    const summary = this.sideEffect("notify cancellation", event.id, () =>
      this.notifications.notifyCancellation(event),
    );
    const removed = this.sideEffect("remove from feed", event.id, () => {
      this.feed.remove(event);
      return true;
    });

    this.logger.info("event canceled", {
      eventId: event.id,
      canceledBy: actor.user_id,
      late: validation.isLateCancellation,
      undoDeadline: record.undo_deadline,
    });

    return {
      eventId: event.id,
      status: event.status,
      canceledBy: actor.user_id,
      canceledAt,
      reason: storedReason,
      undoDeadline: record.undo_deadline,
      validation,
      notificationsSent: summary !== null,
      notifiedCount: summary?.notificationsSent ?? 0,
      removedFromFeed: removed === true,
    };
  }

  /**
   * Reverse a cancellation inside the undo window.
   *
   * @throws NotCanceledError if the event is not CANCELED
   * @throws NoCancellationHistoryError if there is no undoable record
   * @throws UndoExpiredError if the window has passed
   * @throws PermissionError if the actor is neither teacher nor organizer
   */
  undoCancel(event: CampusEvent, actor: User): UndoResult {
    if (event.status !== "CANCELED") {
      throw new NotCanceledError(event.id, event.status);
    }

    const record = this.records.get(event.id);
    if (!record) {
      throw new NoCancellationHistoryError(event.id);
    }
    if (record.undone_at !== null) {
      throw new NoCancellationHistoryError(event.id, true);
    }

    const nowMs = this.now();
    const elapsedSeconds = (nowMs - Date.parse(record.canceled_at)) / MS_PER_SECOND;
    if (nowMs > Date.parse(record.undo_deadline)) {
      throw new UndoExpiredError(event.id, elapsedSeconds, record.undo_deadline, this.undoWindowMinutes);
    }

    this.assertPermission(event, actor, "undo");

    event.status = record.previous_status;
    event.cancellation_reason = null;
    event.canceled_at = null;
    event.canceled_by = null;

    const restored = this.sideEffect("restore to feed", event.id, () => {
      this.feed.add(event);
      return true;
    });
    const summary = this.sideEffect("notify restoration", event.id, () =>
      this.notifications.notifyRestoration(event),
    );

    const undoneAt = toIso(nowMs);
    this.records.set(event.id, { ...record, undone_at: undoneAt, undone_by: actor.user_id });

    this.logger.info("cancellation undone", {
      eventId: event.id,
      undoneBy: actor.user_id,
      elapsedSeconds,
    });

    return {
      eventId: event.id,
      status: event.status,
      undoneBy: actor.user_id,
      undoneAt,
      originalCancellationTime: record.canceled_at,
      elapsedSeconds,
      restoredToFeed: restored === true,
      notificationsSent: summary !== null,
      notifiedCount: summary?.notificationsSent ?? 0,
    };
  }

  /** True iff a live (not undone) record exists and the window is still open. */
  canUndo(event: Pick<CampusEvent, "id">): boolean {
    return this.undoEligibility(event).canUndo;
  }

  /** canUndo with the reason. Never throws, never mutates. */
  undoEligibility(event: Pick<CampusEvent, "id">): UndoEligibility {
    const record = this.records.get(event.id);
    if (!record) {
      return { canUndo: false, reason: "no_history", undoDeadline: null };
    }
    if (record.undone_at !== null) {
      return { canUndo: false, reason: "already_undone", undoDeadline: record.undo_deadline };
    }
    if (this.now() > Date.parse(record.undo_deadline)) {
      return { canUndo: false, reason: "expired", undoDeadline: record.undo_deadline };
    }
    return { canUndo: true, reason: "available", undoDeadline: record.undo_deadline };
  }

  /** Copy of the current record for an event, for audit. */
  getCancellationRecord(eventId: string): CancellationRecord | null {
    const record = this.records.get(eventId);
    return record ? { ...record } : null;
  }

  private assertPermission(event: CampusEvent, actor: User, action: "cancel" | "undo"): void {
    if (canManageEvent(event, actor)) {
      return;
    }
    const verb = action === "cancel" ? "cancel this event" : "undo this cancellation";
    throw new PermissionError(
      `User ${actor.user_id} does not have permission to ${verb}. ` +
        "Only the organizer or a teacher can do so.",
      actor.user_id,
      event.id,
    );
  }

  private sideEffect<T>(label: string, eventId: string, effect: () => T): T | null {
    try {
      return effect();
    } catch (err) {
      this.logger.error(`${label} failed`, { eventId, error: describeError(err) });
      return null;
    }
  }
}
