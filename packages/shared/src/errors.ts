/**
 * @campus-events/shared -- Error taxonomy.
 *
 * Every error the services raise extends CampusEventsError and carries a
 * stable `code`, so callers branch on `code` (or `instanceof`) rather than
 * on message text.
 */

export type CampusEventsErrorCode =
  | "VALIDATION_FAILED"
  | "PERMISSION_DENIED"
  | "ALREADY_CANCELED"
  | "NOT_CANCELED"
  | "NO_CANCELLATION_HISTORY"
  | "UNDO_EXPIRED"
  | "CALENDAR_DOCUMENT_FAILED"
  | "INVALID_INPUT"
  | "NOT_FOUND";

/** Base class for all campus event errors. */
export class CampusEventsError extends Error {
  readonly code: CampusEventsErrorCode;

  constructor(message: string, code: CampusEventsErrorCode) {
    super(message);
    this.name = "CampusEventsError";
    this.code = code;
  }
}

/** Late cancellation without a reason. The caller may retry with one. */
export class ValidationError extends CampusEventsError {
  readonly hoursUntilEvent: number;

  constructor(message: string, hoursUntilEvent: number) {
    super(message, "VALIDATION_FAILED");
    this.name = "ValidationError";
    this.hoursUntilEvent = hoursUntilEvent;
  }
}

/**
 * Actor lacks the role or ownership for the action. `eventId` is null when
 * the action targets something other than an existing event.
 */
export class PermissionError extends CampusEventsError {
  readonly actorId: string;
  readonly eventId: string | null;

  constructor(message: string, actorId: string, eventId: string | null = null) {
    super(message, "PERMISSION_DENIED");
    this.name = "PermissionError";
    this.actorId = actorId;
    this.eventId = eventId;
  }
}

export class AlreadyCanceledError extends CampusEventsError {
  readonly eventId: string;

  constructor(eventId: string) {
    super(`Event ${eventId} is already canceled`, "ALREADY_CANCELED");
    this.name = "AlreadyCanceledError";
    this.eventId = eventId;
  }
}

export class NotCanceledError extends CampusEventsError {
  readonly eventId: string;

  constructor(eventId: string, status: string) {
    super(
      `Event ${eventId} is not currently canceled (status: ${status})`,
      "NOT_CANCELED",
    );
    this.name = "NotCanceledError";
    this.eventId = eventId;
  }
}

/**
 * No undoable cancellation exists for the event. `alreadyUndone` is true
 * when a record exists but its cancellation was already reversed.
 */
export class NoCancellationHistoryError extends CampusEventsError {
  readonly eventId: string;
  readonly alreadyUndone: boolean;

  constructor(eventId: string, alreadyUndone = false) {
    super(
      alreadyUndone
        ? `Cancellation of event ${eventId} was already undone`
        : `No cancellation history found for event ${eventId}`,
      "NO_CANCELLATION_HISTORY",
    );
    this.name = "NoCancellationHistoryError";
    this.eventId = eventId;
    this.alreadyUndone = alreadyUndone;
  }
}

export class UndoExpiredError extends CampusEventsError {
  readonly eventId: string;
  readonly elapsedSeconds: number;
  readonly undoDeadline: string;

  constructor(
    eventId: string,
    elapsedSeconds: number,
    undoDeadline: string,
    windowMinutes: number,
  ) {
    super(
      `Undo window expired. Event ${eventId} was canceled ` +
        `${(elapsedSeconds / 60).toFixed(1)} minutes ago; undo is only ` +
        `available for ${windowMinutes} minutes after cancellation.`,
      "UNDO_EXPIRED",
    );
    this.name = "UndoExpiredError";
    this.eventId = eventId;
    this.elapsedSeconds = elapsedSeconds;
    this.undoDeadline = undoDeadline;
  }
}

/** The iCalendar document could not be built from the event snapshot. */
export class CalendarDocumentError extends CampusEventsError {
  constructor(message: string) {
    super(message, "CALENDAR_DOCUMENT_FAILED");
    this.name = "CalendarDocumentError";
  }
}

/** Input failed schema validation. `issues` holds one line per problem. */
export class InvalidInputError extends CampusEventsError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, "INVALID_INPUT");
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}

export class NotFoundError extends CampusEventsError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}
