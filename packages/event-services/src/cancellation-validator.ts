/**
 * Late-cancellation policy.
 *
 * An event canceled with less than `thresholdHours` (24) of notice is a
 * late cancellation and must carry a non-blank reason. The check is a
 * pure function of the event's start, the reason and the current time.
 *
 * Callers branch on `valid` / `isLateCancellation` only; message text is
 * informational.
 */

import {
  LATE_CANCELLATION_THRESHOLD_HOURS,
  REASON_EXCERPT_LENGTH,
  ValidationError,
  hoursUntilEvent,
  isWithinNoticeWindow,
} from "@campus-events/shared";
import type { CampusEvent } from "@campus-events/shared";

export interface CancellationValidation {
  valid: true;
  isLateCancellation: boolean;
  /** Fractional hours until start; negative once the event has started. */
  hoursUntilEvent: number;
  message: string;
}

export interface ValidateCancellationOptions {
  nowMs?: number;
  thresholdHours?: number;
}

/** Blank means missing: null, undefined, or whitespace only. */
export function isBlankReason(reason: string | null | undefined): boolean {
  return reason == null || reason.trim() === "";
}

function excerpt(reason: string): string {
  const trimmed = reason.trim();
  return trimmed.length > REASON_EXCERPT_LENGTH
    ? `${trimmed.slice(0, REASON_EXCERPT_LENGTH)}...`
    : trimmed;
}

/**
 * Validate a cancellation reason against the notice window.
 *
 * @throws ValidationError for a late cancellation without a reason
 */
export function validateCancellationReason(
  event: Pick<CampusEvent, "start_at">,
  reason: string | null | undefined,
  options: ValidateCancellationOptions = {},
): CancellationValidation {
  const threshold = options.thresholdHours ?? LATE_CANCELLATION_THRESHOLD_HOURS;
  const hours = hoursUntilEvent(event, options.nowMs ?? Date.now());
  const isLate = isWithinNoticeWindow(hours, threshold);
  const shownHours = hours.toFixed(1);

  if (isLate && isBlankReason(reason)) {
    throw new ValidationError(
      `Cancellation reason is required for events starting in less than ${threshold} hours. ` +
        `This event starts in ${shownHours} hours.`,
      hours,
    );
  }

  let message: string;
  if (isLate) {
    message = `Late cancellation validated. Event starts in ${shownHours} hours. Reason provided: ${excerpt(reason ?? "")}`;
  } else if (!isBlankReason(reason)) {
    message = `Cancellation validated. Event starts in ${shownHours} hours. Reason: ${excerpt(reason ?? "")}`;
  } else {
    message = `Cancellation validated. Event starts in ${shownHours} hours. No reason required (at least ${threshold} hours notice).`;
  }

  return { valid: true, isLateCancellation: isLate, hoursUntilEvent: hours, message };
}
