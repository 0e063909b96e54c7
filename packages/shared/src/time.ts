/**
 * Wall-clock arithmetic shared by the cancellation validator and the
 * notification dispatcher, so both compute "hours until event" and the
 * late/urgent threshold identically.
 */

import { LATE_CANCELLATION_THRESHOLD_HOURS } from "./constants";
import type { CampusEvent } from "./types";

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;

/** Injectable clock returning epoch milliseconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Hours from `nowMs` until the event starts. Fractional; negative once the
 * event has started.
 */
export function hoursUntilEvent(
  event: Pick<CampusEvent, "start_at">,
  nowMs: number,
): number {
  return (Date.parse(event.start_at) - nowMs) / MS_PER_HOUR;
}

/** True when fewer than `thresholdHours` remain before the start. */
export function isWithinNoticeWindow(
  hoursUntil: number,
  thresholdHours: number = LATE_CANCELLATION_THRESHOLD_HOURS,
): boolean {
  return hoursUntil < thresholdHours;
}

export function toIso(ms: number): string {
  return new Date(ms).toISOString();
}
