/**
 * Event title rules, applied when a course event is created or renamed.
 */

import { InvalidInputError } from "@campus-events/shared";

export const EVENT_NAME_MIN_LENGTH = 5;
export const EVENT_NAME_MAX_LENGTH = 100;

/** Letters, digits, spaces, apostrophes, ampersands, colons and hyphens. */
const EVENT_NAME_PATTERN = /^[A-Za-z0-9 '&:-]+$/;

/** Phrases that may not appear anywhere in a title (case-insensitive). */
export const BANNED_EVENT_NAME_PHRASES: readonly string[] = [
  "inappropriate",
  "test event",
  "dummy",
];

/**
 * Collect every rule the proposed name breaks. Empty result means valid.
 *
 * @param currentName - When renaming, the new name must differ from it
 */
export function validateEventName(newName: string, currentName?: string): string[] {
  const errors: string[] = [];
  const cleaned = newName.trim();

  if (!cleaned) {
    errors.push("Event name cannot be empty.");
  }

  if (cleaned.length < EVENT_NAME_MIN_LENGTH || cleaned.length > EVENT_NAME_MAX_LENGTH) {
    errors.push(
      `Event name must be between ${EVENT_NAME_MIN_LENGTH} and ${EVENT_NAME_MAX_LENGTH} characters.`,
    );
  }

  if (cleaned && !EVENT_NAME_PATTERN.test(cleaned)) {
    errors.push("Event name contains invalid characters.");
  }

  const lower = cleaned.toLowerCase();
  for (const phrase of BANNED_EVENT_NAME_PHRASES) {
    if (lower.includes(phrase)) {
      errors.push(`Event name cannot contain '${phrase}'.`);
    }
  }

  if (currentName !== undefined && cleaned === currentName) {
    errors.push("New event name must be different from the current name.");
  }

  return errors;
}

/** Throws InvalidInputError listing every broken rule. */
export function assertValidEventName(newName: string, currentName?: string): string {
  const errors = validateEventName(newName, currentName);
  if (errors.length > 0) {
    throw new InvalidInputError("Invalid event name", errors);
  }
  return newName.trim();
}
