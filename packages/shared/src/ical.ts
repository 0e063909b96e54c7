/**
 * iCalendar (RFC 5545) generation for calendar-integration pushes.
 *
 * Pure functions that convert a campus event snapshot into a one-event
 * VCALENDAR document. Output is deterministic for a given snapshot:
 * DTSTAMP comes from the event's own timestamps, never from "now".
 *
 * RFC 5545 reference: https://tools.ietf.org/html/rfc5545
 */

import { DEFAULT_CALENDAR_DOMAIN, DEFAULT_PRODUCT_ID } from "./constants";
import { CalendarDocumentError } from "./errors";
import type { CampusEvent } from "./types";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** CRLF line ending required by RFC 5545 */
const CRLF = "\r\n";

/** Maximum line length before folding (RFC 5545 Section 3.1) */
const MAX_LINE_LENGTH = 75;

/** Description suffix marker for canceled events. */
export const CANCELLATION_MARKER = "CANCELED:";

// ---------------------------------------------------------------------------
// Text escaping (RFC 5545 Section 3.3.11)
// ---------------------------------------------------------------------------

/**
 * Escape special characters in iCalendar TEXT values.
 * Backslash, semicolons, commas, and newlines must be escaped.
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\r?\n/g, "\\n");
}

/** Parameter values containing ":", ";" or "," must be quoted. */
function quoteParam(value: string): string {
  const cleaned = value.replace(/"/g, "");
  return /[:;,]/.test(cleaned) ? `"${cleaned}"` : cleaned;
}

// ---------------------------------------------------------------------------
// Line folding (RFC 5545 Section 3.1)
// ---------------------------------------------------------------------------

/**
 * Fold a content line at 75 characters.
 * Continuation lines begin with a single space.
 */
export function foldLine(line: string): string {
  if (line.length <= MAX_LINE_LENGTH) {
    return line;
  }

  const parts: string[] = [line.slice(0, MAX_LINE_LENGTH)];
  let pos = MAX_LINE_LENGTH;

  // The leading space of a continuation line counts toward its length
  const chunkSize = MAX_LINE_LENGTH - 1;
  while (pos < line.length) {
    parts.push(" " + line.slice(pos, pos + chunkSize));
    pos += chunkSize;
  }

  return parts.join(CRLF);
}

// ---------------------------------------------------------------------------
// Date-time formatting
// ---------------------------------------------------------------------------

/**
 * Format an ISO 8601 timestamp as a UTC DATE-TIME (YYYYMMDDTHHMMSSZ).
 * Offsets are normalized to UTC; sub-second precision is dropped.
 *
 * @throws CalendarDocumentError if the timestamp does not parse
 */
export function formatICalDateTime(isoTimestamp: string, field = "timestamp"): string {
  const ms = Date.parse(isoTimestamp);
  if (Number.isNaN(ms)) {
    throw new CalendarDocumentError(`Invalid ${field}: "${isoTimestamp}"`);
  }
  // 2025-06-15T09:00:00.000Z -> 20250615T090000Z
  return new Date(ms).toISOString().replace(/\.\d{3}Z$/, "Z").replace(/[-:]/g, "");
}

// ---------------------------------------------------------------------------
// Document assembly
// ---------------------------------------------------------------------------

export interface CalendarDocumentOptions {
  /** Domain for the UID and organizer mailto. Default: DEFAULT_CALENDAR_DOMAIN. */
  domain?: string;
  /** PRODID value. Default: DEFAULT_PRODUCT_ID. */
  productId?: string;
}

/**
 * Description as published: the event description, plus the cancellation
 * reason for a canceled event that has one.
 */
export function publishedDescription(event: CampusEvent): string {
  if (event.status === "CANCELED" && event.cancellation_reason) {
    const prefix = event.description ? `${event.description}\n\n` : "";
    return `${prefix}${CANCELLATION_MARKER} ${event.cancellation_reason}`;
  }
  return event.description;
}

/**
 * Build the VEVENT component for an event.
 * STATUS is CANCELLED (RFC spelling) for canceled events, else CONFIRMED.
 */
export function buildVEvent(event: CampusEvent, options?: CalendarDocumentOptions): string {
  const domain = options?.domain ?? DEFAULT_CALENDAR_DOMAIN;
  const lines: string[] = [];

  lines.push("BEGIN:VEVENT");
  lines.push(`UID:${event.id}@${domain}`);
  lines.push(`DTSTAMP:${formatICalDateTime(event.canceled_at ?? event.created_at, "DTSTAMP")}`);
  lines.push(`DTSTART:${formatICalDateTime(event.start_at, "start_at")}`);
  lines.push(`DTEND:${formatICalDateTime(event.end_at, "end_at")}`);
  lines.push(`SUMMARY:${escapeText(event.title || "(No title)")}`);

  const description = publishedDescription(event);
  if (description) {
    lines.push(`DESCRIPTION:${escapeText(description)}`);
  }

  if (event.location) {
    lines.push(`LOCATION:${escapeText(event.location)}`);
  }

  lines.push(
    `ORGANIZER;CN=${quoteParam(event.organizer_name)}:mailto:${event.organizer_id}@${domain}`,
  );
  lines.push(`STATUS:${event.status === "CANCELED" ? "CANCELLED" : "CONFIRMED"}`);
  lines.push("END:VEVENT");

  return lines.map(foldLine).join(CRLF);
}

/**
 * Build a complete VCALENDAR document carrying one event.
 *
 * @throws CalendarDocumentError if any of the event's timestamps is invalid
 */
export function buildCalendarDocument(
  event: CampusEvent,
  options?: CalendarDocumentOptions,
): string {
  const parts = [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    foldLine(`PRODID:${options?.productId ?? DEFAULT_PRODUCT_ID}`),
    "CALSCALE:GREGORIAN",
    "METHOD:PUBLISH",
    buildVEvent(event, options),
    "END:VCALENDAR",
  ];
  return parts.join(CRLF) + CRLF;
}
