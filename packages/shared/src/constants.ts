/**
 * @campus-events/shared -- Constants for the campus event system.
 *
 * All magic strings, default values, and prefix maps live here so that
 * every service references the same values.
 */

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const USER_ROLES = ["student", "teacher"] as const;

export const EVENT_STATUSES = ["SCHEDULED", "CANCELED"] as const;

export const RSVP_STATUSES = ["CONFIRMED", "CANCELED"] as const;

export const NOTIFICATION_KINDS = ["CANCELLATION", "RESTORATION"] as const;

// ---------------------------------------------------------------------------
// Cancellation policy
// ---------------------------------------------------------------------------

/** Cancellations with less notice than this are "late" and need a reason. */
export const LATE_CANCELLATION_THRESHOLD_HOURS = 24;

/** How long after a cancellation it may still be reversed. */
export const DEFAULT_UNDO_WINDOW_MINUTES = 10;

/** Longest reason excerpt echoed back in validation messages. */
export const REASON_EXCERPT_LENGTH = 50;

// ---------------------------------------------------------------------------
// Calendar sync
// ---------------------------------------------------------------------------

export const GOOGLE_CALENDAR_INTEGRATION = "google_calendar" as const;

export const OUTLOOK_INTEGRATION = "outlook" as const;

/** Integrations pushed to when the caller names none. */
export const DEFAULT_CALENDAR_INTEGRATIONS: readonly string[] = [
  GOOGLE_CALENDAR_INTEGRATION,
  OUTLOOK_INTEGRATION,
];

/** Domain used for iCalendar UIDs and organizer mailto addresses. */
export const DEFAULT_CALENDAR_DOMAIN = "events.campus.local";

export const DEFAULT_PRODUCT_ID = "-//Campus Events//Event System//EN";

// ---------------------------------------------------------------------------
// ID prefix map
// ---------------------------------------------------------------------------

/**
 * Prefix map for generating branded IDs.
 * Usage: `ID_PREFIXES.event + ulid()` => "evt_01HXYZ..."
 */
export const ID_PREFIXES = {
  event: "evt_",
  rsvp: "rsv_",
  notification: "ntf_",
  sync: "syn_",
  override: "ovr_",
  alert: "alt_",
} as const;
