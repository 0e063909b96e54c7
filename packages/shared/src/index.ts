/**
 * @campus-events/shared -- shared types, constants, and utilities
 * for the campus event system.
 */

/** Application name constant. */
export const APP_NAME = "campus-events" as const;

export type {
  UserRole,
  EventStatus,
  RsvpStatus,
  NotificationKind,
  User,
  CampusEvent,
  Rsvp,
  NotificationLogEntry,
  SyncResult,
} from "./types";

export {
  USER_ROLES,
  EVENT_STATUSES,
  RSVP_STATUSES,
  NOTIFICATION_KINDS,
  LATE_CANCELLATION_THRESHOLD_HOURS,
  DEFAULT_UNDO_WINDOW_MINUTES,
  REASON_EXCERPT_LENGTH,
  GOOGLE_CALENDAR_INTEGRATION,
  OUTLOOK_INTEGRATION,
  DEFAULT_CALENDAR_INTEGRATIONS,
  DEFAULT_CALENDAR_DOMAIN,
  DEFAULT_PRODUCT_ID,
  ID_PREFIXES,
} from "./constants";

export { generateId } from "./id";
export type { EntityType } from "./id";

export {
  CampusEventsError,
  ValidationError,
  PermissionError,
  AlreadyCanceledError,
  NotCanceledError,
  NoCancellationHistoryError,
  UndoExpiredError,
  CalendarDocumentError,
  InvalidInputError,
  NotFoundError,
} from "./errors";
export type { CampusEventsErrorCode } from "./errors";

export {
  LOG_LEVELS,
  ConsoleLogger,
  MemoryLogger,
  NoopLogger,
  createLogger,
  describeError,
  isLogLevel,
} from "./logger";
export type { Logger, LogLevel, LogFields, LogEntry } from "./logger";

export {
  EventSystemConfigSchema,
  DEFAULT_EVENT_SYSTEM_CONFIG,
  parseEventSystemConfig,
  validateEventSystemConfig,
} from "./config";
export type { EventSystemConfig } from "./config";

export {
  formatIssues,
  UserRoleSchema,
  UserInputSchema,
  EventInputSchema,
  createUser,
  createCampusEvent,
} from "./schemas";
export type { UserInput, EventInput } from "./schemas";

export {
  MS_PER_SECOND,
  MS_PER_MINUTE,
  MS_PER_HOUR,
  systemClock,
  hoursUntilEvent,
  isWithinNoticeWindow,
  toIso,
} from "./time";
export type { Clock } from "./time";

export { AppendOnlyLog } from "./append-log";

export {
  CANCELLATION_MARKER,
  escapeText,
  foldLine,
  formatICalDateTime,
  publishedDescription,
  buildVEvent,
  buildCalendarDocument,
} from "./ical";
export type { CalendarDocumentOptions } from "./ical";
