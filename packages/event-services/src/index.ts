/**
 * @campus-events/event-services -- RSVP, notification, feed, calendar sync,
 * cancellation/undo and course event services.
 */

export { InMemoryRsvpStore } from "./rsvp-store";
export type { RsvpStore } from "./rsvp-store";

export { RsvpService } from "./rsvp-service";
export type { RsvpServiceOptions, CreateRsvpResult } from "./rsvp-service";

export {
  LoggingNotificationTransport,
  buildCancellationEmail,
  buildRestorationEmail,
} from "./notification-transport";
export type {
  NotificationMessage,
  NotificationTransport,
  EmailContent,
} from "./notification-transport";

export { NotificationDispatcher } from "./notification-dispatcher";
export type {
  NotificationDispatcherOptions,
  NotificationSummary,
  NotificationLogFilter,
} from "./notification-dispatcher";

export { InMemoryEventFeed } from "./feed";
export type { EventFeed } from "./feed";

export { LoggingFollowerNotifier } from "./followers";
export type { FollowerNotifier } from "./followers";

export {
  CalendarSyncService,
  LoggingCalendarIntegration,
  defaultCalendarIntegrations,
  SYNC_SUCCESS_MESSAGE,
  SYNC_FAILED_MESSAGE,
} from "./calendar-sync";
export type {
  CalendarIntegration,
  CalendarSyncServiceOptions,
  IntegrationOutcome,
  SyncReport,
  SyncSuccessReport,
  SyncFailureReport,
  SyncHistoryFilter,
} from "./calendar-sync";

export { validateCancellationReason, isBlankReason } from "./cancellation-validator";
export type {
  CancellationValidation,
  ValidateCancellationOptions,
} from "./cancellation-validator";

export { EventCancellationManager, canManageEvent } from "./cancellation-manager";
export type {
  CancellationNotifier,
  CancellationRecord,
  CancelResult,
  UndoResult,
  UndoEligibility,
  UndoEligibilityReason,
  EventCancellationManagerOptions,
} from "./cancellation-manager";

export { EventCancellationService } from "./event-cancellation-service";
export type {
  EventCancellationServiceDeps,
  WorkflowCancelResult,
  WorkflowUndoResult,
} from "./event-cancellation-service";

export { InMemoryEventRepository } from "./event-repository";
export type { EventRepository } from "./event-repository";

export {
  validateEventName,
  assertValidEventName,
  BANNED_EVENT_NAME_PHRASES,
  EVENT_NAME_MIN_LENGTH,
  EVENT_NAME_MAX_LENGTH,
} from "./event-name";

export { CourseEventService, StaticSectionDirectory } from "./course-event-service";
export type {
  CourseSection,
  SectionDirectory,
  CourseEventInput,
  OverrideEventDraft,
  OverrideRequest,
  OverrideRequestStatus,
  CourseEventServiceDeps,
} from "./course-event-service";

export { AlertSubscriptions, ALERT_TYPES, buildAlertMessage, createAlert } from "./alerts";
export type {
  Alert,
  AlertType,
  SentAlert,
  SubscribeOutcome,
  UnsubscribeOutcome,
  AlertSubscriptionsOptions,
} from "./alerts";

export { createEventSystem } from "./system";
export type { EventSystem, EventSystemOptions } from "./system";
