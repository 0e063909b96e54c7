/**
 * Composition root: wires every service to its collaborators from one
 * configuration object. Each call builds an isolated set of in-memory
 * stores; nothing is process-global.
 */

import {
  DEFAULT_EVENT_SYSTEM_CONFIG,
  createLogger,
  systemClock,
  validateEventSystemConfig,
} from "@campus-events/shared";
import type { Clock, EventSystemConfig, Logger } from "@campus-events/shared";
import { AlertSubscriptions } from "./alerts";
import { CalendarSyncService, defaultCalendarIntegrations } from "./calendar-sync";
import type { CalendarIntegration } from "./calendar-sync";
import { EventCancellationManager } from "./cancellation-manager";
import { CourseEventService, StaticSectionDirectory } from "./course-event-service";
import type { SectionDirectory } from "./course-event-service";
import { EventCancellationService } from "./event-cancellation-service";
import { InMemoryEventRepository } from "./event-repository";
import { InMemoryEventFeed } from "./feed";
import { LoggingFollowerNotifier } from "./followers";
import { NotificationDispatcher } from "./notification-dispatcher";
import { LoggingNotificationTransport } from "./notification-transport";
import type { NotificationTransport } from "./notification-transport";
import { InMemoryRsvpStore } from "./rsvp-store";
import { RsvpService } from "./rsvp-service";

export interface EventSystemOptions {
  config?: Partial<EventSystemConfig>;
  now?: Clock;
  /** Builds the logger for each component. Default: createLogger(config, scope). */
  loggerFor?: (scope: string) => Logger;
  transport?: NotificationTransport;
  integrations?: CalendarIntegration[];
  sections?: SectionDirectory;
}

/** @throws InvalidInputError if the merged configuration is invalid */
export function createEventSystem(options: EventSystemOptions = {}) {
  const config = validateEventSystemConfig({ ...DEFAULT_EVENT_SYSTEM_CONFIG, ...options.config });
  const now = options.now ?? systemClock;
  const loggerFor = options.loggerFor ?? ((scope: string) => createLogger(config, scope));

  const rsvpStore = new InMemoryRsvpStore();
  const feed = new InMemoryEventFeed();
  const events = new InMemoryEventRepository();

  const dispatcher = new NotificationDispatcher(
    rsvpStore,
    options.transport ?? new LoggingNotificationTransport(loggerFor("email")),
    { now, logger: loggerFor("notifications"), lateCancellationHours: config.lateCancellationHours },
  );

  const calendarLogger = loggerFor("calendar-sync");
  const calendarSync = new CalendarSyncService({
    integrations: options.integrations ?? defaultCalendarIntegrations(calendarLogger),
    defaultIntegrations: config.calendarIntegrations,
    domain: config.calendarDomain,
    productId: config.productId,
    now,
    logger: calendarLogger,
  });

  const manager = new EventCancellationManager({
    notifications: dispatcher,
    feed,
    undoWindowMinutes: config.undoWindowMinutes,
    lateCancellationHours: config.lateCancellationHours,
    now,
    logger: loggerFor("cancellation"),
  });

  const followers = new LoggingFollowerNotifier(loggerFor("followers"));

  return {
    config,
    rsvpStore,
    feed,
    events,
    dispatcher,
    calendarSync,
    manager,
    followers,
    rsvps: new RsvpService(rsvpStore, { now, logger: loggerFor("rsvp") }),
    cancellations: new EventCancellationService({
      manager,
      calendarSync,
      followers,
      logger: loggerFor("cancellation-workflow"),
    }),
    courseEvents: new CourseEventService({
      events,
      sections: options.sections ?? new StaticSectionDirectory({}),
      feed,
      now,
      logger: loggerFor("course-events"),
    }),
    alerts: new AlertSubscriptions({ now, logger: loggerFor("alerts") }),
  };
}

export type EventSystem = ReturnType<typeof createEventSystem>;
