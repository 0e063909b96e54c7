/**
 * Calendar sync adapter: generates the iCalendar document for an event and
 * pushes it to named external calendar integrations.
 *
 * Design decisions:
 * - The document is generated once per sync. If generation fails the whole
 *   sync fails closed: no integration is attempted and no SyncResult is
 *   recorded.
 * - Per-integration failures (false return, thrown error, unknown name) are
 *   recorded as SyncResults and counted, never raised, so one bad
 *   integration cannot block the others.
 * - Sync history is append-only.
 */

import {
  AppendOnlyLog,
  DEFAULT_CALENDAR_DOMAIN,
  DEFAULT_CALENDAR_INTEGRATIONS,
  DEFAULT_PRODUCT_ID,
  GOOGLE_CALENDAR_INTEGRATION,
  NoopLogger,
  OUTLOOK_INTEGRATION,
  buildCalendarDocument,
  describeError,
  generateId,
  systemClock,
  toIso,
} from "@campus-events/shared";
import type {
  CampusEvent,
  Clock,
  EventStatus,
  Logger,
  SyncResult,
} from "@campus-events/shared";

// ---------------------------------------------------------------------------
// Integrations
// ---------------------------------------------------------------------------

/** A named external calendar system that accepts iCalendar documents. */
export interface CalendarIntegration {
  readonly name: string;
  /** Push the document. Returns true on success. */
  push(event: CampusEvent, document: string): boolean;
}

/**
 * Simulated integration: logs the push and reports success. Stands in for
 * the Google Calendar and Microsoft Graph clients.
 */
export class LoggingCalendarIntegration implements CalendarIntegration {
  constructor(
    readonly name: string,
    private readonly label: string,
    private readonly logger: Logger,
  ) {}

  push(event: CampusEvent, document: string): boolean {
    this.logger.info(`synced to ${this.label}`, {
      integration: this.name,
      eventId: event.id,
      status: event.status,
      documentLength: document.length,
    });
    return true;
  }
}

/** The two integrations recognized out of the box. */
export function defaultCalendarIntegrations(logger: Logger): CalendarIntegration[] {
  return [
    new LoggingCalendarIntegration(GOOGLE_CALENDAR_INTEGRATION, "Google Calendar", logger),
    new LoggingCalendarIntegration(OUTLOOK_INTEGRATION, "Outlook", logger),
  ];
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface IntegrationOutcome {
  integration: string;
  success: boolean;
  message: string;
}

interface SyncReportBase {
  eventId: string;
  eventTitle: string;
  eventStatus: EventStatus;
  timestamp: string;
}

export interface SyncSuccessReport extends SyncReportBase {
  icsGenerated: true;
  /** Length of the generated document in characters. */
  icsSize: number;
  syncedCount: number;
  failedCount: number;
  results: IntegrationOutcome[];
}

export interface SyncFailureReport extends SyncReportBase {
  icsGenerated: false;
  error: string;
}

export type SyncReport = SyncSuccessReport | SyncFailureReport;

export interface SyncHistoryFilter {
  eventId?: string;
  integration?: string;
}

export const SYNC_SUCCESS_MESSAGE = "Successfully synced";
export const SYNC_FAILED_MESSAGE = "Sync failed";

// ---------------------------------------------------------------------------
// CalendarSyncService
// ---------------------------------------------------------------------------

export interface CalendarSyncServiceOptions {
  /** Registered integrations. Default: google_calendar and outlook. */
  integrations?: CalendarIntegration[];
  /** Integration names synced when the caller names none. */
  defaultIntegrations?: readonly string[];
  domain?: string;
  productId?: string;
  now?: Clock;
  logger?: Logger;
}

export class CalendarSyncService {
  private readonly integrations = new Map<string, CalendarIntegration>();
  private readonly defaultIntegrations: readonly string[];
  private readonly domain: string;
  private readonly productId: string;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly history = new AppendOnlyLog<SyncResult>();

  constructor(options: CalendarSyncServiceOptions = {}) {
    this.logger = options.logger ?? new NoopLogger();
    this.now = options.now ?? systemClock;
    this.domain = options.domain ?? DEFAULT_CALENDAR_DOMAIN;
    this.productId = options.productId ?? DEFAULT_PRODUCT_ID;
    this.defaultIntegrations = options.defaultIntegrations ?? DEFAULT_CALENDAR_INTEGRATIONS;
    for (const integration of options.integrations ?? defaultCalendarIntegrations(this.logger)) {
      this.integrations.set(integration.name, integration);
    }
  }

  /**
   * Generate the iCalendar document for an event snapshot.
   *
   * @throws CalendarDocumentError if a timestamp on the event is invalid
   */
  generateDocument(event: CampusEvent): string {
    return buildCalendarDocument(event, { domain: this.domain, productId: this.productId });
  }

  /** Push the event to each named integration and record one SyncResult per attempt. */
  sync(event: CampusEvent, integrations: readonly string[] = this.defaultIntegrations): SyncReport {
    const timestamp = toIso(this.now());
    const base: SyncReportBase = {
      eventId: event.id,
      eventTitle: event.title,
      eventStatus: event.status,
      timestamp,
    };

    let document: string;
    try {
      document = this.generateDocument(event);
    } catch (err) {
      const error = describeError(err);
      this.logger.error("calendar document generation failed", { eventId: event.id, error });
      return { ...base, icsGenerated: false, error };
    }

    const results: IntegrationOutcome[] = [];
    for (const name of integrations) {
      const outcome = this.pushTo(name, event, document);
      this.history.append({
        id: generateId("sync"),
        event_id: event.id,
        integration: name,
        success: outcome.success,
        timestamp,
        message: outcome.message,
      });
      results.push(outcome);
    }

    const syncedCount = results.filter((r) => r.success).length;
    return {
      ...base,
      icsGenerated: true,
      icsSize: document.length,
      syncedCount,
      failedCount: results.length - syncedCount,
      results,
    };
  }

  /** Recorded sync attempts, optionally filtered (filters combine with AND). */
  getHistory(filter: SyncHistoryFilter = {}): SyncResult[] {
    return this.history.filter(
      (r) =>
        (filter.eventId === undefined || r.event_id === filter.eventId) &&
        (filter.integration === undefined || r.integration === filter.integration),
    );
  }

  private pushTo(name: string, event: CampusEvent, document: string): IntegrationOutcome {
    const integration = this.integrations.get(name);
    if (!integration) {
      this.logger.warn("unknown calendar integration", { integration: name, eventId: event.id });
      return { integration: name, success: false, message: `Unknown integration: ${name}` };
    }

    try {
      const success = integration.push(event, document);
      return {
        integration: name,
        success,
        message: success ? SYNC_SUCCESS_MESSAGE : SYNC_FAILED_MESSAGE,
      };
    } catch (err) {
      const message = describeError(err);
      this.logger.error("calendar push failed", { integration: name, eventId: event.id, error: message });
      return { integration: name, success: false, message };
    }
  }
}
