/**
 * Cancellation workflow: the entry point callers use to cancel or restore
 * an event end to end.
 *
 *   validate + transition (manager) -> attendees + feed (manager)
 *     -> followers -> calendar sync
 *
 * Calendar sync runs only after the transition succeeded, so a rejected
 * cancellation never pushes anything to an external calendar.
 */

import { NoopLogger, describeError } from "@campus-events/shared";
import type { CampusEvent, Logger, User } from "@campus-events/shared";
import type { CalendarSyncService, SyncReport } from "./calendar-sync";
import type { CancelResult, EventCancellationManager, UndoResult } from "./cancellation-manager";
import type { FollowerNotifier } from "./followers";

export interface EventCancellationServiceDeps {
  manager: EventCancellationManager;
  calendarSync: CalendarSyncService;
  followers: FollowerNotifier;
  logger?: Logger;
  /** Integration names to sync to. Default: the sync service's defaults. */
  integrations?: readonly string[];
}

export interface WorkflowCancelResult {
  cancellation: CancelResult;
  followersNotified: boolean;
  sync: SyncReport;
}

export interface WorkflowUndoResult {
  undo: UndoResult;
  followersNotified: boolean;
  sync: SyncReport;
}

export class EventCancellationService {
  private readonly manager: EventCancellationManager;
  private readonly calendarSync: CalendarSyncService;
  private readonly followers: FollowerNotifier;
  private readonly logger: Logger;
  private readonly integrations: readonly string[] | undefined;

  constructor(deps: EventCancellationServiceDeps) {
    this.manager = deps.manager;
    this.calendarSync = deps.calendarSync;
    this.followers = deps.followers;
    this.logger = deps.logger ?? new NoopLogger();
    this.integrations = deps.integrations;
  }

  /**
   * Cancel an event, notify its followers and push the CANCELLED document
   * to calendar integrations. Precondition errors from the manager
   * propagate unchanged.
   */
  cancel(event: CampusEvent, actor: User, reason?: string | null): WorkflowCancelResult {
    const cancellation = this.manager.cancelEvent(event, actor, reason);
    const followersNotified = this.notifyFollowers(event);
    const sync = this.calendarSync.sync(event, this.integrations);
    return { cancellation, followersNotified, sync };
  }

  /** Undo a cancellation and re-sync the restored (CONFIRMED) event. */
  undo(event: CampusEvent, actor: User): WorkflowUndoResult {
    const undo = this.manager.undoCancel(event, actor);
    const followersNotified = this.notifyFollowers(event);
    const sync = this.calendarSync.sync(event, this.integrations);
    return { undo, followersNotified, sync };
  }

  canUndo(event: CampusEvent): boolean {
    return this.manager.canUndo(event);
  }

  private notifyFollowers(event: CampusEvent): boolean {
    try {
      this.followers.notifyFollowers(event);
      return true;
    } catch (err) {
      this.logger.error("follower notification failed", { eventId: event.id, error: describeError(err) });
      return false;
    }
  }
}
