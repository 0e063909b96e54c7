/**
 * Course event creation: the collaborator that produces the events the
 * cancellation workflow operates on.
 *
 * Provides:
 * 1. Professor-created course events (exam reviews, office hours), limited
 *    to courses the professor teaches
 * 2. Override requests for drafts that conflict with something, approved
 *    (creating the event) or denied with a reason
 * 3. Title changes under the event-name rules
 *
 * Every event handed out has a non-empty id and start < end.
 */

import {
  EventInputSchema,
  InvalidInputError,
  NoopLogger,
  NotFoundError,
  PermissionError,
  createCampusEvent,
  formatIssues,
  generateId,
  systemClock,
  toIso,
} from "@campus-events/shared";
import type { CampusEvent, Clock, Logger, User } from "@campus-events/shared";
import { assertValidEventName } from "./event-name";
import type { EventFeed } from "./feed";
import type { EventRepository } from "./event-repository";

// ---------------------------------------------------------------------------
// Course sections
// ---------------------------------------------------------------------------

export interface CourseSection {
  id: string;
  course_code: string;
  name: string;
}

/** Looks up the sections a professor teaches. */
export interface SectionDirectory {
  getSectionsForUser(userId: string): CourseSection[];
}

/** Directory backed by a fixed professor-id -> sections map. */
export class StaticSectionDirectory implements SectionDirectory {
  constructor(private readonly sections: Readonly<Record<string, CourseSection[]>>) {}

  getSectionsForUser(userId: string): CourseSection[] {
    return [...(this.sections[userId] ?? [])];
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CourseEventInput {
  course_code: string;
  title: string;
  description?: string;
  start_at: string;
  end_at: string;
  location?: string;
}

export interface OverrideEventDraft extends CourseEventInput {
  organizer_id: string;
  organizer_name: string;
}

export type OverrideRequestStatus = "pending" | "approved" | "denied";

export interface OverrideRequest {
  readonly id: string;
  readonly event_draft: OverrideEventDraft;
  readonly conflict_reason: string;
  status: OverrideRequestStatus;
  deny_reason: string | null;
  /** Event created on approval. */
  event_id: string | null;
  readonly created_at: string;
  updated_at: string;
}

export interface CourseEventServiceDeps {
  events: EventRepository;
  sections: SectionDirectory;
  /** Created events are added to this feed when given. */
  feed?: EventFeed;
  now?: Clock;
  logger?: Logger;
}

/** Callers get their own draft, so the stored one stays as validated. */
function copyRequest(request: OverrideRequest): OverrideRequest {
  return { ...request, event_draft: { ...request.event_draft } };
}

// ---------------------------------------------------------------------------
// CourseEventService
// ---------------------------------------------------------------------------

export class CourseEventService {
  private readonly events: EventRepository;
  private readonly sections: SectionDirectory;
  private readonly feed: EventFeed | undefined;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly overrideRequests = new Map<string, OverrideRequest>();

  constructor(deps: CourseEventServiceDeps) {
    this.events = deps.events;
    this.sections = deps.sections;
    this.feed = deps.feed;
    this.now = deps.now ?? systemClock;
    this.logger = deps.logger ?? new NoopLogger();
  }

  /** True if the professor teaches a section with this course code. */
  courseBelongsToProfessor(courseCode: string, professorId: string): boolean {
    return this.sections
      .getSectionsForUser(professorId)
      .some((section) => section.course_code === courseCode);
  }

  /**
   * Create an event for one of the professor's courses.
   *
   * @throws PermissionError if the user is not a teacher or does not teach the course
   * @throws InvalidInputError if the title or times are invalid
   */
  createCourseEvent(professor: User, input: CourseEventInput): CampusEvent {
    if (professor.role !== "teacher") {
      throw new PermissionError(
        `User ${professor.user_id} is not a teacher and cannot create course events`,
        professor.user_id,
      );
    }
    if (!this.courseBelongsToProfessor(input.course_code, professor.user_id)) {
      throw new PermissionError(
        `Course code '${input.course_code}' does not belong to professor ${professor.user_id}`,
        professor.user_id,
      );
    }

    const event = this.buildEvent({
      ...input,
      organizer_id: professor.user_id,
      organizer_name: professor.name,
    });
    this.logger.info("course event created", { eventId: event.id, courseCode: input.course_code });
    return event;
  }

  /**
   * Park a conflicting draft for review. The draft is validated now so an
   * approval cannot fail on bad input later.
   */
  createOverrideRequest(draft: OverrideEventDraft, conflictReason: string): OverrideRequest {
    const check = EventInputSchema.safeParse({ ...draft, id: "draft" });
    if (!check.success) {
      throw new InvalidInputError("Invalid event draft", formatIssues(check.error));
    }
    assertValidEventName(draft.title);

    const timestamp = toIso(this.now());
    const request: OverrideRequest = {
      id: generateId("override"),
      event_draft: { ...draft },
      conflict_reason: conflictReason,
      status: "pending",
      deny_reason: null,
      event_id: null,
      created_at: timestamp,
      updated_at: timestamp,
    };
    this.overrideRequests.set(request.id, request);
    return copyRequest(request);
  }

  /**
   * Approve (no deny reason) or deny an override request. Approval creates
   * the event from the draft.
   *
   * @throws NotFoundError for an unknown request id
   * @throws InvalidInputError if the request was already reviewed
   */
  reviewOverrideRequest(requestId: string, denyReason?: string): OverrideRequest {
    const request = this.overrideRequests.get(requestId);
    if (!request) {
      throw new NotFoundError(`Override request ${requestId} not found`);
    }
    if (request.status !== "pending") {
      throw new InvalidInputError(`Override request ${requestId} was already ${request.status}`);
    }

    if (denyReason !== undefined && denyReason.trim() !== "") {
      request.status = "denied";
      request.deny_reason = denyReason.trim();
    } else {
      const event = this.buildEvent(request.event_draft);
      request.status = "approved";
      request.event_id = event.id;
    }
    request.updated_at = toIso(this.now());

    this.logger.info("override request reviewed", { requestId, status: request.status });
    return copyRequest(request);
  }

  getOverrideRequest(requestId: string): OverrideRequest | null {
    const request = this.overrideRequests.get(requestId);
    return request ? copyRequest(request) : null;
  }

  /**
   * Change an event's title.
   *
   * @throws NotFoundError for an unknown event id
   * @throws InvalidInputError listing every broken name rule
   */
  renameEvent(eventId: string, newName: string): CampusEvent {
    const event = this.events.get(eventId);
    if (!event) {
      throw new NotFoundError(`Event ${eventId} not found`);
    }
    event.title = assertValidEventName(newName, event.title);
    this.events.save(event);
    return event;
  }

  getEvent(eventId: string): CampusEvent | null {
    return this.events.get(eventId);
  }

  listEvents(): CampusEvent[] {
    return this.events.list();
  }

  private buildEvent(draft: OverrideEventDraft): CampusEvent {
    const title = assertValidEventName(draft.title);
    const event = createCampusEvent(
      {
        id: generateId("event"),
        title,
        description: draft.description ?? "",
        start_at: draft.start_at,
        end_at: draft.end_at,
        location: draft.location ?? "",
        organizer_id: draft.organizer_id,
        organizer_name: draft.organizer_name,
        course_code: draft.course_code,
      },
      this.now(),
    );
    this.events.save(event);
    this.feed?.add(event);
    return event;
  }
}
