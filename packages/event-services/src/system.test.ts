/**
 * End-to-end test through createEventSystem: create a course event, RSVP,
 * cancel late with a reason, and watch the undo window close.
 */

import { describe, it, expect } from "vitest";
import {
  InvalidInputError,
  MS_PER_MINUTE,
  MemoryLogger,
  UndoExpiredError,
  ValidationError,
  createUser,
} from "@campus-events/shared";
import { StaticSectionDirectory } from "./course-event-service";
import { createEventSystem } from "./system";

describe("createEventSystem", () => {
  it("runs the cancellation workflow end to end", () => {
    let current = Date.parse("2025-03-12T07:00:00.000Z");
    const loggers = new Map<string, MemoryLogger>();
    const system = createEventSystem({
      config: { undoWindowMinutes: 5 },
      now: () => current,
      loggerFor: (scope) => {
        const logger = new MemoryLogger();
        loggers.set(scope, logger);
        return logger;
      },
      sections: new StaticSectionDirectory({
        usr_edwards: [{ id: "sec_cs101_a", course_code: "CS101", name: "Intro to Programming" }],
      }),
    });

    const professor = createUser({
      user_id: "usr_edwards",
      name: "Dr. Edwards",
      email: "edwards@example.edu",
      role: "teacher",
    });
    const students = ["usr_a", "usr_b", "usr_c"].map((id) =>
      createUser({ user_id: id, name: id, email: `${id}@example.edu`, role: "student" }),
    );

    // Starts 8 hours from now
    const event = system.courseEvents.createCourseEvent(professor, {
      course_code: "CS101",
      title: "CS101 Final Review",
      start_at: "2025-03-12T15:00:00.000Z",
      end_at: "2025-03-12T17:00:00.000Z",
    });
    for (const student of students) {
      system.rsvps.createRsvp(event, student);
    }
    const [firstStudent] = students;
    if (firstStudent) system.rsvps.cancelRsvp(event, firstStudent);

    expect(() => system.cancellations.cancel(event, professor, "")).toThrow(ValidationError);
    expect(system.calendarSync.getHistory()).toEqual([]);

    const result = system.cancellations.cancel(event, professor, "Instructor ill");

    expect(result.cancellation.undoDeadline).toBe("2025-03-12T07:05:00.000Z");
    expect(result.cancellation.notifiedCount).toBe(2);
    expect(system.dispatcher.getLogs({ eventId: event.id }).map((e) => e.recipient_id)).toEqual([
      "usr_b",
      "usr_c",
    ]);
    expect(system.feed.has(event.id)).toBe(false);
    expect(system.calendarSync.getHistory().map((r) => r.integration)).toEqual([
      "google_calendar",
      "outlook",
    ]);
    expect(loggers.get("email")?.at("info")).toHaveLength(2);

    current += 6 * MS_PER_MINUTE;
    expect(system.cancellations.canUndo(event)).toBe(false);
    expect(() => system.cancellations.undo(event, professor)).toThrow(UndoExpiredError);
    expect(system.events.get(event.id)?.status).toBe("CANCELED");
  });

  it("applies configuration defaults", () => {
    const system = createEventSystem({ loggerFor: () => new MemoryLogger() });
    expect(system.config.undoWindowMinutes).toBe(10);
    expect(system.config.calendarIntegrations).toEqual(["google_calendar", "outlook"]);
  });

  it("rejects invalid configuration overrides", () => {
    const loggerFor = () => new MemoryLogger();
    expect(() => createEventSystem({ config: { undoWindowMinutes: -5 }, loggerFor })).toThrow(
      InvalidInputError,
    );
    expect(() =>
      createEventSystem({ config: { lateCancellationHours: undefined }, loggerFor }),
    ).toThrow(InvalidInputError);
  });
});
