import { describe, it, expect } from "vitest";
import { createCampusEvent, createUser } from "./schemas";
import { InvalidInputError } from "./errors";
import type { EventInput } from "./schemas";

const NOW = Date.parse("2025-03-10T12:00:00.000Z");

function validInput(overrides: Partial<EventInput> = {}): EventInput {
  return {
    id: "evt_review",
    title: "CS101 Final Review",
    start_at: "2025-03-12T15:00:00Z",
    end_at: "2025-03-12T17:00:00Z",
    organizer_id: "usr_prof",
    organizer_name: "Dr. Edwards",
    ...overrides,
  };
}

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidInputError) {
      return err.issues;
    }
    throw err;
  }
  throw new Error("expected InvalidInputError");
}

// ---------------------------------------------------------------------------
// createUser
// ---------------------------------------------------------------------------

describe("createUser", () => {
  it("accepts students and teachers", () => {
    expect(
      createUser({ user_id: "usr_1", name: "Sam", email: "sam@example.edu", role: "student" }),
    ).toEqual({ user_id: "usr_1", name: "Sam", email: "sam@example.edu", role: "student" });
    expect(
      createUser({ user_id: "usr_2", name: "Dr. Edwards", email: "edwards@example.edu", role: "teacher" })
        .role,
    ).toBe("teacher");
  });

  it("rejects a role outside the closed set", () => {
    const issues = issuesOf(() =>
      createUser({ user_id: "usr_1", name: "Sam", email: "sam@example.edu", role: "admin" }),
    );
    expect(issues).toEqual(["role: Role must be 'student' or 'teacher'"]);
  });

  it("rejects a malformed email", () => {
    expect(() =>
      createUser({ user_id: "usr_1", name: "Sam", email: "not-an-email", role: "student" }),
    ).toThrow(InvalidInputError);
  });
});

// ---------------------------------------------------------------------------
// createCampusEvent
// ---------------------------------------------------------------------------

describe("createCampusEvent", () => {
  it("produces a SCHEDULED event with empty cancellation metadata", () => {
    expect(createCampusEvent(validInput(), NOW)).toEqual({
      id: "evt_review",
      title: "CS101 Final Review",
      description: "",
      start_at: "2025-03-12T15:00:00Z",
      end_at: "2025-03-12T17:00:00Z",
      location: "",
      organizer_id: "usr_prof",
      organizer_name: "Dr. Edwards",
      status: "SCHEDULED",
      cancellation_reason: null,
      canceled_at: null,
      canceled_by: null,
      created_at: "2025-03-10T12:00:00.000Z",
    });
  });

  it("trims the title and keeps a course code", () => {
    const event = createCampusEvent(validInput({ title: "  Office Hours ", course_code: "CS101" }), NOW);
    expect(event.title).toBe("Office Hours");
    expect(event.course_code).toBe("CS101");
  });

  it("rejects an event that does not start before it ends", () => {
    const issues = issuesOf(() =>
      createCampusEvent(validInput({ end_at: "2025-03-12T15:00:00Z" }), NOW),
    );
    expect(issues).toEqual(["end_at: Event must start before it ends"]);
  });

  it("rejects an empty id", () => {
    expect(() => createCampusEvent(validInput({ id: "" }), NOW)).toThrow(InvalidInputError);
  });

  it("rejects timestamps that are not ISO 8601", () => {
    expect(() => createCampusEvent(validInput({ start_at: "next tuesday" }), NOW)).toThrow(
      InvalidInputError,
    );
  });
});
