/**
 * Zod schemas for records entering the system from outside: users and
 * events handed over by the event-creation collaborator.
 *
 * Schemas are the source of truth for input shapes; the record types in
 * types.ts are what the services store after validation.
 */

import { z } from "zod/v4";
import { USER_ROLES } from "./constants";
import { InvalidInputError } from "./errors";
import type { CampusEvent, User } from "./types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Flatten zod issues to "path: message" lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.map(String).join(".")}: ${issue.message}`
      : issue.message,
  );
}

// ---------------------------------------------------------------------------
// Users
// ---------------------------------------------------------------------------

export const UserRoleSchema = z.enum(USER_ROLES, {
  error: "Role must be 'student' or 'teacher'",
});

export const UserInputSchema = z.object({
  user_id: z.string().min(1),
  name: z.string().min(1),
  email: z.email(),
  role: UserRoleSchema,
});

export type UserInput = z.infer<typeof UserInputSchema>;

/**
 * Construct a User. The role set is closed: anything other than
 * "student" or "teacher" throws InvalidInputError.
 */
export function createUser(input: unknown): User {
  const result = UserInputSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError("Invalid user", formatIssues(result.error));
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export const EventInputSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().trim().min(1),
    description: z.string().default(""),
    start_at: z.iso.datetime({ offset: true }),
    end_at: z.iso.datetime({ offset: true }),
    location: z.string().default(""),
    organizer_id: z.string().min(1),
    organizer_name: z.string().min(1),
    course_code: z.string().min(1).optional(),
  })
  .refine((input) => Date.parse(input.start_at) < Date.parse(input.end_at), {
    error: "Event must start before it ends",
    path: ["end_at"],
  });

export type EventInput = z.input<typeof EventInputSchema>;

/**
 * Validate event input and produce a SCHEDULED event with empty
 * cancellation metadata.
 */
export function createCampusEvent(
  input: EventInput,
  nowMs: number = Date.now(),
): CampusEvent {
  const result = EventInputSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError("Invalid event", formatIssues(result.error));
  }
  const data = result.data;
  const event: CampusEvent = {
    id: data.id,
    title: data.title,
    description: data.description,
    start_at: data.start_at,
    end_at: data.end_at,
    location: data.location,
    organizer_id: data.organizer_id,
    organizer_name: data.organizer_name,
    status: "SCHEDULED",
    cancellation_reason: null,
    canceled_at: null,
    canceled_by: null,
    created_at: new Date(nowMs).toISOString(),
  };
  if (data.course_code !== undefined) {
    event.course_code = data.course_code;
  }
  return event;
}
