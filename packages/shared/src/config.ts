/**
 * Runtime configuration for the campus event services.
 *
 * Defaults live in DEFAULT_EVENT_SYSTEM_CONFIG; parseEventSystemConfig()
 * overlays environment variables and validates the result.
 *
 * Recognized variables:
 *   UNDO_WINDOW_MINUTES      -- positive number (default: 10)
 *   LATE_CANCELLATION_HOURS  -- non-negative number (default: 24)
 *   CALENDAR_INTEGRATIONS    -- comma list (default: "google_calendar,outlook")
 *   CALENDAR_DOMAIN          -- domain for UIDs / organizer mailto
 *   LOG_LEVEL                -- debug | info | warn | error (default: "info")
 *   LOG_ENABLED              -- "true" | "false" (default: "true")
 */

import { z } from "zod/v4";
import {
  DEFAULT_CALENDAR_DOMAIN,
  DEFAULT_CALENDAR_INTEGRATIONS,
  DEFAULT_PRODUCT_ID,
  DEFAULT_UNDO_WINDOW_MINUTES,
  LATE_CANCELLATION_THRESHOLD_HOURS,
} from "./constants";
import { InvalidInputError } from "./errors";
import { LOG_LEVELS } from "./logger";
import { formatIssues } from "./schemas";

export const EventSystemConfigSchema = z.object({
  undoWindowMinutes: z.number().positive(),
  lateCancellationHours: z.number().nonnegative(),
  calendarIntegrations: z.array(z.string().min(1)).min(1),
  calendarDomain: z.string().min(1),
  productId: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
  logEnabled: z.boolean(),
});

export type EventSystemConfig = z.infer<typeof EventSystemConfigSchema>;

export const DEFAULT_EVENT_SYSTEM_CONFIG: EventSystemConfig = {
  undoWindowMinutes: DEFAULT_UNDO_WINDOW_MINUTES,
  lateCancellationHours: LATE_CANCELLATION_THRESHOLD_HOURS,
  calendarIntegrations: [...DEFAULT_CALENDAR_INTEGRATIONS],
  calendarDomain: DEFAULT_CALENDAR_DOMAIN,
  productId: DEFAULT_PRODUCT_ID,
  logLevel: "info",
  logEnabled: true,
};

/**
 * Check a complete configuration object, e.g. defaults merged with caller
 * overrides. Throws InvalidInputError listing every invalid field.
 */
export function validateEventSystemConfig(input: unknown): EventSystemConfig {
  const result = EventSystemConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError("Invalid configuration", formatIssues(result.error));
  }
  return result.data;
}

function numberOr(value: string | undefined, fallback: number): number {
  // Number("") is 0, so an empty variable counts as unset
  return value === undefined || value.trim() === "" ? fallback : Number(value);
}

/**
 * Parse configuration from environment variables.
 * Throws InvalidInputError when a variable is present but invalid.
 */
export function parseEventSystemConfig(
  env: Record<string, string | undefined>,
): EventSystemConfig {
  const defaults = DEFAULT_EVENT_SYSTEM_CONFIG;
  const integrations = env.CALENDAR_INTEGRATIONS
    ?.split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  return validateEventSystemConfig({
    undoWindowMinutes: numberOr(env.UNDO_WINDOW_MINUTES, defaults.undoWindowMinutes),
    lateCancellationHours: numberOr(
      env.LATE_CANCELLATION_HOURS,
      defaults.lateCancellationHours,
    ),
    calendarIntegrations: integrations ?? defaults.calendarIntegrations,
    calendarDomain: env.CALENDAR_DOMAIN ?? defaults.calendarDomain,
    productId: defaults.productId,
    logLevel: env.LOG_LEVEL ?? defaults.logLevel,
    logEnabled: env.LOG_ENABLED !== "false",
  });
}
