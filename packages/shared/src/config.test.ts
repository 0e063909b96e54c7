import { describe, it, expect } from "vitest";
import {
  DEFAULT_EVENT_SYSTEM_CONFIG,
  parseEventSystemConfig,
  validateEventSystemConfig,
} from "./config";
import { InvalidInputError } from "./errors";

describe("parseEventSystemConfig", () => {
  it("returns the defaults for an empty environment", () => {
    expect(parseEventSystemConfig({})).toEqual(DEFAULT_EVENT_SYSTEM_CONFIG);
  });

  it("uses a 10 minute undo window and a 24 hour late threshold by default", () => {
    const config = parseEventSystemConfig({});
    expect(config.undoWindowMinutes).toBe(10);
    expect(config.lateCancellationHours).toBe(24);
    expect(config.calendarIntegrations).toEqual(["google_calendar", "outlook"]);
  });

  it("overlays values from the environment", () => {
    const config = parseEventSystemConfig({
      UNDO_WINDOW_MINUTES: "15",
      LATE_CANCELLATION_HOURS: "48",
      CALENDAR_INTEGRATIONS: " outlook , google_calendar ,",
      CALENDAR_DOMAIN: "example.edu",
      LOG_LEVEL: "debug",
      LOG_ENABLED: "false",
    });

    expect(config).toEqual({
      ...DEFAULT_EVENT_SYSTEM_CONFIG,
      undoWindowMinutes: 15,
      lateCancellationHours: 48,
      calendarIntegrations: ["outlook", "google_calendar"],
      calendarDomain: "example.edu",
      logLevel: "debug",
      logEnabled: false,
    });
  });

  it("treats empty numeric variables as unset", () => {
    expect(parseEventSystemConfig({ UNDO_WINDOW_MINUTES: "  " }).undoWindowMinutes).toBe(10);
  });

  it("keeps logging on for any value other than 'false'", () => {
    expect(parseEventSystemConfig({ LOG_ENABLED: "0" }).logEnabled).toBe(true);
  });

  it("rejects a non-numeric undo window", () => {
    try {
      parseEventSystemConfig({ UNDO_WINDOW_MINUTES: "soon" });
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^undoWindowMinutes: /);
      }
    }
  });

  it("rejects a zero undo window", () => {
    expect(() => parseEventSystemConfig({ UNDO_WINDOW_MINUTES: "0" })).toThrow(InvalidInputError);
  });

  it("rejects an unknown log level", () => {
    expect(() => parseEventSystemConfig({ LOG_LEVEL: "verbose" })).toThrow(InvalidInputError);
  });

  it("rejects an integration list with no names", () => {
    expect(() => parseEventSystemConfig({ CALENDAR_INTEGRATIONS: " , " })).toThrow(
      InvalidInputError,
    );
  });
});

describe("validateEventSystemConfig", () => {
  it("returns a valid configuration unchanged", () => {
    expect(validateEventSystemConfig({ ...DEFAULT_EVENT_SYSTEM_CONFIG, undoWindowMinutes: 30 })).toEqual({
      ...DEFAULT_EVENT_SYSTEM_CONFIG,
      undoWindowMinutes: 30,
    });
  });

  it("lists every invalid field", () => {
    try {
      validateEventSystemConfig({
        ...DEFAULT_EVENT_SYSTEM_CONFIG,
        undoWindowMinutes: -5,
        calendarDomain: "",
      });
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) {
        expect(err.issues.map((issue) => issue.split(":")[0])).toEqual([
          "undoWindowMinutes",
          "calendarDomain",
        ]);
      }
    }
  });
});
