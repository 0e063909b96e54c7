import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ConsoleLogger,
  MemoryLogger,
  NoopLogger,
  createLogger,
  describeError,
  isLogLevel,
} from "./logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ConsoleLogger", () => {
  it("writes one JSON line with scope and fields", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleLogger("rsvp").info("rsvp created", { eventId: "evt_1", count: 2 });

    expect(log).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(line).toMatchObject({
      _type: "log",
      level: "info",
      scope: "rsvp",
      message: "rsvp created",
      eventId: "evt_1",
      count: 2,
    });
  });

  it("drops entries below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleLogger("rsvp", "info").debug("noise");
    expect(log).not.toHaveBeenCalled();
  });

  it("routes warnings and errors to the matching console methods", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new ConsoleLogger("sync");
    logger.warn("unknown integration");
    logger.error("push failed");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("MemoryLogger", () => {
  it("captures entries and filters them by level", () => {
    const logger = new MemoryLogger();
    logger.info("a");
    logger.error("b", { eventId: "evt_1" });

    expect(logger.entries).toHaveLength(2);
    expect(logger.at("error")).toEqual([
      { level: "error", message: "b", fields: { eventId: "evt_1" } },
    ]);

    logger.clear();
    expect(logger.entries).toEqual([]);
  });
});

describe("createLogger", () => {
  it("returns a NoopLogger when logging is disabled", () => {
    expect(createLogger({ logEnabled: false, logLevel: "info" }, "x")).toBeInstanceOf(NoopLogger);
  });

  it("returns a ConsoleLogger when logging is enabled", () => {
    expect(createLogger({ logEnabled: true, logLevel: "warn" }, "x")).toBeInstanceOf(ConsoleLogger);
  });
});

describe("helpers", () => {
  it("describes errors and other thrown values", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("plain")).toBe("plain");
  });

  it("recognizes log levels", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
