/**
 * Structured logging for the campus event services.
 *
 * Services log through the Logger abstraction so the backend can be
 * swapped per environment: JSON lines on the console for dev/staging,
 * an in-memory buffer for tests, or nothing at all.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, string | number | boolean | null>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

/** A captured log line (MemoryLogger). */
export interface LogEntry {
  level: LogLevel;
  message: string;
  fields: LogFields;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Implementations
// ---------------------------------------------------------------------------

/** Console logger -- one JSON object per line. */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly minLevel: LogLevel = "info",
  ) {}

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }
    const line = JSON.stringify({
      _type: "log",
      level,
      scope: this.scope,
      message,
      ...fields,
      timestamp: new Date().toISOString(),
    });
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * In-memory logger -- accumulates entries in an array.
 * Useful for asserting on log output in tests.
 */
export class MemoryLogger implements Logger {
  public entries: LogEntry[] = [];

  debug(message: string, fields: LogFields = {}): void {
    this.entries.push({ level: "debug", message, fields });
  }

  info(message: string, fields: LogFields = {}): void {
    this.entries.push({ level: "info", message, fields });
  }

  warn(message: string, fields: LogFields = {}): void {
    this.entries.push({ level: "warn", message, fields });
  }

  error(message: string, fields: LogFields = {}): void {
    this.entries.push({ level: "error", message, fields });
  }

  /** Entries at the given level, in emission order. */
  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  clear(): void {
    this.entries = [];
  }
}

/** No-op logger -- used when logging is disabled. */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/** Build a component logger from configuration. */
export function createLogger(
  config: { logEnabled: boolean; logLevel: LogLevel },
  scope: string,
): Logger {
  return config.logEnabled ? new ConsoleLogger(scope, config.logLevel) : new NoopLogger();
}

/** Render an unknown thrown value as a log-safe string. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
