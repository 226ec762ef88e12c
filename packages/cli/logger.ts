/**
 * Structured diagnostics for the cardcheck CLI.
 *
 * One JSON object per line on stderr, so diagnostics never mix with the
 * report printed on stdout. Card numbers and CVVs must not reach the log:
 * matching fields are replaced before output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

const REDACT_FIELDS = new Set([
  "number",
  "cardnumber",
  "cvv",
  "cvc",
  "secret",
  "token",
  "password",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function redact(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase();
    if (
      REDACT_FIELDS.has(lowerKey) ||
      lowerKey.endsWith("number") ||
      lowerKey.includes("secret") ||
      lowerKey.includes("token") ||
      lowerKey.includes("password")
    ) {
      result[key] = "[REDACTED]";
    } else if (isRecord(value)) {
      result[key] = redact(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

class JsonLogger implements Logger {
  private readonly level: LogLevel;
  private readonly bindings: Record<string, unknown>;

  constructor(level: LogLevel, bindings: Record<string, unknown> = {}) {
    this.level = level;
    this.bindings = bindings;
  }

  private log(
    level: LogLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    const entry = {
      level,
      time: new Date().toISOString(),
      msg,
      ...redact(this.bindings),
      ...(data ? redact(data) : {}),
    };

    console.error(JSON.stringify(entry));
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log("debug", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log("info", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log("warn", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log("error", msg, data);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonLogger(this.level, { ...this.bindings, ...bindings });
  }
}

/**
 * Create a logger writing at or above `level`.
 *
 * @example
 * const logger = createLogger("debug");
 * logger.debug("Card log appended", { path: "card_log.txt" });
 */
export function createLogger(
  level: LogLevel,
  bindings: Record<string, unknown> = {},
): Logger {
  return new JsonLogger(level, { service: "cardcheck", ...bindings });
}

/**
 * Create a no-op logger for testing.
 */
export function createNoopLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => createNoopLogger(),
  };
}
