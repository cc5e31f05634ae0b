/**
 * Leveled logger.
 *
 * Writes one line per entry to stderr by default. Pass a custom sink to
 * route entries elsewhere (tests pass a capturing or silent sink).
 *
 * @module src/logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export type LogFields = Record<string, unknown>;

/** Receives every entry at or above the logger's level. */
export type LogSink = (
  level: LogLevel,
  message: string,
  fields: LogFields,
) => void;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  fatal(message: string, fields?: LogFields): void;
}

const SERVICE_NAME = "jwt-subrequest-auth";

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function serializeField(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof URL) {
    return value.href;
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  return value;
}

/**
 * Format an entry as `[jwt-subrequest-auth] LEVEL message {fields}`.
 * The JSON suffix is omitted when there are no fields.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  fields: LogFields,
): string {
  const head = `[${SERVICE_NAME}] ${level.toUpperCase()} ${message}`;
  if (Object.keys(fields).length === 0) return head;
  return `${head} ${JSON.stringify(fields, serializeField)}`;
}

export const consoleSink: LogSink = (level, message, fields) => {
  console.error(formatLogLine(level, message, fields));
};

export const silentSink: LogSink = () => {};

export function createLogger(
  level: LogLevel = "info",
  sink: LogSink = consoleSink,
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const emit = (entryLevel: LogLevel) =>
  (message: string, fields: LogFields = {}) => {
    if (LOG_LEVELS.indexOf(entryLevel) < threshold) return;
    sink(entryLevel, message, fields);
  };

  return {
    level,
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    fatal: emit("fatal"),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger("fatal", silentSink);
