import { env } from "@/lib/env";

/**
 * Structured JSON logger. Every line is one JSON object with `timestamp`,
 * `level` and `message`, plus whatever fields the caller attaches.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = {
  question?: string;
  category?: string;
  component?: string;
  error?: { code?: string; message: string; stack?: string };
  [key: string]: unknown;
};

export type LogEntry = LogFields & {
  timestamp: string;
  level: LogLevel;
  message: string;
};

export type Logger = {
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = env.LOG_LEVEL;

export function setLogLevel(level: LogLevel) {
  minLevel = level;
}

function shouldLog(level: LogLevel) {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

function emit(entry: LogEntry) {
  const line = JSON.stringify(entry);
  if (entry.level === "error") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
}

export function log(level: LogLevel, message: string, fields?: LogFields) {
  if (!shouldLog(level)) return;
  emit({
    ...fields,
    timestamp: new Date().toISOString(),
    level,
    message,
  });
}

export function errorFields(err: unknown): NonNullable<LogFields["error"]> {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    return { code, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}

export const logger: Logger = {
  debug: (message, fields) => log("debug", message, fields),
  info: (message, fields) => log("info", message, fields),
  warn: (message, fields) => log("warn", message, fields),
  error: (message, fields) => log("error", message, fields),
};

/** Child logger that adds `fields` to every entry; per-call fields win. */
export function withFields(base: Logger, fields: LogFields): Logger {
  return {
    debug: (message, extra) => base.debug(message, { ...fields, ...extra }),
    info: (message, extra) => base.info(message, { ...fields, ...extra }),
    warn: (message, extra) => base.warn(message, { ...fields, ...extra }),
    error: (message, extra) => base.error(message, { ...fields, ...extra }),
  };
}
