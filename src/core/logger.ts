import { canonicalizeJson } from "./canonicalJson.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"] as const;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogFields = Record<string, unknown>;

/** Receives one rendered JSON line per entry. */
export type LogSink = (line: string, level: LogLevel) => void;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  fields?: LogFields;
  clock?: () => Date;
}

// stdout is reserved for the activation document and the workload.
const stderrSink: LogSink = (line) => {
  console.error(line);
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LEVEL_ORDER[options.level ?? "info"];
  const sink = options.sink ?? stderrSink;
  const clock = options.clock ?? (() => new Date());
  const bound = options.fields ?? {};

  const emit = (level: LogLevel, msg: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < minLevel) return;
    const entry: Record<string, unknown> = { level, ts: clock().toISOString(), msg };
    for (const [key, value] of Object.entries({ ...bound, ...fields })) {
      if (key in entry) continue;
      let rendered: unknown;
      try {
        rendered = canonicalizeJson(value);
      } catch {
        rendered = String(value);
      }
      if (rendered !== undefined) entry[key] = rendered;
    }
    sink(JSON.stringify(entry), level);
  };

  return {
    debug: (msg, fields) => emit("debug", msg, fields),
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields),
    child: (fields) => createLogger({ ...options, fields: { ...bound, ...fields } })
  };
}

export const silentLogger: Logger = createLogger({ sink: () => undefined });
