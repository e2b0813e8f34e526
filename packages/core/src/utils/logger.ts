/**
 * Structured logging.
 *
 * Component-scoped loggers write JSON entries to a process-wide sink with
 * level filtering. Both are replaceable through {@link configureLogging},
 * which is how tests capture output.
 *
 * @example
 * ```typescript
 * const logger = createLogger("client");
 * logger.info("response received", { status: 200 });
 * // → {"level":"info","ts":"...","component":"client","msg":"response received","meta":{"status":200}}
 * ```
 */

/** Log severity levels in ascending order. */
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  meta?: Record<string, unknown>;
}

/** Output destination for log entries. */
export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_LEVEL: LogLevel = "warn";

let globalLevel: LogLevel = DEFAULT_LEVEL;
let globalSink: LogSink = stderrSink;

function stderrSink(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + "\n");
}

/** Configure the global logging level and/or sink. */
export function configureLogging(options: LoggerOptions): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: warn, sink: stderr JSON). */
export function resetLogging(): void {
  globalLevel = DEFAULT_LEVEL;
  globalSink = stderrSink;
}

/**
 * Errors are not JSON-serializable; keep their name and message.
 */
function serializeMeta(
  meta?: Record<string, unknown>
): Record<string, unknown> | undefined {
  if (!meta) return undefined;
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] =
      value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name, e.g. `"client"` or `"client:json"`
 */
export function createLogger(component: string): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };
    const serialized = serializeMeta(meta);
    if (serialized !== undefined) {
      entry.meta = serialized;
    }
    globalSink(entry);
  }

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`),
  };
}
