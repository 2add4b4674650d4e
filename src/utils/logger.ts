/**
 * @module utils/logger
 * @description Scoped, leveled console logger.
 *
 * Events are the primary observability surface; the logger carries the
 * operational detail events do not (dropped frames, retries, sync aborts).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Readonly<Record<string, unknown>>;

export interface Logger {
  readonly scope: string;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** A logger for a nested scope ("node:alpha" → "node:alpha:router"). */
  child(scope: string): Logger;
}

export interface LogEntry {
  readonly level: Exclude<LogLevel, "silent">;
  readonly scope: string;
  readonly message: string;
  readonly context: LogContext | undefined;
  readonly at: Date;
}

export type LogSink = (entry: LogEntry) => void;

const PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const consoleSink: LogSink = (entry) => {
  const line = `${entry.at.toISOString()} ${entry.level.toUpperCase().padEnd(5)} [${entry.scope}] ${entry.message}`;
  const method =
    entry.level === "debug" ? "debug" : entry.level === "info" ? "info" : entry.level;
  if (entry.context) {
    console[method](line, entry.context);
  } else {
    console[method](line);
  }
};

/**
 * Create a logger that drops everything below `level`.
 *
 * @example
 * ```ts
 * const log = createLogger("node:alpha", "info");
 * log.info("state changed", { from: "CENTRALIZED", to: "P2P_FALLBACK" });
 * ```
 */
export function createLogger(
  scope: string,
  level: LogLevel = "warn",
  sink: LogSink = consoleSink
): Logger {
  const threshold = PRIORITY[level];

  const write = (
    entryLevel: LogEntry["level"],
    message: string,
    context?: LogContext
  ): void => {
    if (PRIORITY[entryLevel] < threshold) return;
    sink({ level: entryLevel, scope, message, context, at: new Date() });
  };

  return {
    scope,
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (sub) => createLogger(`${scope}:${sub}`, level, sink),
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = createLogger("silent", "silent");
