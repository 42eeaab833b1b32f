import type { LogLevel } from "./schema";

export type LogFormat = "json" | "pretty";

export interface LoggerConfig {
  level: LogLevel;
  /** `pretty` prints one human-readable line per entry (development). */
  format?: LogFormat;
  /** Context merged into every entry written by this logger. */
  bindings?: Record<string, unknown>;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean =>
  logLevels[level] >= logLevels[currentLevel];

/** Ledger and order values are bigint; JSON has no bigint, so they print as strings. */
const replaceBigInt = (_key: string, value: unknown): unknown =>
  typeof value === "bigint" ? value.toString() : value;

export const serializeLogValue = (value: unknown): string => JSON.stringify(value, replaceBigInt);

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => ({
  timestamp: new Date().toISOString(),
  level,
  message,
  ...(context && Object.keys(context).length > 0 && { context }),
  ...(error && {
    error: {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
    },
  }),
});

export const formatLog = (entry: LogEntry, format: LogFormat): string => {
  if (format === "pretty") {
    const context = entry.context ? ` ${serializeLogValue(entry.context)}` : "";
    const error = entry.error ? ` (${entry.error.name}: ${entry.error.message})` : "";
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${context}${error}`;
  }
  return serializeLogValue(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  /** Returns a logger that adds `bindings` to every entry. */
  child: (bindings: Record<string, unknown>) => Logger;
}

/**
 * Normalize an unknown thrown value for `logger.error`.
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export const createLogger = (loggerConfig: LoggerConfig = { level: "info" }): Logger => {
  const { level, format = "json", bindings } = loggerConfig;

  const merge = (context?: Record<string, unknown>): Record<string, unknown> | undefined =>
    bindings ? { ...bindings, ...context } : context;

  return {
    debug: (message, context) => {
      if (shouldLog("debug", level)) {
        console.log(formatLog(createLogEntry("debug", message, merge(context)), format));
      }
    },

    info: (message, context) => {
      if (shouldLog("info", level)) {
        console.log(formatLog(createLogEntry("info", message, merge(context)), format));
      }
    },

    warn: (message, context) => {
      if (shouldLog("warn", level)) {
        console.warn(formatLog(createLogEntry("warn", message, merge(context)), format));
      }
    },

    error: (message, error, context) => {
      if (shouldLog("error", level)) {
        console.error(formatLog(createLogEntry("error", message, merge(context), error), format));
      }
    },

    child: (childBindings) =>
      createLogger({ level, format, bindings: { ...bindings, ...childBindings } }),
  };
};
