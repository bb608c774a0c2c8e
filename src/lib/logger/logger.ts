import { getLoggingConfig } from "../config";

import type { LogLevel } from "./schema";

export interface LoggerConfig {
  /** Defaults to `LOG_LEVEL`, then to info in production and debug elsewhere */
  level?: LogLevel;
  /** Static context merged into every entry (e.g. `{ exchange: "coinbase" }`) */
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
    cause?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean => {
  const levelValue = logLevels[level];
  const currentLevelValue = logLevels[currentLevel];
  return levelValue >= currentLevelValue;
};

const describeCause = (cause: unknown): string | undefined => {
  if (cause === undefined) {
    return undefined;
  }
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
};

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => {
  const cause = error ? describeCause(error.cause) : undefined;
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context && Object.keys(context).length > 0 && { context }),
    ...(error && {
      error: {
        name: error.name,
        message: error.message,
        ...(error.stack && { stack: error.stack }),
        ...(cause && { cause }),
      },
    }),
  };
  return entry;
};

const formatLog = (entry: LogEntry, readable: boolean): string => {
  if (readable) {
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${
      entry.context ? ` ${JSON.stringify(entry.context)}` : ""
    }${entry.error ? ` (${entry.error.name}: ${entry.error.message})` : ""}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

export const createLogger = (loggerConfig: LoggerConfig = {}): Logger => {
  const settings = getLoggingConfig();
  const level = loggerConfig.level ?? settings.level;
  const readable = settings.nodeEnv === "development";

  const withBindings = (
    context?: Record<string, unknown>,
  ): Record<string, unknown> | undefined =>
    loggerConfig.bindings ? { ...loggerConfig.bindings, ...context } : context;

  return {
    debug: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("debug", level)) {
        console.log(formatLog(createLogEntry("debug", message, withBindings(context)), readable));
      }
    },

    info: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("info", level)) {
        console.log(formatLog(createLogEntry("info", message, withBindings(context)), readable));
      }
    },

    warn: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("warn", level)) {
        console.warn(formatLog(createLogEntry("warn", message, withBindings(context)), readable));
      }
    },

    error: (message: string, error?: Error, context?: Record<string, unknown>): void => {
      if (shouldLog("error", level)) {
        console.error(
          formatLog(createLogEntry("error", message, withBindings(context), error), readable),
        );
      }
    },
  };
};

export const logger = createLogger();
