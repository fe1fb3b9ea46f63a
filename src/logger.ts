/**
 * Simple structured logger.
 * Outputs JSON lines in production and readable lines everywhere else.
 */

import { config } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const IS_PRODUCTION = config.NODE_ENV === "production";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevelName(value: string): value is LogLevel | "silent" {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveMinimumLevel(raw: string | undefined): number {
  const normalized = raw?.trim().toLowerCase();
  if (normalized && isLevelName(normalized)) {
    return LEVEL_ORDER[normalized];
  }
  return IS_PRODUCTION ? LEVEL_ORDER.info : LEVEL_ORDER.debug;
}

const MINIMUM_LEVEL = resolveMinimumLevel(config.LOG_LEVEL);

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= MINIMUM_LEVEL;
}

function formatLog(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  };

  if (IS_PRODUCTION) {
    return JSON.stringify(entry);
  }
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
  return `[${entry.timestamp}] ${level.toUpperCase()} ${message}${metaStr}`;
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>): void {
    if (enabled("debug")) {
      console.debug(formatLog("debug", message, meta));
    }
  },

  info(message: string, meta?: Record<string, unknown>): void {
    if (enabled("info")) {
      console.info(formatLog("info", message, meta));
    }
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    if (enabled("warn")) {
      console.warn(formatLog("warn", message, meta));
    }
  },

  error(message: string, meta?: Record<string, unknown>): void {
    if (enabled("error")) {
      console.error(formatLog("error", message, meta));
    }
  },
};
