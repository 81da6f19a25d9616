/**
 * Simple structured logger.
 * Outputs JSON lines in production, readable lines otherwise.
 */

import { config } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const IS_PRODUCTION = process.env.NODE_ENV === "production";

export function isLogThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function initialThreshold(): LogThreshold {
  // LOG_LEVEL may come from .env
  const fromEnv = config.LOG_LEVEL?.toLowerCase();
  if (fromEnv && isLogThreshold(fromEnv)) {
    return fromEnv;
  }
  // Jest sets NODE_ENV=test; keep test output quiet unless asked
  if (process.env.NODE_ENV === "test") {
    return "silent";
  }
  return IS_PRODUCTION ? "info" : "warn";
}

let threshold: LogThreshold = initialThreshold();

export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

export function getLogLevel(): LogThreshold {
  return threshold;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
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
      // stdout carries rendered reports
      console.error(formatLog("info", message, meta));
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

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
