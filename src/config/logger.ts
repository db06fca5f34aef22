/**
 * Leveled logger for the API clients.
 *
 * - Production (NODE_ENV=production): JSON lines
 * - Otherwise: `[component] LEVEL message {extra}`
 *
 * Everything goes to stderr so a program that prints generated text on
 * stdout keeps a clean stream. LOG_LEVEL sets the minimum level (default: "info").
 *
 * Usage:
 *   logger.debug("chatClient", "Sending chat request", { promptLength: 12 });
 */

import { env } from "./env";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

// ---------------------------------------------------------------------------
// Level hierarchy
// ---------------------------------------------------------------------------

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

const minLevel: LogLevel = isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "info";

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatPretty(entry: LogEntry): string {
  const { timestamp: _ts, level, component, message, ...extra } = entry;
  const extraStr =
    Object.keys(extra).length > 0 ? " " + JSON.stringify(extra) : "";
  return `[${component}] ${level.toUpperCase()} ${message}${extraStr}`;
}

// ---------------------------------------------------------------------------
// Core log function
// ---------------------------------------------------------------------------

function log(
  level: LogLevel,
  component: string,
  message: string,
  extra?: Record<string, unknown>
): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    ...extra,
  };

  const line =
    env.NODE_ENV === "production" ? JSON.stringify(entry) : formatPretty(entry);
  process.stderr.write(line + "\n");
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

const logger = {
  debug(component: string, message: string, extra?: Record<string, unknown>): void {
    log("debug", component, message, extra);
  },

  info(component: string, message: string, extra?: Record<string, unknown>): void {
    log("info", component, message, extra);
  },

  warn(component: string, message: string, extra?: Record<string, unknown>): void {
    log("warn", component, message, extra);
  },

  error(component: string, message: string, extra?: Record<string, unknown>): void {
    log("error", component, message, extra);
  },
};

export { logger };
export type { LogLevel, LogEntry };
