/**
 * Lightweight structured logger.
 *
 * - Production (NODE_ENV=production): JSON lines for machine consumption
 * - Development: pretty-printed human-readable output
 *
 * Log levels (in order of severity): debug < info < warn < error.
 * LOG_LEVEL controls the minimum verbosity (default: "info").
 *
 * Usage:
 *   import { logger } from "../config/logger";
 *   logger.info("server", "Server started", { port: 3001 });
 *
 *   const log = createComponentLogger("providerChain");
 *   log.warn("Candidate failed", { provider: "http" });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type LogLevel = "debug" | "info" | "warn" | "error";

type LogExtra = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

interface ComponentLogger {
  debug(message: string, extra?: LogExtra): void;
  info(message: string, extra?: LogExtra): void;
  warn(message: string, extra?: LogExtra): void;
  error(message: string, extra?: LogExtra): void;
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

// Read on every call so tests can flip LOG_LEVEL at runtime
function getLogLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

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
  extra?: LogExtra
): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[getLogLevel()]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    ...extra,
  };

  const formatted = isProduction() ? JSON.stringify(entry) : formatPretty(entry);

  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "debug":
      console.debug(formatted);
      break;
    default:
      console.log(formatted);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

const logger = {
  debug(component: string, message: string, extra?: LogExtra): void {
    log("debug", component, message, extra);
  },

  info(component: string, message: string, extra?: LogExtra): void {
    log("info", component, message, extra);
  },

  warn(component: string, message: string, extra?: LogExtra): void {
    log("warn", component, message, extra);
  },

  error(component: string, message: string, extra?: LogExtra): void {
    log("error", component, message, extra);
  },
};

/** Bind a logger to one component name. */
function createComponentLogger(component: string): ComponentLogger {
  return {
    debug: (message, extra) => log("debug", component, message, extra),
    info: (message, extra) => log("info", component, message, extra),
    warn: (message, extra) => log("warn", component, message, extra),
    error: (message, extra) => log("error", component, message, extra),
  };
}

/** Normalize an unknown thrown value to a message string. */
function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export { logger, createComponentLogger, errorMessage };
export type { LogLevel, LogEntry, ComponentLogger };
