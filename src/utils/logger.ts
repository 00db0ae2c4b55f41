/**
 * Structured Logger
 *
 * A lightweight structured logging utility. Writes to stderr so that reports
 * piped to stdout stay clean.
 *
 * Features:
 * - Log levels: debug, info, warn, error
 * - Structured context support
 * - Environment-based level filtering (LOG_LEVEL)
 * - JSON lines output (LOG_FORMAT=json)
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_PREFIXES: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARN",
  error: "ERROR",
};

// ============================================================================
// Configuration
// ============================================================================

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env["LOG_LEVEL"]?.toLowerCase();
  return isLogLevel(envLevel) ? envLevel : "info";
}

function shouldOutputJson(): boolean {
  return process.env["LOG_FORMAT"] === "json";
}

// ============================================================================
// Core Logger
// ============================================================================

/**
 * Log a message with the specified level and optional context.
 */
export function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[getLogLevel()]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const hasContext = context !== undefined && Object.keys(context).length > 0;

  if (shouldOutputJson()) {
    const entry: LogEntry = {
      level,
      message,
      timestamp,
      ...(hasContext ? { context } : {}),
    };
    console.error(JSON.stringify(entry));
    return;
  }

  const prefix = `[${timestamp}] [${LEVEL_PREFIXES[level]}]`;
  if (hasContext) {
    console.error(`${prefix} ${message}`, context);
  } else {
    console.error(`${prefix} ${message}`);
  }
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Structured logger with convenience methods for each log level.
 *
 * @example
 * ```ts
 * logger.info("Starting analysis", { target: "./contracts" });
 * logger.warn("Detector failed", { detector: "reentrancy", error: err.message });
 * ```
 */
export const logger = {
  debug(message: string, context?: LogContext): void {
    log("debug", message, context);
  },

  info(message: string, context?: LogContext): void {
    log("info", message, context);
  },

  warn(message: string, context?: LogContext): void {
    log("warn", message, context);
  },

  error(message: string, context?: LogContext): void {
    log("error", message, context);
  },

  /**
   * Create a child logger with preset context.
   *
   * @example
   * ```ts
   * const slitherLogger = logger.child({ tool: "slither" });
   * slitherLogger.info("Running analysis"); // includes { tool: "slither" }
   * ```
   */
  child(baseContext: LogContext): Logger {
    return {
      debug: (message, context) => log("debug", message, { ...baseContext, ...context }),
      info: (message, context) => log("info", message, { ...baseContext, ...context }),
      warn: (message, context) => log("warn", message, { ...baseContext, ...context }),
      error: (message, context) => log("error", message, { ...baseContext, ...context }),
    };
  },
};

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format duration in human-readable form.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}
