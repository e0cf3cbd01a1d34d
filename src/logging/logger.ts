/**
 * Lightweight logging utility.
 * Writes timestamped, run-tagged lines to the console and optionally a file.
 */

import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getRunId } from "./run-id.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Log file path; no file output when omitted */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Replaces the console as the line sink (tests capture output here) */
  sink?: (level: LogLevel, line: string) => void;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${now.toISOString()}] [${levelStr}] [${runId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Console sink. Everything goes to stderr so stdout stays free for
 * command output (--json reports, dry-run previews).
 */
function writeConsole(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
    case "info":
      console.error(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? (options.console === false ? undefined : writeConsole);
  const logFile = options.logFile;

  if (logFile !== undefined && !existsSync(dirname(logFile))) {
    mkdirSync(dirname(logFile), { recursive: true });
  }

  function log(
    entryLevel: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) {
      return;
    }

    const entry = formatLogEntry(entryLevel, message, context);

    sink?.(entryLevel, entry);

    if (logFile !== undefined) {
      try {
        appendFileSync(logFile, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
  };
}

/** Logger that drops everything; the default for library calls. */
export const silentLogger: Logger = createLogger({ console: false });
