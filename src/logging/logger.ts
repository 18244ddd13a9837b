/**
 * Leveled logger for pipeline runs.
 *
 * Every entry is one line: timestamp, level, run ID, message and an
 * optional JSON context. Lines go to the console and, when enabled, are
 * appended to a log file. Child loggers share their parent's outputs.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Fields added to every entry */
  bindings?: LogContext;
}

const DEFAULT_OPTIONS: Required<LoggerOptions> = {
  level: "info",
  logDir: "output/logs",
  logFile: "text-pipeline.log",
  console: true,
  file: false,
  bindings: {},
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger with the same outputs and extra fields on every entry */
  child(bindings: LogContext): Logger;
}

type Sink = (level: LogLevel, entry: string) => void;

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${runId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[threshold];
}

const consoleSink: Sink = (level, entry) => {
  switch (level) {
    case "debug":
      console.debug(entry);
      break;
    case "info":
      console.info(entry);
      break;
    case "warn":
      console.warn(entry);
      break;
    case "error":
      console.error(entry);
      break;
  }
};

function fileSink(logDir: string, logFile: string): Sink {
  mkdirSync(logDir, { recursive: true });
  const path = join(logDir, logFile);

  return (_level, entry) => {
    try {
      appendFileSync(path, entry + "\n");
    } catch (err) {
      // A failed write is reported on the console; the run carries on
      console.error(`Failed to write to log file ${path}: ${String(err)}`);
    }
  };
}

function buildLogger(level: LogLevel, sinks: readonly Sink[], bindings: LogContext): Logger {
  function log(entryLevel: LogLevel, message: string, context?: LogContext): void {
    if (!isLevelEnabled(level, entryLevel)) {
      return;
    }
    const entry = formatLogEntry(entryLevel, message, { ...bindings, ...context });
    for (const sink of sinks) {
      sink(entryLevel, entry);
    }
  }

  return {
    level,
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (extra) => buildLogger(level, sinks, { ...bindings, ...extra }),
  };
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: Required<LoggerOptions> = { ...DEFAULT_OPTIONS, ...options };
  const sinks: Sink[] = [];

  if (opts.console) {
    sinks.push(consoleSink);
  }
  if (opts.file) {
    sinks.push(fileSink(opts.logDir, opts.logFile));
  }

  return buildLogger(opts.level, sinks, opts.bindings);
}
