/**
 * Logging for Marquee.
 *
 * Every line is timestamped and tagged with its level and scope, then
 * appended to the log file and kept in a bounded in-memory ring that the TUI
 * renders. Console output is opt-in: while the TUI owns the terminal any
 * stray write would corrupt the screen.
 *
 * @module utils/logger
 */

import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { describeError, type LogLevel } from '../core/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A single log record
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  scope: string;
  message: string;
}

/**
 * Options for configureLogging
 */
export interface LoggingOptions {
  /** Minimum level recorded */
  level?: LogLevel;

  /** File to append to, null to disable the file sink */
  file?: string | null;

  /** Mirror lines to stderr */
  console?: boolean;
}

export type LogListener = (entry: LogEntry) => void;

// =============================================================================
// Constants
// =============================================================================

/** Number of entries kept in memory for the TUI */
export const MAX_RECENT_ENTRIES = 200;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// =============================================================================
// Sink State
// =============================================================================

interface SinkState {
  level: LogLevel;
  file: string | null;
  console: boolean;
  fileReady: boolean;
  fileFailed: boolean;
  recent: LogEntry[];
  listeners: Set<LogListener>;
  writeQueue: Promise<void>;
}

const sink: SinkState = {
  level: 'info',
  file: null,
  console: false,
  fileReady: false,
  fileFailed: false,
  recent: [],
  listeners: new Set(),
  writeQueue: Promise.resolve(),
};

/**
 * Sets where and what to log. Options left out keep their current value.
 */
export function configureLogging(options: LoggingOptions): void {
  if (options.level !== undefined) {
    sink.level = options.level;
  }
  if (options.file !== undefined && options.file !== sink.file) {
    sink.file = options.file;
    sink.fileReady = false;
    sink.fileFailed = false;
  }
  if (options.console !== undefined) {
    sink.console = options.console;
  }
}

/**
 * Formats an entry as a single log line.
 *
 * @example
 * formatLogLine(entry) // "[2024-05-01T10:00:00.000Z] [INFO] [trackers] Cache hit"
 */
export function formatLogLine(entry: LogEntry): string {
  return `[${entry.timestamp.toISOString()}] [${entry.level.toUpperCase()}] [${entry.scope}] ${entry.message}`;
}

/**
 * Returns the most recent entries, oldest first.
 */
export function getRecentLogs(): LogEntry[] {
  return [...sink.recent];
}

/**
 * Subscribes to new entries.
 *
 * @returns Function that removes the subscription
 */
export function subscribeToLogs(listener: LogListener): () => void {
  sink.listeners.add(listener);
  return () => {
    sink.listeners.delete(listener);
  };
}

/**
 * Resolves once every queued file write has completed.
 */
export function flushLogs(): Promise<void> {
  return sink.writeQueue;
}

function remember(entry: LogEntry): void {
  sink.recent.push(entry);
  if (sink.recent.length > MAX_RECENT_ENTRIES) {
    sink.recent.splice(0, sink.recent.length - MAX_RECENT_ENTRIES);
  }
  for (const listener of sink.listeners) {
    listener(entry);
  }
}

function writeToFile(line: string): void {
  const file = sink.file;
  if (!file || sink.fileFailed) {
    return;
  }

  sink.writeQueue = sink.writeQueue
    .then(async () => {
      if (!sink.fileReady) {
        await mkdir(dirname(file), { recursive: true });
        sink.fileReady = true;
      }
      await appendFile(file, line + '\n');
    })
    .catch((err) => {
      // The file sink stays off until reconfigured; the ring still works
      sink.fileFailed = true;
      remember({
        timestamp: new Date(),
        level: 'error',
        scope: 'logger',
        message: `Log file ${file} disabled: ${describeError(err)}`,
      });
    });
}

function record(level: LogLevel, scope: string, message: string): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[sink.level]) {
    return;
  }

  const entry: LogEntry = { timestamp: new Date(), level, scope, message };
  const line = formatLogLine(entry);

  remember(entry);
  writeToFile(line);

  if (sink.console) {
    console.error(line);
  }
}

// =============================================================================
// Logger
// =============================================================================

/**
 * Scoped logger handed to each module
 */
export class Logger {
  readonly scope: string;

  constructor(scope: string) {
    this.scope = scope;
  }

  /**
   * Creates a logger whose scope is nested under this one
   */
  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`);
  }

  debug(message: string): void {
    record('debug', this.scope, message);
  }

  info(message: string): void {
    record('info', this.scope, message);
  }

  warn(message: string, err?: unknown): void {
    record('warn', this.scope, err === undefined ? message : `${message}: ${describeError(err)}`);
  }

  error(message: string, err?: unknown): void {
    record('error', this.scope, err === undefined ? message : `${message}: ${describeError(err)}`);
  }
}

/**
 * Creates a logger for a module.
 *
 * @example
 * const logger = createLogger('trackers');
 * logger.info('Refreshed tracker list');
 */
export function createLogger(scope: string): Logger {
  return new Logger(scope);
}
