/**
 * Logging Types
 *
 * Structured log entries, transports and the logger contract shared by
 * every taskminder package.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

/** Scheduling context attached to entries by child loggers. */
export interface LogContext {
  /** Recurrence chain the entry belongs to */
  chainId?: string;
  /** Task instance the entry is about */
  taskId?: number;
}

export interface LogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Component that produced the log (e.g. "taskminder.scheduler") */
  component: string;
  message: string;
  /** Structured data payload */
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  /** Transport name for debugging */
  name: string;
  /** Minimum level this transport handles */
  minLevel: LogLevel;
  log(entry: LogEntry): void | Promise<void>;
  /** Flush any buffered logs (for graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LoggerConfig {
  /** Entries below this level are dropped before reaching any transport */
  minLevel: LogLevel;
  component: string;
  /** Context attached to every entry */
  defaultContext?: LogContext;
  transports: LogTransport[];
  /** Data keys to redact (regex patterns) */
  redactPatterns?: RegExp[];
  /** Keep last N entries in memory for the `logs` command */
  ringBufferSize?: number;
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: LogContext & { component?: string }): ILogger;

  /** Recent entries from the shared ring buffer */
  getRecentLogs(count?: number): LogEntry[];

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /credential/i,
];
