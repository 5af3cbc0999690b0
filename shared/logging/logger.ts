/**
 * Core Logger Implementation
 *
 * Structured logging with multiple transport support. Child loggers share
 * their parent's transports and ring buffer, so the root logger can answer
 * "what happened recently" for every component.
 */

import {
  LogLevel,
  LogEntry,
  LogContext,
  LoggerConfig,
  ILogger,
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS
} from "./types.js";

// ============================================
// RING BUFFER
// ============================================

export class RingBuffer<T> {
  private buffer: T[] = [];
  private head = 0;

  constructor(private readonly capacity: number) {}

  push(item: T): void {
    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return;
    }
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
  }

  getAll(): T[] {
    // Once full, the oldest entry sits at head
    return [
      ...this.buffer.slice(this.head),
      ...this.buffer.slice(0, this.head)
    ];
  }

  getLast(n: number): T[] {
    if (n <= 0) return [];
    return this.getAll().slice(-n);
  }

  clear(): void {
    this.buffer = [];
    this.head = 0;
  }
}

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];
  private readonly ringBuffer: RingBuffer<LogEntry>;
  private readonly context: LogContext;

  constructor(config: LoggerConfig, sharedBuffer?: RingBuffer<LogEntry>) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.ringBuffer = sharedBuffer ?? new RingBuffer(config.ringBufferSize ?? 1000);
    this.context = { ...config.defaultContext };
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message
    };
    if (this.context.chainId !== undefined) entry.chainId = this.context.chainId;
    if (this.context.taskId !== undefined) entry.taskId = this.context.taskId;

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: "Unknown", message: String(error) };
    }

    this.ringBuffer.push(entry);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] >= LOG_LEVELS[transport.minLevel]) {
        try {
          const pending = transport.log(entry);
          if (pending instanceof Promise) {
            pending.catch((e: unknown) => reportTransportFailure(transport.name, e));
          }
        } catch (e) {
          reportTransportFailure(transport.name, e);
        }
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else if (value instanceof Date) {
        result[key] = value.toISOString();
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context Management
  // ----------------------------------------

  child(context: LogContext & { component?: string }): ILogger {
    const { component, ...rest } = context;
    return new Logger(
      {
        ...this.config,
        component: component ?? this.config.component,
        defaultContext: { ...this.context, ...rest }
      },
      this.ringBuffer
    );
  }

  // ----------------------------------------
  // Buffer Access
  // ----------------------------------------

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.ringBuffer.getLast(count);
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map(t => t.close?.()));
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object"
    && value !== null
    && !Array.isArray(value)
    && !(value instanceof Date)
    && !(value instanceof Error);
}

function reportTransportFailure(name: string, error: unknown): void {
  // The logger can't log its own failures; stderr is the last resort
  console.error(`[Logger] Transport ${name} failed:`, error);
}

// ============================================
// GLOBAL LOGGER SINGLETON
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}

export function isLoggerInitialized(): boolean {
  return globalLogger !== null;
}

export function log(): Logger {
  return getLogger();
}
