/**
 * Structured Logging
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, log, ConsoleTransport, FileTransport } from "@taskminder/shared/logging";
 *
 * initLogger({
 *   minLevel: "debug",
 *   component: "taskminder",
 *   transports: [
 *     new ConsoleTransport({ minLevel: "warn" }),
 *     new FileTransport({ logDir: "~/.taskminder/logs" })
 *   ]
 * });
 *
 * log().info("Scheduler started", { pending: 0 });
 *
 * const chainLog = log().child({ component: "taskminder.scheduler", chainId: "chain_x1" });
 * chainLog.debug("Armed timer");
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export {
  Logger,
  RingBuffer,
  initLogger,
  getLogger,
  isLoggerInitialized,
  log
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  formatPlainText,
  type ConsoleTransportOptions,
  type FileTransportOptions
} from "./transports/index.js";
