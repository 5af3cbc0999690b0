/**
 * Logging Setup for the CLI
 *
 * Initializes the shared logging system. The console transport stays at
 * warn by default so log lines don't interleave with the interactive shell;
 * the file transport keeps the full debug trail.
 */

import {
  initLogger,
  getLogger,
  isLoggerInitialized,
  Logger,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogLevel,
  type LogTransport
} from "@taskminder/shared/logging";

// ============================================
// CONFIGURATION
// ============================================

export interface LoggingOptions {
  /** Minimum level for the logger as a whole (default: "info") */
  minLevel?: LogLevel;
  /** Minimum level echoed to the terminal (default: "warn") */
  consoleLevel?: LogLevel;
  /** Directory for log files; omit to disable the file transport */
  logDir?: string;
  colors?: boolean;
}

// ============================================
// INITIALIZATION
// ============================================

export function initCliLogging(options: LoggingOptions = {}): Logger {
  const transports: LogTransport[] = [
    new ConsoleTransport({
      minLevel: options.consoleLevel ?? "warn",
      colors: options.colors,
    }),
  ];

  if (options.logDir) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir,
      filename: "taskminder",
      maxSize: 5 * 1024 * 1024,
      maxFiles: 5,
    }));
  }

  return initLogger({
    minLevel: options.minLevel ?? "info",
    component: "taskminder",
    transports,
    ringBufferSize: 500,
  });
}

/**
 * Get the CLI logger. Auto-initializes a console-only logger if accessed
 * before `initCliLogging()`.
 */
export function getCliLogger(): Logger {
  if (!isLoggerInitialized()) {
    initCliLogging();
  }
  return getLogger();
}

/**
 * Create a namespaced logger for a specific component.
 *
 * ```typescript
 * const log = createComponentLogger("scheduler");
 * log.info("Started"); // logs as [taskminder.scheduler]
 * ```
 */
export function createComponentLogger(component: string): ILogger {
  return getCliLogger().child({ component: `taskminder.${component}` });
}
