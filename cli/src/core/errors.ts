/**
 * Error taxonomy.
 *
 * Validation errors abort a single command, calendar errors are reported
 * without touching local state, scheduling errors stop one recurrence chain.
 */

export type ErrorCode = "validation" | "calendar" | "scheduling" | "config";

export class TaskminderError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class ValidationError extends TaskminderError {
  constructor(message: string) {
    super(message, "validation");
  }
}

export class CalendarError extends TaskminderError {
  constructor(message: string, cause?: unknown) {
    super(message, "calendar", { cause });
  }
}

export class SchedulingError extends TaskminderError {
  constructor(message: string, cause?: unknown) {
    super(message, "scheduling", { cause });
  }
}

export class ConfigError extends TaskminderError {
  constructor(message: string) {
    super(message, "config");
  }
}

/**
 * User-facing message for any thrown value. Our own errors carry messages
 * meant for the user; anything else gets the fallback plus its message.
 */
export function describeError(error: unknown, fallbackMessage: string): string {
  if (error instanceof TaskminderError) {
    return error.message;
  }
  if (error instanceof Error && error.message) {
    return `${fallbackMessage}: ${error.message}`;
  }
  return fallbackMessage;
}
