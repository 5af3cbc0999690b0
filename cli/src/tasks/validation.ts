/**
 * Input validation for new tasks.
 *
 * Timestamps are ISO 8601 / RFC 3339 date-times. A timestamp without an
 * offset is read as UTC, the single clock this tool works in.
 */

import { ValidationError } from "../core/errors.js";
import { UNASSIGNED_TASK_ID, type NewTaskInput, type Task } from "../types.js";

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?$/i;

const EXAMPLE_TIMESTAMP = "2026-12-31T15:00:00Z";

/**
 * Parse a date-time string into a Date.
 * Throws ValidationError on anything that isn't a real calendar instant.
 */
export function parseTimestamp(raw: string, field: string): Date {
  const value = raw.trim();
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(
      `Invalid ${field} "${raw}". Use ISO 8601 format, e.g. ${EXAMPLE_TIMESTAMP}`,
    );
  }

  const [, year, month, day, hour, minute, second = "00", fraction = "", zone] = match;
  if (!isRealDateTime(Number(year), Number(month), Number(day), Number(hour), Number(minute), Number(second))) {
    throw new ValidationError(`Invalid ${field} "${raw}": not a real date-time`);
  }

  const millis = fraction.padEnd(3, "0").slice(0, 3);
  const date = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${normalizeOffset(zone)}`);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid ${field} "${raw}": not a real date-time`);
  }

  return date;
}

function isRealDateTime(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
): boolean {
  if (month < 1 || month > 12) return false;
  // Day 0 of the following month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day >= 1 && day <= daysInMonth && hour <= 23 && minute <= 59 && second <= 59;
}

function normalizeOffset(zone: string | undefined): string {
  if (!zone || zone.toUpperCase() === "Z") return "Z";
  // +0530 → +05:30
  return zone.includes(":") ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
}

/** Positive whole number of minutes. */
export function parseFrequencyMinutes(raw: string): number {
  const value = raw.trim();
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`Invalid frequency "${raw}": expected a whole number of minutes`);
  }
  const minutes = Number(value);
  if (!Number.isSafeInteger(minutes) || minutes <= 0) {
    throw new ValidationError(`Invalid frequency "${raw}": must be a positive number of minutes`);
  }
  return minutes;
}

/**
 * Validate raw `add` input against the current instant and build an
 * unassigned Task.
 */
export function buildTask(input: NewTaskInput, now: number): Task {
  const title = input.title.trim();
  if (!title) {
    throw new ValidationError("Title must not be empty.");
  }

  const startTime = parseTimestamp(input.start, "start time");
  const endTime = parseTimestamp(input.end, "end time");

  if (startTime.getTime() <= now) {
    throw new ValidationError("Start time must be in the future.");
  }
  if (endTime.getTime() <= startTime.getTime()) {
    throw new ValidationError("End time must be after the start time.");
  }

  const base = {
    id: UNASSIGNED_TASK_ID,
    title,
    details: input.details,
    startTime,
    endTime,
  };

  if (!input.recurring) {
    if (input.frequencyMinutes !== undefined) {
      throw new ValidationError("A frequency was given but the task is not recurring (add --recurring).");
    }
    return { ...base, isRecurring: false };
  }

  if (input.frequencyMinutes === undefined) {
    throw new ValidationError("Recurring tasks need a frequency in minutes.");
  }
  return { ...base, isRecurring: true, frequencyMinutes: parseFrequencyMinutes(input.frequencyMinutes) };
}
