/**
 * Recurrence — successor computation for recurring tasks.
 *
 * Pure functions. The continuation itself (wait for the successor's start,
 * insert it, launch its activity) is driven by the reminder activity.
 */

import { SchedulingError } from "../core/errors.js";
import { UNASSIGNED_TASK_ID, type RecurringTask } from "../types.js";

const MS_PER_MINUTE = 60_000;

/** Largest instant a Date can represent (±100,000,000 days from epoch). */
const MAX_DATE_MS = 8.64e15;

/**
 * Shift an instant forward by whole minutes.
 * Throws SchedulingError if the result is not a representable instant.
 */
export function shiftByMinutes(instant: Date, minutes: number): Date {
  const deltaMs = minutes * MS_PER_MINUTE;
  if (!Number.isSafeInteger(minutes) || !Number.isSafeInteger(deltaMs)) {
    throw new SchedulingError(`Frequency of ${minutes} minutes is out of range`);
  }

  const shifted = instant.getTime() + deltaMs;
  if (!Number.isFinite(shifted) || Math.abs(shifted) > MAX_DATE_MS) {
    throw new SchedulingError(
      `Next occurrence after ${instant.toISOString()} is beyond the supported date range`,
    );
  }
  return new Date(shifted);
}

/**
 * The occurrence following `task`: both times shifted by the frequency,
 * everything else copied, id unassigned. The calendar merge key belongs to
 * the imported occurrence only and is not carried over.
 */
export function nextOccurrence(task: RecurringTask): RecurringTask {
  if (task.frequencyMinutes <= 0) {
    throw new SchedulingError(`Invalid frequency ${task.frequencyMinutes} for task ${task.id}`);
  }

  return {
    id: UNASSIGNED_TASK_ID,
    title: task.title,
    details: task.details,
    startTime: shiftByMinutes(task.startTime, task.frequencyMinutes),
    endTime: shiftByMinutes(task.endTime, task.frequencyMinutes),
    isRecurring: true,
    frequencyMinutes: task.frequencyMinutes,
  };
}
