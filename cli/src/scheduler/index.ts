/**
 * Reminder Scheduler — Barrel Exports
 */

export { ReminderScheduler, type ReminderSchedulerOptions } from "./service.js";
export { TimerWheel, MAX_TIMEOUT_MS, type JobHandle, type TimerWheelOptions } from "./timer.js";
export { systemClock, type Clock } from "./clock.js";
export { nextOccurrence, shiftByMinutes } from "./recurrence.js";
export {
  DEFAULT_REMINDER_CONFIG,
  type ActivitySnapshot,
  type ActivityState,
  type ReminderEvent,
  type ReminderEventListener,
  type ReminderEventType,
  type ReminderSchedulerConfig,
  type SchedulerStatus,
} from "./types.js";
