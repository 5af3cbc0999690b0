/**
 * Scheduler Types
 *
 * Activity states, reminder events and scheduler configuration.
 */

import type { Task } from "../types.js";

// ============================================
// ACTIVITY
// ============================================

/**
 * One task instance's progress through its reminder lifecycle.
 * `cancelled` and `failed` end an activity early; `terminal` and a launched
 * successor end it normally.
 */
export type ActivityState =
  | "created"
  | "awaiting_start_reminder"
  | "awaiting_end_reminder"
  | "awaiting_completion"
  | "completed"
  | "awaiting_successor"
  | "terminal"
  | "cancelled"
  | "failed";

export interface ActivitySnapshot {
  taskId: number;
  chainId: string;
  title: string;
  state: ActivityState;
  /** When the activity next wakes up, if it is suspended */
  nextFireAt: Date | null;
}

// ============================================
// EVENTS
// ============================================

interface EventBase {
  chainId: string;
  /** Private copy of the task the activity tracks */
  task: Task;
  timestamp: Date;
}

export type ReminderEvent =
  | (EventBase & { type: "start_reminder"; leadMinutes: number })
  | (EventBase & { type: "end_reminder"; leadMinutes: number })
  | (EventBase & { type: "task_complete" })
  | (EventBase & { type: "occurrence_scheduled"; successor: Task })
  | (EventBase & { type: "chain_failed"; error: string })
  | (EventBase & { type: "chain_cancelled" });

export type ReminderEventType = ReminderEvent["type"];

export type ReminderEventListener = (event: ReminderEvent) => void;

// ============================================
// CONFIG
// ============================================

export interface ReminderSchedulerConfig {
  /** Minutes before start to send the "starts soon" reminder */
  startLeadMinutes: number;
  /** Minutes before end to send the "ends soon" reminder */
  endLeadMinutes: number;
}

export const DEFAULT_REMINDER_CONFIG: ReminderSchedulerConfig = {
  startLeadMinutes: 5,
  endLeadMinutes: 2,
};

export interface SchedulerStatus {
  running: boolean;
  pendingTimers: number;
  activities: ActivitySnapshot[];
}
