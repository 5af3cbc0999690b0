/**
 * Output formatting for the shell.
 */

import type { ReminderEvent, SchedulerStatus } from "../scheduler/index.js";
import type { Task } from "../types.js";

export function formatInstant(date: Date): string {
  // 2026-03-01T10:00:00.000Z → 2026-03-01 10:00:00 UTC
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function formatTask(task: Task): string {
  const recurring = task.isRecurring ? `Yes (every ${task.frequencyMinutes} min)` : "No";
  return `ID: ${task.id}, Title: '${task.title}', Details: '${task.details}', `
    + `Start: ${formatInstant(task.startTime)}, End: ${formatInstant(task.endTime)}, `
    + `Recurring: ${recurring}`;
}

export function formatTaskList(tasks: Task[]): string[] {
  if (tasks.length === 0) return ["No tasks."];
  return tasks.map(formatTask);
}

function minutes(count: number): string {
  return count === 1 ? "1 minute" : `${count} minutes`;
}

/** The notification line printed for a scheduler event. */
export function formatReminderEvent(event: ReminderEvent): string {
  const title = event.task.title;
  switch (event.type) {
    case "start_reminder":
      return `Reminder: '${title}' starts in ${minutes(event.leadMinutes)}!`;
    case "end_reminder":
      return `Reminder: '${title}' ends in ${minutes(event.leadMinutes)}!`;
    case "task_complete":
      return `Task '${title}' is complete`;
    case "occurrence_scheduled":
      return `Next occurrence of '${title}' scheduled with ID: ${event.successor.id}`;
    case "chain_failed":
      return `Recurrence of '${title}' stopped: ${event.error}`;
    case "chain_cancelled":
      return `Reminders for '${title}' (ID: ${event.task.id}) cancelled`;
  }
}

export function formatStatus(status: SchedulerStatus, taskCount: number): string[] {
  const lines = [
    `Scheduler: ${status.running ? "running" : "stopped"}`,
    `Tasks: ${taskCount}`,
    `Pending timers: ${status.pendingTimers}`,
  ];

  if (status.activities.length === 0) {
    lines.push("No active reminders.");
    return lines;
  }

  lines.push("Active reminders:");
  for (const activity of status.activities) {
    const next = activity.nextFireAt ? formatInstant(activity.nextFireAt) : "-";
    lines.push(`  #${activity.taskId} '${activity.title}' ${activity.state} next=${next} chain=${activity.chainId}`);
  }
  return lines;
}

export const HELP_TEXT = [
  "Commands:",
  "  add <title> <details> <start> <end> [--recurring [minutes]] [--every <minutes>]",
  "      Times are ISO 8601, e.g. 2026-12-31T15:00:00Z (no offset means UTC)",
  "  list                 List all tasks",
  "  remove <id>          Remove a task and cancel its reminders",
  "  sync                 Import upcoming Google Calendar events",
  "  auth                 Authorize Google Calendar access",
  "  status               Show scheduler status",
  "  logs [count]         Show recent log entries (default 20)",
  "  help                 Show this help",
  "  quit | exit          Leave (pending reminders are dropped)",
];
