/**
 * Pull sync: calendar events → tasks.
 *
 * Each pulled event becomes a one-off task keyed by its event id. An event
 * already imported (same `externalId` in the store) is skipped, and so is one
 * whose task the user removed. Reminders are scheduled for imported tasks
 * that haven't ended yet.
 */

import type { ILogger } from "@taskminder/shared/logging";
import { createComponentLogger } from "../logging.js";
import type { ReminderScheduler } from "../scheduler/index.js";
import type { TaskStore } from "../tasks/store.js";
import { UNASSIGNED_TASK_ID, type OneOffTask } from "../types.js";
import type { CalendarBridge, ExternalEvent } from "./bridge.js";

export const IMPORTED_DETAILS_FALLBACK = "Imported from Google Calendar";

export interface SyncResult {
  imported: number;
  skipped: number;
}

export interface SyncDeps {
  bridge: CalendarBridge;
  store: TaskStore;
  scheduler: ReminderScheduler;
  now: () => number;
  log?: ILogger;
}

export function eventToTask(event: ExternalEvent): OneOffTask {
  return {
    id: UNASSIGNED_TASK_ID,
    title: event.title,
    details: event.description ?? IMPORTED_DETAILS_FALLBACK,
    startTime: new Date(event.start.getTime()),
    endTime: new Date(event.end.getTime()),
    isRecurring: false,
    externalId: event.id,
  };
}

export async function syncFromCalendar(deps: SyncDeps): Promise<SyncResult> {
  const log = deps.log ?? createComponentLogger("sync");
  const events = await deps.bridge.pull();
  const result: SyncResult = { imported: 0, skipped: 0 };
  // Recurring calendar series expand to one event id per instance, but a
  // page can still repeat an id; dedup within the batch too
  const seen = new Set<string>();

  for (const event of events) {
    if (seen.has(event.id) || deps.store.findByExternalId(event.id) || deps.store.wasRemoved(event.id)) {
      result.skipped++;
      continue;
    }
    seen.add(event.id);

    const task = eventToTask(event);
    const id = deps.store.add(task);
    result.imported++;

    if (task.endTime.getTime() > deps.now()) {
      deps.scheduler.schedule({ ...task, id });
    }
    log.debug("Imported calendar event", { taskId: id, eventId: event.id });
  }

  log.info("Calendar sync finished", { ...result, pulled: events.length });
  return result;
}
