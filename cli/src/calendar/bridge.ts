/**
 * Calendar Bridge — the contract between the task service and an external
 * calendar. Both directions are best-effort: failures surface as
 * CalendarError and never touch local state.
 */

import type { Task } from "../types.js";

/** A timed event read from the calendar, already filtered for import. */
export interface ExternalEvent {
  /** Calendar event id, used as the task's `externalId` */
  id: string;
  title: string;
  description: string | null;
  start: Date;
  end: Date;
}

export interface CalendarPushResult {
  /** Id of the event created for the task */
  eventId: string;
  htmlLink?: string;
}

export interface CalendarBridge {
  /** Mirror a newly added task as a calendar event. */
  push(task: Task): Promise<CalendarPushResult>;
  /** Timed events in the upcoming sync window. */
  pull(): Promise<ExternalEvent[]>;
}
