/**
 * Google Calendar bridge
 *
 * Pushes tasks as timed events tagged with a private extended property and
 * pulls timed events from the sync window, leaving out the ones this tool
 * created so a push followed by a sync never duplicates a task.
 */

import { google, type Auth, type calendar_v3 } from "googleapis";
import type { ILogger } from "@taskminder/shared/logging";
import type { CalendarConfig } from "../core/config.js";
import { CalendarError } from "../core/errors.js";
import { createComponentLogger } from "../logging.js";
import type { Task } from "../types.js";
import { getAuthorizedClient } from "./auth.js";
import type { CalendarBridge, CalendarPushResult, ExternalEvent } from "./bridge.js";

const EVENT_MARKER_KEY = "taskminder";
const EVENT_TASK_ID_KEY = "taskminderTaskId";
const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ============================================
// EVENT MAPPING
// ============================================

export function buildEventResource(task: Task): calendar_v3.Schema$Event {
  const description = task.isRecurring
    ? `${task.details}\n\nRepeats every ${task.frequencyMinutes} minutes (managed by taskminder)`
    : task.details;

  return {
    summary: task.title,
    description,
    start: { dateTime: task.startTime.toISOString(), timeZone: "UTC" },
    end: { dateTime: task.endTime.toISOString(), timeZone: "UTC" },
    extendedProperties: {
      private: {
        [EVENT_MARKER_KEY]: "true",
        [EVENT_TASK_ID_KEY]: String(task.id),
      },
    },
  };
}

function isOwnEvent(event: calendar_v3.Schema$Event): boolean {
  return event.extendedProperties?.private?.[EVENT_MARKER_KEY] === "true";
}

/**
 * Map a calendar event to an importable event, or null for all-day events,
 * events without an id, our own events and events that don't end after
 * they start.
 */
export function mapEvent(event: calendar_v3.Schema$Event): ExternalEvent | null {
  if (!event.id || !event.start?.dateTime || !event.end?.dateTime) return null;
  if (isOwnEvent(event)) return null;

  const start = new Date(event.start.dateTime);
  const end = new Date(event.end.dateTime);
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) return null;
  if (end.getTime() <= start.getTime()) return null;

  return {
    id: event.id,
    title: event.summary?.trim() || "(untitled event)",
    description: event.description?.trim() || null,
    start,
    end,
  };
}

// ============================================
// BRIDGE
// ============================================

export interface GoogleCalendarBridgeOptions {
  config: CalendarConfig;
  log?: ILogger;
  /** Current instant; defaults to Date.now */
  now?: () => number;
  /** Override how the authorized client is obtained */
  authorize?: () => Promise<Auth.OAuth2Client>;
}

export class GoogleCalendarBridge implements CalendarBridge {
  private readonly config: CalendarConfig;
  private readonly log: ILogger;
  private readonly now: () => number;
  private readonly authorize: () => Promise<Auth.OAuth2Client>;
  private client: calendar_v3.Calendar | null = null;

  constructor(options: GoogleCalendarBridgeOptions) {
    this.config = options.config;
    this.log = options.log ?? createComponentLogger("calendar");
    this.now = options.now ?? (() => Date.now());
    this.authorize = options.authorize ?? (() => getAuthorizedClient(this.config, this.log));
  }

  async push(task: Task): Promise<CalendarPushResult> {
    const calendar = await this.getCalendar();

    let created: calendar_v3.Schema$Event;
    try {
      const response = await calendar.events.insert({
        calendarId: this.config.calendarId,
        requestBody: buildEventResource(task),
      });
      created = response.data;
    } catch (error) {
      throw new CalendarError(`Could not add '${task.title}' to Google Calendar`, error);
    }

    if (!created.id) {
      throw new CalendarError(`Google Calendar did not return an id for '${task.title}'`);
    }

    this.log.info("Pushed task to calendar", { taskId: task.id, eventId: created.id });
    return { eventId: created.id, htmlLink: created.htmlLink ?? undefined };
  }

  async pull(): Promise<ExternalEvent[]> {
    const calendar = await this.getCalendar();
    const timeMin = new Date(this.now());
    const timeMax = new Date(timeMin.getTime() + this.config.syncWindowDays * MS_PER_DAY);

    const items: calendar_v3.Schema$Event[] = [];
    let pageToken: string | undefined;
    try {
      do {
        const response = await calendar.events.list({
          calendarId: this.config.calendarId,
          timeMin: timeMin.toISOString(),
          timeMax: timeMax.toISOString(),
          singleEvents: true,
          orderBy: "startTime",
          pageToken,
        });
        items.push(...(response.data.items ?? []));
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);
    } catch (error) {
      throw new CalendarError("Could not list Google Calendar events", error);
    }

    const events: ExternalEvent[] = [];
    for (const item of items) {
      const event = mapEvent(item);
      if (event) events.push(event);
    }

    this.log.debug("Pulled calendar events", {
      received: items.length,
      importable: events.length,
      timeMin,
      timeMax,
    });
    return events;
  }

  private async getCalendar(): Promise<calendar_v3.Calendar> {
    if (!this.client) {
      const auth = await this.authorize();
      this.client = google.calendar({ version: "v3", auth });
    }
    return this.client;
  }
}
