/**
 * Calendar Sync Tests
 *
 * Covers:
 * - Events become one-off tasks keyed by event id
 * - Dedup against the store and within one pull
 * - Removed imports stay removed
 * - Reminders only for tasks that haven't ended
 * - Pull failures propagate without touching the store
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { eventToTask, IMPORTED_DETAILS_FALLBACK, syncFromCalendar } from "./sync.js";
import type { CalendarBridge, ExternalEvent } from "./bridge.js";
import { CalendarError } from "../core/errors.js";
import { ReminderScheduler } from "../scheduler/service.js";
import { TaskStore } from "../tasks/store.js";
import { makeLog, makeTask } from "../test-helpers.js";

const T0 = Date.parse("2026-03-01T10:00:00Z");

function makeEvent(overrides: Partial<ExternalEvent> = {}): ExternalEvent {
  return {
    id: "evt-1",
    title: "Design review",
    description: "Room 4",
    start: new Date("2026-03-01T14:00:00Z"),
    end: new Date("2026-03-01T15:00:00Z"),
    ...overrides,
  };
}

function bridgeReturning(events: ExternalEvent[]): CalendarBridge {
  return {
    push: vi.fn(),
    pull: vi.fn().mockResolvedValue(events),
  };
}

let store: TaskStore;
let scheduler: ReminderScheduler;

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(T0);
  store = new TaskStore();
  scheduler = new ReminderScheduler({ store, log: makeLog() });
  scheduler.start();
});

afterEach(() => {
  scheduler.stop();
  vi.useRealTimers();
});

function sync(events: ExternalEvent[]) {
  return syncFromCalendar({
    bridge: bridgeReturning(events),
    store,
    scheduler,
    now: () => Date.now(),
    log: makeLog(),
  });
}

// ============================================
// MAPPING
// ============================================

describe("eventToTask", () => {
  it("maps an event to an unassigned one-off task", () => {
    expect(eventToTask(makeEvent())).toEqual({
      id: 0,
      title: "Design review",
      details: "Room 4",
      startTime: new Date("2026-03-01T14:00:00Z"),
      endTime: new Date("2026-03-01T15:00:00Z"),
      isRecurring: false,
      externalId: "evt-1",
    });
  });

  it("fills in details for events without a description", () => {
    expect(eventToTask(makeEvent({ description: null })).details).toBe(IMPORTED_DETAILS_FALLBACK);
  });
});

// ============================================
// SYNC
// ============================================

describe("syncFromCalendar", () => {
  it("imports new events and schedules their reminders", async () => {
    const result = await sync([
      makeEvent({ id: "evt-1" }),
      makeEvent({ id: "evt-2", title: "Retro" }),
    ]);

    expect(result).toEqual({ imported: 2, skipped: 0 });
    expect(store.list().map(task => [task.id, task.title, task.externalId])).toEqual([
      [1, "Design review", "evt-1"],
      [2, "Retro", "evt-2"],
    ]);
    expect(scheduler.getStatus().activities.map(activity => activity.taskId)).toEqual([1, 2]);
  });

  it("skips events already in the store", async () => {
    store.add(makeTask({ title: "Imported earlier", externalId: "evt-1" }));

    const result = await sync([makeEvent({ id: "evt-1" }), makeEvent({ id: "evt-3" })]);

    expect(result).toEqual({ imported: 1, skipped: 1 });
    expect(store.size).toBe(2);
  });

  it("is idempotent across repeated syncs", async () => {
    const events = [makeEvent({ id: "evt-1" }), makeEvent({ id: "evt-2" })];
    await sync(events);
    const second = await sync(events);

    expect(second).toEqual({ imported: 0, skipped: 2 });
    expect(store.size).toBe(2);
  });

  it("doesn't bring back an event whose task was removed", async () => {
    await sync([makeEvent({ id: "evt-1" }), makeEvent({ id: "evt-2" })]);
    store.remove(1);

    const result = await sync([makeEvent({ id: "evt-1" }), makeEvent({ id: "evt-2" })]);

    expect(result).toEqual({ imported: 0, skipped: 2 });
    expect(store.list().map(task => task.externalId)).toEqual(["evt-2"]);
  });

  it("dedups an id repeated within one pull", async () => {
    const result = await sync([makeEvent({ id: "evt-1" }), makeEvent({ id: "evt-1" })]);
    expect(result).toEqual({ imported: 1, skipped: 1 });
  });

  it("stores but doesn't schedule an event that already ended", async () => {
    await sync([
      makeEvent({
        id: "evt-past",
        start: new Date("2026-03-01T08:00:00Z"),
        end: new Date("2026-03-01T09:00:00Z"),
      }),
    ]);

    expect(store.size).toBe(1);
    expect(scheduler.getStatus().activities).toEqual([]);
  });

  it("schedules an event in progress for its end reminder and completion", async () => {
    await sync([
      makeEvent({
        id: "evt-now",
        start: new Date("2026-03-01T09:30:00Z"),
        end: new Date("2026-03-01T10:30:00Z"),
      }),
    ]);

    expect(scheduler.getActivity(1)?.state).toBe("awaiting_end_reminder");
  });

  it("propagates pull failures and leaves the store alone", async () => {
    const bridge: CalendarBridge = {
      push: vi.fn(),
      pull: vi.fn().mockRejectedValue(new CalendarError("Could not list Google Calendar events")),
    };

    await expect(syncFromCalendar({ bridge, store, scheduler, now: () => Date.now(), log: makeLog() }))
      .rejects.toThrow("Could not list Google Calendar events");
    expect(store.size).toBe(0);
  });
});
