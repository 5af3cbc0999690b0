/**
 * Task Service Tests
 *
 * Covers:
 * - addTask: validation before any state change, store + schedule on success
 * - Calendar push: success, failure kept local as a warning, push disabled
 * - removeTask: found/not found, reminders cancelled
 * - Concurrent adds get distinct ids
 * - syncFromCalendar without a calendar
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TaskService } from "./service.js";
import { TaskStore } from "./store.js";
import type { CalendarBridge } from "../calendar/bridge.js";
import { CalendarError, ValidationError } from "../core/errors.js";
import { ReminderScheduler } from "../scheduler/service.js";
import type { ReminderEvent } from "../scheduler/types.js";
import { makeLog } from "../test-helpers.js";
import type { NewTaskInput } from "../types.js";

const T0 = Date.parse("2026-03-01T10:00:00Z");

function makeInput(overrides: Partial<NewTaskInput> = {}): NewTaskInput {
  return {
    title: "Dentist",
    details: "Bring forms",
    start: "2026-03-01T10:10:00Z",
    end: "2026-03-01T10:20:00Z",
    recurring: false,
    ...overrides,
  };
}

function makeBridge(): CalendarBridge & { push: ReturnType<typeof vi.fn>; pull: ReturnType<typeof vi.fn> } {
  return {
    push: vi.fn().mockResolvedValue({ eventId: "evt-1" }),
    pull: vi.fn().mockResolvedValue([]),
  };
}

// ============================================
// SETUP
// ============================================

let store: TaskStore;
let scheduler: ReminderScheduler;
let events: ReminderEvent[];

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(T0);
  store = new TaskStore();
  scheduler = new ReminderScheduler({ store, log: makeLog() });
  events = [];
  scheduler.onEvent(event => events.push(event));
  scheduler.start();
});

afterEach(() => {
  scheduler.stop();
  vi.useRealTimers();
});

function makeService(calendar: CalendarBridge | null = null, pushOnAdd = true): TaskService {
  return new TaskService({ store, scheduler, calendar, pushOnAdd, log: makeLog() });
}

// ============================================
// ADD
// ============================================

describe("TaskService.addTask", () => {
  it("stores and schedules a valid task", async () => {
    const service = makeService();
    const result = await service.addTask(makeInput());

    expect(result.task.id).toBe(1);
    expect(result.chainId).toMatch(/^chain_/);
    expect(result.calendarWarning).toBeUndefined();
    expect(store.get(1)?.title).toBe("Dentist");
    expect(scheduler.getActivity(1)?.state).toBe("awaiting_start_reminder");
  });

  it("runs the full reminder sequence for an added task", async () => {
    const service = makeService();
    await service.addTask(makeInput());

    vi.advanceTimersByTime(20 * 60_000);
    expect(events.map(event => event.type)).toEqual(["start_reminder", "end_reminder", "task_complete"]);
    expect(store.size).toBe(1);
  });

  it("rejects a start in the past without touching the store", async () => {
    const service = makeService();
    await expect(service.addTask(makeInput({ start: "2026-03-01T09:00:00Z" })))
      .rejects.toThrow(new ValidationError("Start time must be in the future."));
    expect(store.size).toBe(0);
    expect(scheduler.getStatus().activities).toEqual([]);
  });

  it("never stores a task whose end is not after its start", async () => {
    const service = makeService();
    await expect(service.addTask(makeInput({ end: "2026-03-01T10:10:00Z" })))
      .rejects.toThrow("End time must be after the start time.");
    expect(store.list()).toEqual([]);
  });

  it("gives concurrent adds distinct ids", async () => {
    const service = makeService();
    const [a, b] = await Promise.all([
      service.addTask(makeInput({ title: "A" })),
      service.addTask(makeInput({ title: "B" })),
    ]);

    expect(a.task.id).not.toBe(b.task.id);
    expect(store.list().map(task => task.title)).toEqual(["A", "B"]);
  });
});

// ============================================
// CALENDAR PUSH
// ============================================

describe("TaskService.addTask with a calendar", () => {
  it("pushes the stored task", async () => {
    const bridge = makeBridge();
    const result = await makeService(bridge).addTask(makeInput());

    expect(result.eventId).toBe("evt-1");
    expect(bridge.push).toHaveBeenCalledWith(expect.objectContaining({ id: 1, title: "Dentist" }));
  });

  it("keeps the task when the push fails", async () => {
    const bridge = makeBridge();
    bridge.push.mockRejectedValue(new CalendarError("Could not add 'Dentist' to Google Calendar"));

    const result = await makeService(bridge).addTask(makeInput());

    expect(result.calendarWarning).toBe("Could not add 'Dentist' to Google Calendar");
    expect(result.eventId).toBeUndefined();
    expect(store.size).toBe(1);
    expect(scheduler.getActivity(1)).toBeDefined();
  });

  it("describes unexpected push errors", async () => {
    const bridge = makeBridge();
    bridge.push.mockRejectedValue(new Error("socket hang up"));

    const result = await makeService(bridge).addTask(makeInput());
    expect(result.calendarWarning).toBe("Could not push the task to Google Calendar: socket hang up");
  });

  it("doesn't push when pushing is turned off", async () => {
    const bridge = makeBridge();
    await makeService(bridge, false).addTask(makeInput());
    expect(bridge.push).not.toHaveBeenCalled();
  });
});

// ============================================
// REMOVE
// ============================================

describe("TaskService.removeTask", () => {
  it("removes the task and cancels its reminders", async () => {
    const service = makeService();
    await service.addTask(makeInput());

    const removed = service.removeTask(1);
    expect(removed?.task.title).toBe("Dentist");
    expect(removed?.remindersCancelled).toBe(true);
    expect(store.size).toBe(0);

    vi.advanceTimersByTime(60 * 60_000);
    expect(events.map(event => event.type)).toEqual(["chain_cancelled"]);
  });

  it("reports a missing id", () => {
    expect(makeService().removeTask(5)).toBeUndefined();
  });

  it("removes a completed task without reminders to cancel", async () => {
    const service = makeService();
    await service.addTask(makeInput());
    vi.advanceTimersByTime(20 * 60_000);

    expect(service.removeTask(1)).toMatchObject({ remindersCancelled: false });
  });
});

// ============================================
// SYNC
// ============================================

describe("TaskService.syncFromCalendar", () => {
  it("fails when no calendar is configured", async () => {
    await expect(makeService().syncFromCalendar()).rejects.toThrow(CalendarError);
  });

  it("imports through the bridge", async () => {
    const bridge = makeBridge();
    bridge.pull.mockResolvedValue([
      {
        id: "evt-7",
        title: "Team lunch",
        description: null,
        start: new Date("2026-03-02T12:00:00Z"),
        end: new Date("2026-03-02T13:00:00Z"),
      },
    ]);

    const result = await makeService(bridge).syncFromCalendar();
    expect(result).toEqual({ imported: 1, skipped: 0 });
    expect(store.findByExternalId("evt-7")?.title).toBe("Team lunch");
  });
});
