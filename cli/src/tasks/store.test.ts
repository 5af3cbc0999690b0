/**
 * Task Store Tests
 *
 * Covers:
 * - Id assignment: starts at 1, strictly increasing, never reused
 * - Copies: stored tasks and listed tasks are isolated from callers
 * - Lookup: get, findByExternalId
 * - Removal: found, not found, placeholder id
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TaskStore } from "./store.js";
import { UNASSIGNED_TASK_ID } from "../types.js";
import { makeTask } from "../test-helpers.js";

let store: TaskStore;

beforeEach(() => {
  store = new TaskStore();
});

// ============================================
// ID ASSIGNMENT
// ============================================

describe("TaskStore.add", () => {
  it("assigns ids starting at 1", () => {
    expect(store.add(makeTask())).toBe(1);
    expect(store.add(makeTask())).toBe(2);
    expect(store.size).toBe(2);
  });

  it("ignores the id carried by the input", () => {
    const id = store.add(makeTask({ id: 42 }));
    expect(id).toBe(1);
    expect(store.get(42)).toBeUndefined();
    expect(store.get(1)?.id).toBe(1);
  });

  it("never reuses an id after removal", () => {
    store.add(makeTask());
    const second = store.add(makeTask());
    store.remove(second);
    expect(store.add(makeTask())).toBe(3);
  });

  it("gives back-to-back adds distinct ids", async () => {
    const ids = await Promise.all([
      Promise.resolve().then(() => store.add(makeTask({ title: "a" }))),
      Promise.resolve().then(() => store.add(makeTask({ title: "b" }))),
    ]);
    expect(new Set(ids).size).toBe(2);
    expect(store.list().map(t => t.id)).toEqual([1, 2]);
  });

  it("stores a copy of the task", () => {
    const task = makeTask();
    const id = store.add(task);
    task.title = "changed";
    task.startTime.setUTCFullYear(2030);

    const stored = store.get(id);
    expect(stored?.title).toBe("Write report");
    expect(stored?.startTime.toISOString()).toBe("2026-03-01T10:00:00.000Z");
  });
});

// ============================================
// LISTING & LOOKUP
// ============================================

describe("TaskStore.list", () => {
  it("returns tasks sorted by id", () => {
    store.add(makeTask({ title: "first" }));
    store.add(makeTask({ title: "second" }));
    store.add(makeTask({ title: "third" }));
    store.remove(2);

    expect(store.list().map(t => [t.id, t.title])).toEqual([
      [1, "first"],
      [3, "third"],
    ]);
  });

  it("returns copies that don't write through", () => {
    store.add(makeTask());
    const [listed] = store.list();
    listed.title = "mutated";
    listed.endTime.setUTCHours(23);

    const again = store.get(1);
    expect(again?.title).toBe("Write report");
    expect(again?.endTime.toISOString()).toBe("2026-03-01T11:00:00.000Z");
  });

  it("is empty for a new store", () => {
    expect(store.list()).toEqual([]);
  });
});

describe("TaskStore.findByExternalId", () => {
  it("finds an imported task by its event id", () => {
    store.add(makeTask());
    store.add(makeTask({ title: "Standup", externalId: "evt-1" }));

    expect(store.findByExternalId("evt-1")?.id).toBe(2);
    expect(store.findByExternalId("evt-2")).toBeUndefined();
  });
});

// ============================================
// REMOVAL
// ============================================

describe("TaskStore.remove", () => {
  it("returns the removed task", () => {
    store.add(makeTask());
    const removed = store.remove(1);
    expect(removed?.title).toBe("Write report");
    expect(store.size).toBe(0);
  });

  it("returns undefined for a missing id and leaves the store unchanged", () => {
    store.add(makeTask());
    expect(store.remove(99)).toBeUndefined();
    expect(store.size).toBe(1);
  });

  it("remembers the event id of a removed import", () => {
    store.add(makeTask({ externalId: "evt-1" }));
    store.add(makeTask({ title: "Local" }));
    expect(store.wasRemoved("evt-1")).toBe(false);

    store.remove(1);
    store.remove(2);
    expect(store.wasRemoved("evt-1")).toBe(true);
    expect(store.findByExternalId("evt-1")).toBeUndefined();
  });

  it("never matches the unassigned placeholder id", () => {
    store.add(makeTask());
    expect(store.remove(UNASSIGNED_TASK_ID)).toBeUndefined();
    expect(store.size).toBe(1);
  });
});
