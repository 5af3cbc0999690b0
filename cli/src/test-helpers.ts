/**
 * Shared test fixtures.
 */

import { vi } from "vitest";
import type { ILogger } from "@taskminder/shared/logging";
import { UNASSIGNED_TASK_ID, type OneOffTask, type RecurringTask } from "./types.js";

/** An ILogger whose methods are spies; children are the same logger. */
export function makeLog(): ILogger {
  const log: ILogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => log,
    getRecentLogs: () => [],
    flush: async () => {},
  };
  return log;
}

export function makeTask(overrides: Partial<OneOffTask> = {}): OneOffTask {
  return {
    id: UNASSIGNED_TASK_ID,
    title: "Write report",
    details: "Quarterly numbers",
    startTime: new Date("2026-03-01T10:00:00Z"),
    endTime: new Date("2026-03-01T11:00:00Z"),
    isRecurring: false,
    ...overrides,
  };
}

export function makeRecurringTask(overrides: Partial<RecurringTask> = {}): RecurringTask {
  return {
    id: UNASSIGNED_TASK_ID,
    title: "Stand up",
    details: "Stretch",
    startTime: new Date("2026-03-01T10:00:00Z"),
    endTime: new Date("2026-03-01T10:10:00Z"),
    isRecurring: true,
    frequencyMinutes: 60,
    ...overrides,
  };
}
