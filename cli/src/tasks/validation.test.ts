/**
 * Validation Tests
 *
 * Covers:
 * - Timestamp parsing: offsets, missing offset as UTC, fractions, bad input
 * - Frequency parsing
 * - buildTask: every rejection rule and the two task shapes
 */

import { describe, it, expect } from "vitest";
import { buildTask, parseFrequencyMinutes, parseTimestamp } from "./validation.js";
import { ValidationError } from "../core/errors.js";
import type { NewTaskInput } from "../types.js";

const NOW = Date.parse("2026-03-01T09:00:00Z");

function makeInput(overrides: Partial<NewTaskInput> = {}): NewTaskInput {
  return {
    title: "Review PR",
    details: "Scheduler changes",
    start: "2026-03-01T10:00:00Z",
    end: "2026-03-01T10:30:00Z",
    recurring: false,
    ...overrides,
  };
}

// ============================================
// TIMESTAMPS
// ============================================

describe("parseTimestamp", () => {
  it("parses a UTC timestamp", () => {
    expect(parseTimestamp("2026-03-01T10:00:00Z", "start time").toISOString())
      .toBe("2026-03-01T10:00:00.000Z");
  });

  it("reads a timestamp without an offset as UTC", () => {
    expect(parseTimestamp("2026-03-01T10:00:00", "start time").toISOString())
      .toBe("2026-03-01T10:00:00.000Z");
  });

  it("accepts a space separator and omitted seconds", () => {
    expect(parseTimestamp("2026-03-01 10:00", "start time").toISOString())
      .toBe("2026-03-01T10:00:00.000Z");
  });

  it("applies numeric offsets with and without a colon", () => {
    expect(parseTimestamp("2026-03-01T15:30:00+05:30", "start time").toISOString())
      .toBe("2026-03-01T10:00:00.000Z");
    expect(parseTimestamp("2026-03-01T15:30:00+0530", "start time").toISOString())
      .toBe("2026-03-01T10:00:00.000Z");
    expect(parseTimestamp("2026-03-01T05:00:00-05:00", "start time").toISOString())
      .toBe("2026-03-01T10:00:00.000Z");
  });

  it("keeps millisecond fractions", () => {
    expect(parseTimestamp("2026-03-01T10:00:00.5Z", "end time").toISOString())
      .toBe("2026-03-01T10:00:00.500Z");
    expect(parseTimestamp("2026-03-01T10:00:00.123456Z", "end time").toISOString())
      .toBe("2026-03-01T10:00:00.123Z");
  });

  it("rejects text that is not a timestamp", () => {
    expect(() => parseTimestamp("tomorrow", "start time")).toThrow(
      'Invalid start time "tomorrow". Use ISO 8601 format, e.g. 2026-12-31T15:00:00Z',
    );
  });

  it("rejects dates that don't exist", () => {
    expect(() => parseTimestamp("2026-02-30T10:00:00Z", "start time")).toThrow(
      'Invalid start time "2026-02-30T10:00:00Z": not a real date-time',
    );
    expect(() => parseTimestamp("2026-03-01T24:00:00Z", "end time")).toThrow(ValidationError);
  });

  it("accepts leap days only in leap years", () => {
    expect(parseTimestamp("2028-02-29T00:00:00Z", "start time").toISOString())
      .toBe("2028-02-29T00:00:00.000Z");
    expect(() => parseTimestamp("2027-02-29T00:00:00Z", "start time")).toThrow(ValidationError);
  });
});

// ============================================
// FREQUENCY
// ============================================

describe("parseFrequencyMinutes", () => {
  it("parses a positive whole number", () => {
    expect(parseFrequencyMinutes(" 60 ")).toBe(60);
  });

  it("rejects zero", () => {
    expect(() => parseFrequencyMinutes("0")).toThrow(
      'Invalid frequency "0": must be a positive number of minutes',
    );
  });

  it("rejects fractions and signs", () => {
    expect(() => parseFrequencyMinutes("1.5")).toThrow(
      'Invalid frequency "1.5": expected a whole number of minutes',
    );
    expect(() => parseFrequencyMinutes("-5")).toThrow(ValidationError);
  });
});

// ============================================
// BUILD TASK
// ============================================

describe("buildTask", () => {
  it("builds an unassigned one-off task", () => {
    const task = buildTask(makeInput({ title: "  Review PR  " }), NOW);
    expect(task).toEqual({
      id: 0,
      title: "Review PR",
      details: "Scheduler changes",
      startTime: new Date("2026-03-01T10:00:00Z"),
      endTime: new Date("2026-03-01T10:30:00Z"),
      isRecurring: false,
    });
  });

  it("builds a recurring task with its frequency", () => {
    const task = buildTask(makeInput({ recurring: true, frequencyMinutes: "60" }), NOW);
    expect(task.isRecurring).toBe(true);
    expect(task.isRecurring && task.frequencyMinutes).toBe(60);
  });

  it("rejects an empty title", () => {
    expect(() => buildTask(makeInput({ title: "   " }), NOW)).toThrow("Title must not be empty.");
  });

  it("rejects a start time that is not strictly in the future", () => {
    expect(() => buildTask(makeInput({ start: "2026-03-01T09:00:00Z" }), NOW))
      .toThrow("Start time must be in the future.");
    expect(() => buildTask(makeInput({ start: "2026-03-01T08:00:00Z" }), NOW))
      .toThrow("Start time must be in the future.");
  });

  it("rejects an end time that is not after the start", () => {
    expect(() => buildTask(makeInput({ end: "2026-03-01T10:00:00Z" }), NOW))
      .toThrow("End time must be after the start time.");
    expect(() => buildTask(makeInput({ end: "2026-03-01T09:30:00Z" }), NOW))
      .toThrow("End time must be after the start time.");
  });

  it("rejects a recurring task without a frequency", () => {
    expect(() => buildTask(makeInput({ recurring: true }), NOW))
      .toThrow("Recurring tasks need a frequency in minutes.");
  });

  it("rejects a frequency on a non-recurring task", () => {
    expect(() => buildTask(makeInput({ frequencyMinutes: "60" }), NOW))
      .toThrow("A frequency was given but the task is not recurring (add --recurring).");
  });

  it("reports a malformed timestamp with its field name", () => {
    expect(() => buildTask(makeInput({ end: "later" }), NOW))
      .toThrow('Invalid end time "later"');
  });
});
