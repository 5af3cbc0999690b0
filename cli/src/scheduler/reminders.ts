/**
 * Reminder Activity — one task instance's reminder lifecycle.
 *
 *   created → awaiting_start_reminder → awaiting_end_reminder
 *           → awaiting_completion → completed → terminal | awaiting_successor
 *
 * Each suspension is a single timer-wheel job; the activity never holds more
 * than one. A point that is already behind the clock is skipped without a
 * notification. Completion is always announced. For a recurring task the
 * activity then waits for the successor's start, inserts it into the store
 * and hands a fresh activity to the scheduler, so chains grow by enqueueing
 * jobs rather than by nesting calls.
 */

import type { ILogger } from "@taskminder/shared/logging";
import { describeError } from "../core/errors.js";
import type { TaskStore } from "../tasks/store.js";
import { cloneTask, type Task } from "../types.js";
import { nextOccurrence } from "./recurrence.js";
import type { JobHandle, TimerWheel } from "./timer.js";
import type {
  ActivitySnapshot,
  ActivityState,
  ReminderEvent,
  ReminderSchedulerConfig,
} from "./types.js";

const MS_PER_MINUTE = 60_000;

/** What an activity needs from the scheduler that owns it. */
export interface ActivityContext {
  wheel: TimerWheel;
  store: TaskStore;
  config: ReminderSchedulerConfig;
  log: ILogger;
  emit(event: ReminderEvent): void;
  /** Start an activity for a freshly inserted successor in the same chain. */
  launch(task: Task, chainId: string): void;
  /** Forget a finished activity. */
  retire(activity: ReminderActivity): void;
}

export class ReminderActivity {
  readonly chainId: string;
  private readonly task: Task;
  private readonly ctx: ActivityContext;
  private readonly log: ILogger;
  private state: ActivityState = "created";
  private pending: JobHandle | null = null;

  constructor(task: Task, chainId: string, ctx: ActivityContext) {
    this.task = cloneTask(task);
    this.chainId = chainId;
    this.ctx = ctx;
    this.log = ctx.log.child({ chainId, taskId: task.id });
  }

  get taskId(): number {
    return this.task.id;
  }

  get currentState(): ActivityState {
    return this.state;
  }

  trackedTask(): Task {
    return cloneTask(this.task);
  }

  begin(): void {
    if (this.state !== "created") return;
    this.log.debug("Activity started", {
      title: this.task.title,
      startTime: this.task.startTime,
      endTime: this.task.endTime,
    });
    this.awaitStartReminder();
  }

  /**
   * Stop the activity: drop its pending job so no further notification
   * fires and no successor is inserted. Returns false if it already ended.
   */
  cancel(): boolean {
    if (this.isFinished()) return false;
    if (this.pending) {
      this.ctx.wheel.cancel(this.pending);
      this.pending = null;
    }
    this.state = "cancelled";
    this.log.info("Activity cancelled");
    return true;
  }

  snapshot(): ActivitySnapshot {
    return {
      taskId: this.task.id,
      chainId: this.chainId,
      title: this.task.title,
      state: this.state,
      nextFireAt: this.pending ? new Date(this.pending.fireAt) : null,
    };
  }

  // ----------------------------------------
  // State transitions
  // ----------------------------------------

  private awaitStartReminder(): void {
    this.state = "awaiting_start_reminder";
    const lead = this.ctx.config.startLeadMinutes;
    const fireAt = this.task.startTime.getTime() - lead * MS_PER_MINUTE;

    this.suspendUntilOrSkip(fireAt, "start-reminder", () => {
      this.emit({ ...this.envelope(), type: "start_reminder", leadMinutes: lead });
    }, () => this.awaitEndReminder());
  }

  private awaitEndReminder(): void {
    this.state = "awaiting_end_reminder";
    const lead = this.ctx.config.endLeadMinutes;
    const fireAt = this.task.endTime.getTime() - lead * MS_PER_MINUTE;

    this.suspendUntilOrSkip(fireAt, "end-reminder", () => {
      this.emit({ ...this.envelope(), type: "end_reminder", leadMinutes: lead });
    }, () => this.awaitCompletion());
  }

  private awaitCompletion(): void {
    this.state = "awaiting_completion";
    // The completion notification itself is never skipped, only the wait
    this.suspendUntilOrSkip(this.task.endTime.getTime(), "completion", () => {}, () => this.complete());
  }

  private complete(): void {
    this.state = "completed";
    this.emit({ ...this.envelope(), type: "task_complete" });
    // A listener may have cancelled us
    if (this.isFinished()) return;

    if (!this.task.isRecurring) {
      this.finish("terminal");
      return;
    }

    let successor: Task;
    try {
      successor = nextOccurrence(this.task);
    } catch (error) {
      this.fail(error);
      return;
    }

    this.state = "awaiting_successor";
    // Always go through the wheel, even when the start already passed, so
    // the successor never runs inside this activity's call stack
    const fireAt = Math.max(successor.startTime.getTime(), this.ctx.wheel.now());
    this.pending = this.ctx.wheel.schedule(fireAt, `successor:${this.chainId}`, () => {
      this.pending = null;
      this.insertSuccessor(successor);
    });
    this.log.debug("Waiting for next occurrence", { startTime: successor.startTime });
  }

  private insertSuccessor(successor: Task): void {
    if (this.state !== "awaiting_successor") return;

    let stored: Task;
    try {
      stored = { ...successor, id: this.ctx.store.add(successor) };
    } catch (error) {
      this.fail(error);
      return;
    }

    // Retire first: from here on the chain belongs to the successor id
    this.finish("terminal");
    this.emit({ ...this.envelope(), type: "occurrence_scheduled", successor: cloneTask(stored) });

    if (!this.ctx.store.get(stored.id)) {
      this.log.info("Successor removed before its reminders started", { successorId: stored.id });
      return;
    }
    this.ctx.launch(stored, this.chainId);
  }

  // ----------------------------------------
  // Helpers
  // ----------------------------------------

  /**
   * If `fireAt` is strictly ahead of the clock, suspend until it, run
   * `onFire`, then `next`. Otherwise go straight to `next` without `onFire`.
   */
  private suspendUntilOrSkip(
    fireAt: number,
    label: string,
    onFire: () => void,
    next: () => void,
  ): void {
    if (fireAt <= this.ctx.wheel.now()) {
      this.log.debug("Skipping point already passed", { point: label, fireAt: new Date(fireAt) });
      next();
      return;
    }

    this.pending = this.ctx.wheel.schedule(fireAt, `${label}:${this.task.id}`, () => {
      this.pending = null;
      if (this.isFinished()) return;
      onFire();
      if (this.isFinished()) return;
      next();
    });
  }

  private envelope(): { chainId: string; task: Task; timestamp: Date } {
    return {
      chainId: this.chainId,
      task: cloneTask(this.task),
      timestamp: new Date(this.ctx.wheel.now()),
    };
  }

  private emit(event: ReminderEvent): void {
    if (this.state === "cancelled") return;
    this.ctx.emit(event);
  }

  private fail(error: unknown): void {
    this.log.error("Recurrence chain stopped", error);
    this.finish("failed");
    this.emit({
      ...this.envelope(),
      type: "chain_failed",
      error: describeError(error, "Could not schedule the next occurrence"),
    });
  }

  private finish(state: "terminal" | "failed"): void {
    if (this.state === "cancelled") return;
    this.state = state;
    this.ctx.retire(this);
  }

  private isFinished(): boolean {
    return this.state === "terminal" || this.state === "failed" || this.state === "cancelled";
  }
}
