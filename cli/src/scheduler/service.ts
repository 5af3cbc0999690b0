/**
 * Reminder Scheduler — Service (Lifecycle Orchestrator)
 *
 * Owns the timer wheel, the live activities and event emission. Each stored
 * task handed to `schedule()` gets its own activity; recurring activities
 * hand their chain to a fresh activity when the successor is inserted.
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@taskminder/shared/logging";
import { SchedulingError } from "../core/errors.js";
import { createComponentLogger } from "../logging.js";
import type { TaskStore } from "../tasks/store.js";
import { UNASSIGNED_TASK_ID, type Task } from "../types.js";
import type { Clock } from "./clock.js";
import { ReminderActivity, type ActivityContext } from "./reminders.js";
import { TimerWheel } from "./timer.js";
import {
  DEFAULT_REMINDER_CONFIG,
  type ActivitySnapshot,
  type ReminderEvent,
  type ReminderEventListener,
  type ReminderSchedulerConfig,
  type SchedulerStatus,
} from "./types.js";

export interface ReminderSchedulerOptions {
  store: TaskStore;
  config?: Partial<ReminderSchedulerConfig>;
  clock?: Clock;
  log?: ILogger;
  /** Supply a wheel to share it; otherwise one is built on `clock` */
  wheel?: TimerWheel;
}

export class ReminderScheduler {
  private readonly store: TaskStore;
  private readonly config: ReminderSchedulerConfig;
  private readonly log: ILogger;
  private readonly wheel: TimerWheel;
  /** Live activities by the task id they currently track */
  private readonly activities = new Map<number, ReminderActivity>();
  private readonly listeners: ReminderEventListener[] = [];
  private readonly context: ActivityContext;

  constructor(options: ReminderSchedulerOptions) {
    this.store = options.store;
    this.config = { ...DEFAULT_REMINDER_CONFIG, ...options.config };
    this.log = options.log ?? createComponentLogger("scheduler");
    this.wheel = options.wheel ?? new TimerWheel({ clock: options.clock, log: this.log });
    this.context = {
      wheel: this.wheel,
      store: this.store,
      config: this.config,
      log: this.log,
      emit: event => this.emitEvent(event),
      launch: (task, chainId) => this.launch(task, chainId),
      retire: activity => this.retire(activity),
    };
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  start(): void {
    if (this.wheel.isRunning) {
      this.log.warn("Reminder scheduler already running");
      return;
    }
    this.wheel.start();
    this.log.info("Reminder scheduler started", {
      startLeadMinutes: this.config.startLeadMinutes,
      endLeadMinutes: this.config.endLeadMinutes,
    });
  }

  /** Disarm the wheel and drop every activity without notifications. */
  stop(): void {
    if (!this.wheel.isRunning) return;
    for (const activity of this.activities.values()) {
      activity.cancel();
    }
    this.activities.clear();
    this.wheel.stop();
    this.log.info("Reminder scheduler stopped");
  }

  get isRunning(): boolean {
    return this.wheel.isRunning;
  }

  // ============================================
  // PUBLIC API
  // ============================================

  /**
   * Launch the reminder lifecycle for a stored task. Returns the chain id
   * that will follow the task and every successor it produces.
   */
  schedule(task: Task): string {
    if (task.id === UNASSIGNED_TASK_ID) {
      throw new SchedulingError(`Task '${task.title}' has no id; add it to the store first`);
    }
    if (this.activities.has(task.id)) {
      throw new SchedulingError(`Task ${task.id} already has reminders scheduled`);
    }

    const chainId = `chain_${nanoid(8)}`;
    this.launch(task, chainId);
    return chainId;
  }

  /**
   * Cancel the live activity tracking `taskId`. Returns false if no activity
   * tracks it (never scheduled, already finished, or moved to a successor).
   */
  cancel(taskId: number): boolean {
    const activity = this.activities.get(taskId);
    if (!activity) return false;

    this.activities.delete(taskId);
    if (!activity.cancel()) return false;

    this.emitEvent({
      type: "chain_cancelled",
      chainId: activity.chainId,
      task: activity.trackedTask(),
      timestamp: new Date(this.wheel.now()),
    });
    return true;
  }

  /** Register a listener. Returns a function that removes it. */
  onEvent(listener: ReminderEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) this.listeners.splice(index, 1);
    };
  }

  getActivity(taskId: number): ActivitySnapshot | undefined {
    return this.activities.get(taskId)?.snapshot();
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.wheel.isRunning,
      pendingTimers: this.wheel.pendingCount,
      activities: [...this.activities.values()]
        .map(activity => activity.snapshot())
        .sort((a, b) => a.taskId - b.taskId),
    };
  }

  // ============================================
  // ACTIVITIES
  // ============================================

  private launch(task: Task, chainId: string): void {
    const activity = new ReminderActivity(task, chainId, this.context);
    this.activities.set(task.id, activity);
    activity.begin();
  }

  private retire(activity: ReminderActivity): void {
    if (this.activities.get(activity.taskId) === activity) {
      this.activities.delete(activity.taskId);
    }
  }

  // ============================================
  // EVENT EMISSION
  // ============================================

  private emitEvent(event: ReminderEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.log.error("Reminder event listener error", error, { type: event.type });
      }
    }
  }
}
