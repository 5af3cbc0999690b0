/**
 * Task Service
 *
 * The operations behind the CLI commands: validate and add, list, remove,
 * and calendar sync. Local state changes first; calendar push is a
 * best-effort follow-up whose failure comes back as a warning.
 */

import type { ILogger } from "@taskminder/shared/logging";
import type { CalendarBridge } from "../calendar/bridge.js";
import { syncFromCalendar, type SyncResult } from "../calendar/sync.js";
import { CalendarError, describeError } from "../core/errors.js";
import { createComponentLogger } from "../logging.js";
import type { ReminderScheduler } from "../scheduler/index.js";
import type { NewTaskInput, Task } from "../types.js";
import type { TaskStore } from "./store.js";
import { buildTask } from "./validation.js";

export interface AddTaskResult {
  task: Task;
  chainId: string;
  /** Set when the calendar push failed; the task stays added */
  calendarWarning?: string;
  /** Created event id when the push succeeded */
  eventId?: string;
}

export interface RemoveTaskResult {
  task: Task;
  /** Whether a live reminder activity was stopped */
  remindersCancelled: boolean;
}

export interface TaskServiceOptions {
  store: TaskStore;
  scheduler: ReminderScheduler;
  /** null when no calendar is configured */
  calendar?: CalendarBridge | null;
  /** Push newly added tasks to the calendar */
  pushOnAdd?: boolean;
  now?: () => number;
  log?: ILogger;
}

export class TaskService {
  private readonly store: TaskStore;
  private readonly scheduler: ReminderScheduler;
  private readonly calendar: CalendarBridge | null;
  private readonly pushOnAdd: boolean;
  private readonly now: () => number;
  private readonly log: ILogger;

  constructor(options: TaskServiceOptions) {
    this.store = options.store;
    this.scheduler = options.scheduler;
    this.calendar = options.calendar ?? null;
    this.pushOnAdd = options.pushOnAdd ?? true;
    this.now = options.now ?? (() => Date.now());
    this.log = options.log ?? createComponentLogger("tasks");
  }

  get hasCalendar(): boolean {
    return this.calendar !== null;
  }

  /**
   * Validate, store and schedule a new task, then push it to the calendar if
   * one is configured. Throws ValidationError with the store unchanged.
   */
  async addTask(input: NewTaskInput): Promise<AddTaskResult> {
    const draft = buildTask(input, this.now());
    const id = this.store.add(draft);
    const task: Task = { ...draft, id };
    const chainId = this.scheduler.schedule(task);

    this.log.info("Task added", {
      taskId: id,
      chainId,
      recurring: task.isRecurring,
      startTime: task.startTime,
    });

    if (!this.calendar || !this.pushOnAdd) {
      return { task, chainId };
    }

    try {
      const pushed = await this.calendar.push(task);
      return { task, chainId, eventId: pushed.eventId };
    } catch (error) {
      this.log.warn("Calendar push failed; task kept locally", {
        taskId: id,
        error: error instanceof Error ? error.message : String(error),
      });
      return {
        task,
        chainId,
        calendarWarning: describeError(error, "Could not push the task to Google Calendar"),
      };
    }
  }

  listTasks(): Task[] {
    return this.store.list();
  }

  /** Remove a task and stop its reminders. Returns undefined if not found. */
  removeTask(id: number): RemoveTaskResult | undefined {
    const task = this.store.remove(id);
    if (!task) return undefined;

    const remindersCancelled = this.scheduler.cancel(id);
    this.log.info("Task removed", { taskId: id, remindersCancelled });
    return { task, remindersCancelled };
  }

  async syncFromCalendar(): Promise<SyncResult> {
    if (!this.calendar) {
      throw new CalendarError(
        "Google Calendar is not configured. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET.",
      );
    }
    return syncFromCalendar({
      bridge: this.calendar,
      store: this.store,
      scheduler: this.scheduler,
      now: this.now,
    });
  }
}
