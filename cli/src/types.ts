/**
 * Shared types for the task store, scheduler and calendar bridge.
 */

// ============================================
// TASK
// ============================================

/** Placeholder id carried by a task before the store assigns one. */
export const UNASSIGNED_TASK_ID = 0;

interface TaskBase {
  /** Assigned by the store; 0 until inserted */
  id: number;
  title: string;
  details: string;
  startTime: Date;
  endTime: Date;
  /** Calendar event this task was imported from (sync merge key) */
  externalId?: string;
}

export interface OneOffTask extends TaskBase {
  isRecurring: false;
}

export interface RecurringTask extends TaskBase {
  isRecurring: true;
  /** Minutes between successive occurrence start times */
  frequencyMinutes: number;
}

export type Task = OneOffTask | RecurringTask;

/** Raw `add` input before validation. */
export interface NewTaskInput {
  title: string;
  details: string;
  start: string;
  end: string;
  recurring: boolean;
  frequencyMinutes?: string;
}

export function cloneTask<T extends Task>(task: T): T {
  return {
    ...task,
    startTime: new Date(task.startTime.getTime()),
    endTime: new Date(task.endTime.getTime()),
  };
}
