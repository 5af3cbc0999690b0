/**
 * Task Store
 *
 * In-memory id → Task map with a monotonic id counter. Every operation is
 * synchronous, so id assignment and insertion are a single step on the
 * event loop and no operation ever spans a scheduler suspension.
 */

import { cloneTask, UNASSIGNED_TASK_ID, type Task } from "../types.js";

// ============================================
// CONSTANTS
// ============================================

const FIRST_TASK_ID = 1;

// ============================================
// STORE
// ============================================

export class TaskStore {
  private readonly tasks = new Map<number, Task>();
  /** Event ids of imported tasks the user removed */
  private readonly removedExternalIds = new Set<string>();
  private nextId = FIRST_TASK_ID;

  /**
   * Store a copy of `task` under the next id and return that id. Ids are
   * never reused, even after removal.
   */
  add(task: Task): number {
    if (!Number.isSafeInteger(this.nextId)) {
      throw new RangeError("Task id space exhausted");
    }
    const id = this.nextId++;
    this.tasks.set(id, { ...cloneTask(task), id });
    return id;
  }

  /** Snapshot of every stored task, sorted by id. */
  list(): Task[] {
    return [...this.tasks.values()]
      .sort((a, b) => a.id - b.id)
      .map(task => cloneTask(task));
  }

  get(id: number): Task | undefined {
    const task = this.tasks.get(id);
    return task ? cloneTask(task) : undefined;
  }

  findByExternalId(externalId: string): Task | undefined {
    for (const task of this.tasks.values()) {
      if (task.externalId === externalId) return cloneTask(task);
    }
    return undefined;
  }

  /** Delete and return the task, or `undefined` if no task has this id. */
  remove(id: number): Task | undefined {
    if (id === UNASSIGNED_TASK_ID) return undefined;
    const task = this.tasks.get(id);
    if (!task) return undefined;
    this.tasks.delete(id);
    if (task.externalId !== undefined) this.removedExternalIds.add(task.externalId);
    return task;
  }

  /** Whether a task imported from this event was stored and later removed. */
  wasRemoved(externalId: string): boolean {
    return this.removedExternalIds.has(externalId);
  }

  get size(): number {
    return this.tasks.size;
  }
}
