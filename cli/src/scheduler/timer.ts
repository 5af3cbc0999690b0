/**
 * Timer Wheel
 *
 * Every suspension in the scheduler is a job on this wheel. Jobs live in one
 * min-heap keyed by fire instant and a single setTimeout is armed for the
 * earliest of them. Re-armed after every mutation and after each batch.
 */

import type { ILogger } from "@taskminder/shared/logging";
import { createComponentLogger } from "../logging.js";
import { systemClock, delayUntil, type Clock, type TimerHandle } from "./clock.js";
import { JobQueue, type TimerJob } from "./job-queue.js";

/** Maximum delay for setTimeout (Node.js limit: ~24.8 days) */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Heap size below which cancelled jobs are left to drain off the top */
const COMPACT_MIN_SIZE = 32;

export interface JobHandle {
  readonly fireAt: number;
  readonly label: string;
}

export interface TimerWheelOptions {
  clock?: Clock;
  log?: ILogger;
}

export class TimerWheel {
  private readonly clock: Clock;
  private readonly log: ILogger;
  private readonly queue = new JobQueue();
  private readonly handles = new WeakMap<JobHandle, TimerJob>();
  private timer: TimerHandle | null = null;
  private armedFor: number | null = null;
  private running = false;
  private draining = false;
  private seq = 0;
  private live = 0;

  constructor(options: TimerWheelOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.log = options.log ?? createComponentLogger("timer");
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Jobs scheduled and not yet run or cancelled. */
  get pendingCount(): number {
    return this.live;
  }

  /** Heap entries, including cancelled jobs not yet discarded. */
  get queuedCount(): number {
    return this.queue.size;
  }

  now(): number {
    return this.clock.now();
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.arm();
  }

  /** Disarm the timer and drop every pending job. */
  stop(): void {
    this.running = false;
    this.disarm();
    for (let job = this.queue.pop(); job; job = this.queue.pop()) {
      job.cancelled = true;
    }
    this.live = 0;
  }

  /**
   * Run `run` at `fireAt` (epoch ms). An instant already in the past runs on
   * the next timer tick.
   */
  schedule(fireAt: number, label: string, run: () => void): JobHandle {
    const job: TimerJob = { seq: ++this.seq, fireAt, label, run, cancelled: false };
    const handle: JobHandle = { fireAt, label };
    this.handles.set(handle, job);
    this.queue.push(job);
    this.live++;

    if (!this.draining && (this.armedFor === null || fireAt < this.armedFor)) {
      this.arm();
    }
    return handle;
  }

  cancel(handle: JobHandle): boolean {
    const job = this.handles.get(handle);
    if (!job || job.cancelled) return false;
    job.cancelled = true;
    this.handles.delete(handle);
    this.live--;
    this.compactIfSparse();
    return true;
  }

  /** Fire instant of the earliest live job, if any. */
  nextFireAt(): number | null {
    this.discardCancelledHead();
    return this.queue.peek()?.fireAt ?? null;
  }

  // ----------------------------------------
  // Internals
  // ----------------------------------------

  private discardCancelledHead(): void {
    let head = this.queue.peek();
    while (head?.cancelled) {
      this.queue.pop();
      head = this.queue.peek();
    }
  }

  /**
   * Cancelled jobs otherwise sit in the heap until they reach the top, which
   * for far-future reminders can be weeks.
   */
  private compactIfSparse(): void {
    const size = this.queue.size;
    if (size < COMPACT_MIN_SIZE || size - this.live <= this.live) return;
    const dropped = this.queue.removeCancelled();
    this.log.debug("Compacted timer queue", { dropped, remaining: this.queue.size });
  }

  private disarm(): void {
    if (this.timer !== null) {
      this.clock.clearTimer(this.timer);
      this.timer = null;
    }
    this.armedFor = null;
  }

  private arm(): void {
    this.disarm();
    if (!this.running) return;

    const nextDue = this.nextFireAt();
    if (nextDue === null) {
      this.log.trace("No pending jobs, timer idle");
      return;
    }

    const delayMs = Math.min(delayUntil(this.clock, nextDue), MAX_TIMEOUT_MS);
    this.armedFor = nextDue;
    this.timer = this.clock.setTimer(() => this.onTimer(), delayMs);
  }

  private onTimer(): void {
    this.timer = null;
    this.armedFor = null;
    this.draining = true;

    try {
      // Jobs enqueued while draining that are already due run in this batch
      let head = this.queue.peek();
      while (this.running && head && head.fireAt <= this.clock.now()) {
        this.queue.pop();
        if (!head.cancelled) {
          this.live--;
          this.runJob(head);
        }
        head = this.queue.peek();
      }
    } finally {
      this.draining = false;
    }

    this.arm();
  }

  private runJob(job: TimerJob): void {
    job.cancelled = true;
    try {
      job.run();
    } catch (error) {
      this.log.error("Timer job failed", error, { label: job.label });
    }
  }
}
