/**
 * Clock — the scheduler's only view of wall-clock time.
 *
 * `now()` reads the current instant; `setTimer`/`clearTimer` are the
 * primitive the timer wheel suspends on. Tests swap in Vitest's fake timers,
 * which patch the globals this default implementation calls.
 */

export type TimerHandle = ReturnType<typeof setTimeout>;

export interface Clock {
  /** Current instant in epoch milliseconds */
  now(): number;
  setTimer(callback: () => void, delayMs: number): TimerHandle;
  clearTimer(handle: TimerHandle): void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  setTimer: (callback, delayMs) => setTimeout(callback, delayMs),
  clearTimer: handle => clearTimeout(handle),
};

/** Delay until `instant`, never negative. */
export function delayUntil(clock: Clock, instant: number): number {
  return Math.max(0, instant - clock.now());
}
