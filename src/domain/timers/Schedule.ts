import type { TimerPredicate, TimerSnapshot } from "./TickPolicy";

/**
 * A frequency pattern: returns `true` when the moment `current` (epoch ms)
 * between `start` and `end` carries a scheduled event.
 */
export type Frequency = (current: number, start: number, end: number) => boolean;

/** Earliest instant a `Date` can represent, in epoch milliseconds. */
export const DISTANT_PAST = -8.64e15;

/** Latest instant a `Date` can represent, in epoch milliseconds. */
export const DISTANT_FUTURE = 8.64e15;

export interface ScheduleWindow {
  readonly start: number;
  readonly end: number;
  readonly frequency: Frequency;
}

export function isScheduledMoment(current: number, window: ScheduleWindow): boolean {
  if (current < window.start) return false;
  if (current >= window.end) return false;
  return window.frequency(current, window.start, window.end);
}

export function isScheduleOver(current: number, window: ScheduleWindow): boolean {
  return current >= window.end;
}

export interface SchedulePolicy {
  shouldTick: TimerPredicate;
  shouldFinish: TimerPredicate;
}

/**
 * Wall-clock predicates for a schedule. They read only `timer.now()` and never
 * the elapsed-time counters.
 */
export function createSchedulePolicy(window: ScheduleWindow): SchedulePolicy {
  return {
    shouldTick: (timer: TimerSnapshot) => isScheduledMoment(timer.now(), window),
    shouldFinish: (timer: TimerSnapshot) => isScheduleOver(timer.now(), window),
  };
}
