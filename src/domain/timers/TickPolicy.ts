/**
 * The view of a timer that tick/finish decisions are made from. Durations are
 * in seconds; `now()` returns epoch milliseconds.
 */
export interface TimerSnapshot {
  readonly interval?: number;
  readonly duration?: number;
  readonly elapsedTime: number;
  readonly elapsedSinceLastTick: number;
  readonly elapsedSinceLastFinish: number;
  now(): number;
}

export type TimerPredicate = (timer: TimerSnapshot) => boolean;

export function defaultShouldTick(timer: TimerSnapshot): boolean {
  return timer.interval !== undefined && timer.elapsedSinceLastTick >= timer.interval;
}

export function defaultShouldFinish(timer: TimerSnapshot): boolean {
  return timer.duration !== undefined && timer.elapsedSinceLastFinish >= timer.duration;
}

/** A custom predicate, when present, replaces the default rule outright. */
export function shouldTick(timer: TimerSnapshot, custom?: TimerPredicate): boolean {
  return (custom ?? defaultShouldTick)(timer);
}

export function shouldFinish(timer: TimerSnapshot, custom?: TimerPredicate): boolean {
  return (custom ?? defaultShouldFinish)(timer);
}
