export type TimerEventKind = "tick" | "finish";

/** Metadata captured at the moment a timer fires. */
export interface TimerEvent {
  readonly kind: TimerEventKind;
  /** Epoch milliseconds at which the event fired. */
  readonly timestamp: number;
  /** Seconds since the previous event of the same kind (or since the timer began). */
  readonly deltaTime: number;
  /** Total seconds the timer had run when the event fired. */
  readonly timerLifetime: number;
  /** How many events of this kind the timer has fired, this one included. */
  readonly timesFired: number;
}

export type TimerEventCallback = (event: TimerEvent) => void;

export function createTimerEvent(fields: TimerEvent): TimerEvent {
  const { kind, timestamp, deltaTime, timerLifetime, timesFired } = fields;
  return Object.freeze({ kind, timestamp, deltaTime, timerLifetime, timesFired });
}

export function isOfKind(event: TimerEvent, kind: TimerEventKind): boolean {
  return event.kind === kind;
}

/** Events per second over the timer's lifetime. */
export function firingRate(event: TimerEvent): number {
  if (event.timerLifetime <= 0) return 0;
  return event.timesFired / event.timerLifetime;
}
