export type TimerStateValue = "NEW" | "ACTIVE" | "INACTIVE" | "FINISHED";

export const TimerStates = {
  New: "NEW",
  Active: "ACTIVE",
  Inactive: "INACTIVE",
  Finished: "FINISHED",
} as const satisfies Record<string, TimerStateValue>;

/** A timer can start when it is brand new or has been stopped. */
export function canStart(state: TimerStateValue): boolean {
  return state === "NEW" || state === "INACTIVE";
}

export function canStop(state: TimerStateValue): boolean {
  return state === "ACTIVE";
}

/** Reset is accepted from every state, NEW included. */
export function canReset(_state: TimerStateValue): boolean {
  return true;
}

export class TimerState {
  private current: TimerStateValue = "NEW";

  get value(): TimerStateValue {
    return this.current;
  }

  get canStart(): boolean {
    return canStart(this.current);
  }

  get canStop(): boolean {
    return canStop(this.current);
  }

  get canReset(): boolean {
    return canReset(this.current);
  }

  toNew() {
    this.current = "NEW";
  }

  toActive() {
    this.current = "ACTIVE";
  }

  toInactive() {
    this.current = "INACTIVE";
  }

  toFinished() {
    this.current = "FINISHED";
  }
}
