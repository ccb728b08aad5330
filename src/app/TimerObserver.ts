import type { TimerEvent } from "../domain/timers/TimerEvent";
import type { Timer } from "./Timer";

/**
 * Listener for a timer's lifecycle and events. A timer holds its observer
 * weakly: keeping the observer alive is the owner's job, and notifications to a
 * collected observer are skipped.
 */
export interface TimerObserver {
  didStart?(timer: Timer): void;
  didStop?(timer: Timer): void;
  didReset?(timer: Timer): void;
  didRestart?(timer: Timer): void;
  onTick?(event: TimerEvent, timer: Timer): void;
  onFinish?(event: TimerEvent, timer: Timer): void;
}
