import { createTimer, type TimerOptions } from "./composition/container";
import {
  TimerVariants,
  type BasicArgs,
  type CountArgs,
  type DelayArgs,
  type ScheduleArgs,
  type StopwatchArgs,
} from "./domain/timers/TimerVariant";

export const Timers = {
  basic: (args: BasicArgs = {}, options?: TimerOptions) => createTimer(TimerVariants.basic(args), options),
  stopwatch: (args: StopwatchArgs = {}, options?: TimerOptions) =>
    createTimer(TimerVariants.stopwatch(args), options),
  countdown: (args: CountArgs, options?: TimerOptions) => createTimer(TimerVariants.countdown(args), options),
  countUp: (args: CountArgs, options?: TimerOptions) => createTimer(TimerVariants.countUp(args), options),
  delay: (args: DelayArgs, options?: TimerOptions) => createTimer(TimerVariants.delay(args), options),
  schedule: (args: ScheduleArgs, options?: TimerOptions) => createTimer(TimerVariants.schedule(args), options),
} as const;

export { createTimer, loadRuntimeSettings, type TimerOptions } from "./composition/container";
export { Timer, type TimerDependencies } from "./app/Timer";
export type { TimerObserver } from "./app/TimerObserver";
export { TimerEventRelay, type TimerNotification } from "./app/TimerEventRelay";
export {
  TimerState,
  TimerStates,
  canReset,
  canStart,
  canStop,
  type TimerStateValue,
} from "./domain/timers/TimerState";
export {
  createTimerEvent,
  firingRate,
  isOfKind,
  type TimerEvent,
  type TimerEventCallback,
  type TimerEventKind,
} from "./domain/timers/TimerEvent";
export {
  defaultShouldFinish,
  defaultShouldTick,
  shouldFinish,
  shouldTick,
  type TimerPredicate,
  type TimerSnapshot,
} from "./domain/timers/TickPolicy";
export {
  DISTANT_FUTURE,
  DISTANT_PAST,
  createSchedulePolicy,
  isScheduleOver,
  isScheduledMoment,
  type Frequency,
  type ScheduleWindow,
} from "./domain/timers/Schedule";
export {
  DEFAULT_INTERVAL_SECONDS,
  TimerVariants,
  configureTimer,
  validateVariant,
  type BasicArgs,
  type ConfigurableTimer,
  type CountArgs,
  type DelayArgs,
  type ScheduleArgs,
  type StopwatchArgs,
  type TimerVariant,
  type TimerVariantKind,
} from "./domain/timers/TimerVariant";
export { TimerConfigurationError } from "./domain/timers/TimerConfigurationError";
export { Topics, type EventBus, type Subscription } from "./domain/events/EventBus";
export type { AdvanceHandler, ClockDriverPort } from "./ports/sys/ClockDriverPort";
export type { LogLevel, LoggerPort } from "./ports/sys/LoggerPort";
export type { TimePort } from "./ports/sys/TimePort";
export { IntervalClockDriver, DEFAULT_FRAME_RATE } from "./adapters/sys/IntervalClockDriver";
export { ManualClockDriver } from "./adapters/sys/ManualClockDriver";
export { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
export { NodeTime } from "./adapters/sys/NodeTime";
export { SimpleEventBus } from "./adapters/sys/SimpleEventBus";
