import type { TimerEventCallback } from "./TimerEvent";
import type { TimerPredicate } from "./TickPolicy";
import { createSchedulePolicy, type Frequency } from "./Schedule";
import { TimerConfigurationError } from "./TimerConfigurationError";

export const DEFAULT_INTERVAL_SECONDS = 1.0;

/** A timer driven by hand: ticks every `interval` seconds and never finishes on its own. */
export interface BasicArgs {
  interval?: number;
  onTick?: TimerEventCallback;
  onFinish?: TimerEventCallback;
}

/** Runs indefinitely, or until an optional `timeout`. */
export interface StopwatchArgs {
  timeout?: number;
  onTimeout?: TimerEventCallback;
}

/** Counts `count` seconds at `interval` steps ("3, 2, 1, go"). */
export interface CountArgs {
  count: number;
  interval?: number;
  onCount: TimerEventCallback;
  onFinish?: TimerEventCallback;
}

/** Fires a single finish event after `delay` seconds. */
export interface DelayArgs {
  delay: number;
  onFinish: TimerEventCallback;
}

/** Fires along a frequency pattern between two wall-clock instants (epoch ms). */
export interface ScheduleArgs {
  start: number;
  end: number;
  frequency: Frequency;
  onSchedule: TimerEventCallback;
  onFinish?: TimerEventCallback;
}

export type TimerVariant =
  | ({ readonly kind: "basic" } & Readonly<BasicArgs>)
  | ({ readonly kind: "stopwatch" } & Readonly<StopwatchArgs>)
  | ({ readonly kind: "countdown" } & Readonly<CountArgs>)
  | ({ readonly kind: "countUp" } & Readonly<CountArgs>)
  | ({ readonly kind: "delay" } & Readonly<DelayArgs>)
  | ({ readonly kind: "schedule" } & Readonly<ScheduleArgs>);

export type TimerVariantKind = TimerVariant["kind"];

function freezeVariant(variant: TimerVariant): TimerVariant {
  return Object.freeze(variant);
}

export const TimerVariants = {
  basic: (args: BasicArgs = {}) => freezeVariant({ kind: "basic", ...args }),
  stopwatch: (args: StopwatchArgs = {}) => freezeVariant({ kind: "stopwatch", ...args }),
  countdown: (args: CountArgs) => freezeVariant({ kind: "countdown", ...args }),
  countUp: (args: CountArgs) => freezeVariant({ kind: "countUp", ...args }),
  delay: (args: DelayArgs) => freezeVariant({ kind: "delay", ...args }),
  schedule: (args: ScheduleArgs) => freezeVariant({ kind: "schedule", ...args }),
} as const;

/** The settable surface of a timer that a variant configures. */
export interface ConfigurableTimer {
  interval?: number;
  duration?: number;
  onTick?: TimerEventCallback;
  onFinish?: TimerEventCallback;
  customShouldTick?: TimerPredicate;
  customShouldFinish?: TimerPredicate;
}

export function configureTimer(timer: ConfigurableTimer, variant: TimerVariant): void {
  validateVariant(variant);

  switch (variant.kind) {
    case "basic":
      timer.interval = variant.interval ?? DEFAULT_INTERVAL_SECONDS;
      timer.onTick = variant.onTick;
      timer.onFinish = variant.onFinish;
      return;

    case "stopwatch":
      timer.duration = variant.timeout;
      timer.onFinish = variant.onTimeout;
      return;

    case "countdown":
    case "countUp":
      timer.interval = variant.interval ?? DEFAULT_INTERVAL_SECONDS;
      timer.duration = variant.count;
      timer.onTick = variant.onCount;
      timer.onFinish = variant.onFinish;
      return;

    case "delay":
      timer.interval = variant.delay;
      timer.duration = variant.delay;
      timer.onFinish = variant.onFinish;
      return;

    case "schedule": {
      const policy = createSchedulePolicy(variant);
      timer.customShouldTick = policy.shouldTick;
      timer.customShouldFinish = policy.shouldFinish;
      timer.onTick = variant.onSchedule;
      timer.onFinish = variant.onFinish;
      return;
    }
  }
}

/**
 * Checks a variant's fields at run time, since records may come from untyped
 * callers or parsed input. Throws `TimerConfigurationError` on the first problem.
 */
export function validateVariant(variant: TimerVariant): void {
  switch (variant.kind) {
    case "basic":
      optionalSeconds(variant.kind, "interval", variant.interval);
      optionalCallback(variant.kind, "onTick", variant.onTick);
      optionalCallback(variant.kind, "onFinish", variant.onFinish);
      return;

    case "stopwatch":
      optionalSeconds(variant.kind, "timeout", variant.timeout);
      optionalCallback(variant.kind, "onTimeout", variant.onTimeout);
      return;

    case "countdown":
    case "countUp":
      requiredSeconds(variant.kind, "count", variant.count);
      optionalSeconds(variant.kind, "interval", variant.interval);
      requiredCallback(variant.kind, "onCount", variant.onCount);
      optionalCallback(variant.kind, "onFinish", variant.onFinish);
      return;

    case "delay":
      requiredSeconds(variant.kind, "delay", variant.delay);
      requiredCallback(variant.kind, "onFinish", variant.onFinish);
      return;

    case "schedule":
      requiredInstant(variant.kind, "start", variant.start);
      requiredInstant(variant.kind, "end", variant.end);
      requiredCallback(variant.kind, "frequency", variant.frequency);
      requiredCallback(variant.kind, "onSchedule", variant.onSchedule);
      optionalCallback(variant.kind, "onFinish", variant.onFinish);
      return;

    default: {
      const unexpected: never = variant;
      const kind = describeKind(unexpected);
      throw new TimerConfigurationError(kind, "kind", `Unknown timer variant "${kind}".`);
    }
  }
}

function describeKind(value: unknown): string {
  if (typeof value === "object" && value !== null && "kind" in value) {
    return String(value.kind);
  }
  return String(value);
}

function requiredSeconds(variant: string, field: string, value: unknown) {
  if (value === undefined || value === null) {
    throw new TimerConfigurationError(variant, field, `A ${variant} timer requires "${field}".`);
  }
  optionalSeconds(variant, field, value);
}

function optionalSeconds(variant: string, field: string, value: unknown) {
  if (value === undefined) return;
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new TimerConfigurationError(
      variant,
      field,
      `"${field}" of a ${variant} timer must be a positive number of seconds.`
    );
  }
}

function requiredInstant(variant: string, field: string, value: unknown) {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TimerConfigurationError(
      variant,
      field,
      `A ${variant} timer requires "${field}" as epoch milliseconds.`
    );
  }
}

function requiredCallback(variant: string, field: string, value: unknown) {
  if (typeof value !== "function") {
    throw new TimerConfigurationError(variant, field, `A ${variant} timer requires "${field}".`);
  }
}

function optionalCallback(variant: string, field: string, value: unknown) {
  if (value === undefined) return;
  if (typeof value !== "function") {
    throw new TimerConfigurationError(variant, field, `"${field}" of a ${variant} timer must be a function.`);
  }
}
