import { randomUUID } from "crypto";
import { TimerState, type TimerStateValue } from "../domain/timers/TimerState";
import { createTimerEvent, type TimerEventCallback } from "../domain/timers/TimerEvent";
import {
  shouldFinish,
  shouldTick,
  type TimerPredicate,
  type TimerSnapshot,
} from "../domain/timers/TickPolicy";
import {
  configureTimer,
  type ConfigurableTimer,
  type TimerVariant,
} from "../domain/timers/TimerVariant";
import type { ClockDriverPort } from "../ports/sys/ClockDriverPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimePort } from "../ports/sys/TimePort";
import type { TimerObserver } from "./TimerObserver";

export interface TimerDependencies {
  time: TimePort;
  logger: LoggerPort;
  /** Omit for a timer that is only ever advanced by hand. */
  driver?: ClockDriverPort;
  id?: string;
  label?: string;
}

/**
 * Tracks elapsed time frame by frame and fires tick and finish events.
 *
 * The timer never checks its own state inside `advance`: it resumes its driver
 * on `start` and pauses it on `stop`/`reset`/finish, and whatever calls
 * `advance` decides when frames arrive. Durations are seconds, timestamps are
 * epoch milliseconds from the injected `TimePort`.
 */
export class Timer implements ConfigurableTimer, TimerSnapshot {
  readonly id: string;
  readonly label?: string;
  readonly variant: TimerVariant;

  /** Seconds between tick events; unset disables ticking. */
  interval?: number;
  /** Seconds until the finish event; unset runs indefinitely. */
  duration?: number;
  onTick?: TimerEventCallback;
  onFinish?: TimerEventCallback;
  customShouldTick?: TimerPredicate;
  customShouldFinish?: TimerPredicate;

  private readonly lifecycle = new TimerState();
  private readonly time: TimePort;
  private readonly logger: LoggerPort;
  private readonly driver?: ClockDriverPort;
  private observerRef?: WeakRef<TimerObserver>;
  private disposed = false;

  private elapsed = 0;
  private sinceLastTick = 0;
  private sinceLastFinish = 0;
  private lastTickAt?: number;
  private lastFinishAt?: number;
  private ticks = 0;
  private finishes = 0;

  constructor(variant: TimerVariant, deps: TimerDependencies) {
    this.id = deps.id ?? randomUUID();
    this.label = deps.label?.trim() || undefined;
    this.variant = variant;
    this.time = deps.time;
    this.logger = deps.logger;
    this.driver = deps.driver;

    configureTimer(this, variant);
    this.driver?.attach((deltaTime) => this.advance(deltaTime));
  }

  get state(): TimerStateValue {
    return this.lifecycle.value;
  }

  get elapsedTime(): number {
    return this.elapsed;
  }

  get elapsedSinceLastTick(): number {
    return this.sinceLastTick;
  }

  get elapsedSinceLastFinish(): number {
    return this.sinceLastFinish;
  }

  get timestampOfLastTick(): number | undefined {
    return this.lastTickAt;
  }

  get timestampOfLastFinish(): number | undefined {
    return this.lastFinishAt;
  }

  get timesTicked(): number {
    return this.ticks;
  }

  get timesFinished(): number {
    return this.finishes;
  }

  /** Seconds left before the next finish, when a duration is set. */
  get remainingTime(): number | undefined {
    if (this.duration === undefined) return undefined;
    return Math.max(0, this.duration - this.sinceLastFinish);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get observer(): TimerObserver | undefined {
    return this.observerRef?.deref();
  }

  set observer(observer: TimerObserver | undefined) {
    this.observerRef = observer ? new WeakRef(observer) : undefined;
  }

  now(): number {
    return this.time.now();
  }

  start(): boolean {
    if (this.disposed || !this.lifecycle.canStart) {
      return false;
    }

    this.lifecycle.toActive();
    this.driver?.resume();
    this.logger.debug("Timer started", this.describe());
    this.notify("didStart", (observer) => observer.didStart?.(this));

    return true;
  }

  stop(): boolean {
    if (!this.lifecycle.canStop) {
      return false;
    }

    this.lifecycle.toInactive();
    this.driver?.pause();
    this.logger.debug("Timer stopped", this.describe());
    this.notify("didStop", (observer) => observer.didStop?.(this));

    return true;
  }

  /**
   * Returns the timer to NEW and zeroes its elapsed time, timestamps and
   * counters. Interval, duration and callbacks are kept.
   */
  reset(): boolean {
    if (!this.lifecycle.canReset) {
      return false;
    }

    this.lifecycle.toNew();
    this.elapsed = 0;
    this.sinceLastTick = 0;
    this.sinceLastFinish = 0;
    this.lastTickAt = undefined;
    this.lastFinishAt = undefined;
    this.ticks = 0;
    this.finishes = 0;
    this.driver?.pause();

    this.logger.debug("Timer reset", this.describe());
    this.notify("didReset", (observer) => observer.didReset?.(this));

    return true;
  }

  restart(): boolean {
    this.reset();
    if (!this.start()) {
      return false;
    }
    this.notify("didRestart", (observer) => observer.didRestart?.(this));
    return true;
  }

  /** Stops the timer if it is running and cancels its driver for good. */
  dispose(): void {
    if (this.disposed) return;
    this.stop();
    this.disposed = true;
    this.driver?.cancel();
    this.logger.debug("Timer disposed", this.describe());
  }

  /**
   * Accounts one frame of `deltaTime` seconds, firing tick and finish events as
   * due. A negative, NaN or infinite delta drops the frame without any change.
   */
  advance(deltaTime: number): void {
    if (!Number.isFinite(deltaTime) || deltaTime < 0) {
      this.logger.debug("Invalid frame delta dropped", { ...this.describe(), deltaTime: String(deltaTime) });
      return;
    }

    this.elapsed += deltaTime;
    this.sinceLastTick += deltaTime;
    this.sinceLastFinish += deltaTime;

    const timestamp = this.time.now();

    if (shouldTick(this, this.customShouldTick)) {
      this.tick(timestamp);
    }

    if (shouldFinish(this, this.customShouldFinish)) {
      this.finish(timestamp);
    }
  }

  private tick(timestamp: number) {
    this.ticks += 1;
    this.lastTickAt = timestamp;

    const event = createTimerEvent({
      kind: "tick",
      timestamp,
      deltaTime: this.sinceLastTick,
      timerLifetime: this.elapsed,
      timesFired: this.ticks,
    });

    this.notify("onTick", (observer) => observer.onTick?.(event, this));
    const onTick = this.onTick;
    if (onTick) {
      this.guard("onTick callback", () => onTick(event));
    }

    this.sinceLastTick = 0;
  }

  private finish(timestamp: number) {
    this.stop();

    this.lifecycle.toFinished();
    this.driver?.pause();
    this.finishes += 1;
    this.lastFinishAt = timestamp;

    const event = createTimerEvent({
      kind: "finish",
      timestamp,
      deltaTime: this.sinceLastFinish,
      timerLifetime: this.elapsed,
      timesFired: this.finishes,
    });

    this.logger.debug("Timer finished", { ...this.describe(), timesFinished: this.finishes });
    this.notify("onFinish", (observer) => observer.onFinish?.(event, this));
    const onFinish = this.onFinish;
    if (onFinish) {
      this.guard("onFinish callback", () => onFinish(event));
    }

    this.sinceLastFinish = 0;
  }

  private notify(hook: keyof TimerObserver, call: (observer: TimerObserver) => void) {
    const observer = this.observer;
    if (!observer) return;
    this.guard(`observer ${hook}`, () => call(observer));
  }

  private guard(what: string, run: () => void) {
    try {
      run();
    } catch (err) {
      this.logger.warn(`Timer ${what} failed`, {
        timerId: this.id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private describe(): Record<string, unknown> {
    return this.label
      ? { timerId: this.id, label: this.label, variant: this.variant.kind, state: this.state }
      : { timerId: this.id, variant: this.variant.kind, state: this.state };
  }
}
