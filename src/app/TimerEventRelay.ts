import type { EventBus } from "../domain/events/EventBus";
import { Topics } from "../domain/events/EventBus";
import type { TimerEvent } from "../domain/timers/TimerEvent";
import type { TimerStateValue } from "../domain/timers/TimerState";
import type { Timer } from "./Timer";
import type { TimerObserver } from "./TimerObserver";

export interface TimerNotification {
  timerId: string;
  label?: string;
  state: TimerStateValue;
  event?: TimerEvent;
}

/**
 * Republishes a timer's lifecycle on an event bus. Timers hold observers
 * weakly, so whoever attaches a relay has to keep a reference to it. The relay
 * in turn only remembers its timers weakly, and forgets a timer as soon as
 * something else becomes its observer.
 */
export class TimerEventRelay implements TimerObserver {
  private readonly attached = new Set<WeakRef<Timer>>();

  constructor(private readonly bus: EventBus) {}

  /** Timers still alive and still observed by this relay. */
  get attachedCount(): number {
    this.prune();
    return this.attached.size;
  }

  attach(timer: Timer): this {
    timer.observer = this;
    this.prune();
    if (!this.find(timer)) {
      this.attached.add(new WeakRef(timer));
    }
    return this;
  }

  detach(timer: Timer): void {
    if (timer.observer === this) {
      timer.observer = undefined;
    }
    const ref = this.find(timer);
    if (ref) this.attached.delete(ref);
  }

  detachAll(): void {
    for (const ref of Array.from(this.attached)) {
      const timer = ref.deref();
      if (timer) this.detach(timer);
    }
    this.attached.clear();
  }

  private find(timer: Timer): WeakRef<Timer> | undefined {
    for (const ref of this.attached) {
      if (ref.deref() === timer) return ref;
    }
    return undefined;
  }

  private prune() {
    for (const ref of Array.from(this.attached)) {
      const timer = ref.deref();
      if (!timer || timer.observer !== this) {
        this.attached.delete(ref);
      }
    }
  }

  didStart(timer: Timer): void {
    this.bus.publish(Topics.TimerStarted, notification(timer));
  }

  didStop(timer: Timer): void {
    this.bus.publish(Topics.TimerStopped, notification(timer));
  }

  didReset(timer: Timer): void {
    this.bus.publish(Topics.TimerReset, notification(timer));
  }

  didRestart(timer: Timer): void {
    this.bus.publish(Topics.TimerRestarted, notification(timer));
  }

  onTick(event: TimerEvent, timer: Timer): void {
    this.bus.publish(Topics.TimerTicked, notification(timer, event));
  }

  onFinish(event: TimerEvent, timer: Timer): void {
    this.bus.publish(Topics.TimerFinished, notification(timer, event));
  }
}

function notification(timer: Timer, event?: TimerEvent): TimerNotification {
  const payload: TimerNotification = { timerId: timer.id, state: timer.state };
  if (timer.label) payload.label = timer.label;
  if (event) payload.event = event;
  return payload;
}
