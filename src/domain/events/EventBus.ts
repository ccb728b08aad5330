export interface Subscription {
  unsubscribe(): void;
}

export interface EventBus {
  publish<T>(topic: string, payload: T): void;
  subscribe<T>(topic: string, handler: (payload: T) => void): Subscription;
}

export const Topics = {
  TimerStarted: "timer.started",
  TimerStopped: "timer.stopped",
  TimerReset: "timer.reset",
  TimerRestarted: "timer.restarted",
  TimerTicked: "timer.tick",
  TimerFinished: "timer.finished",
} as const;

export type Topic = (typeof Topics)[keyof typeof Topics];
