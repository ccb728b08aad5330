/** Receives the seconds elapsed since the previous frame. */
export type AdvanceHandler = (deltaTime: number) => void;

/**
 * A periodic source of frames. A timer attaches one handler, resumes delivery
 * when it starts, pauses it when it stops or resets, and cancels it when it is
 * disposed.
 */
export interface ClockDriverPort {
  readonly isRunning: boolean;
  /** Replaces any handler attached earlier. */
  attach(handler: AdvanceHandler): void;
  resume(): void;
  pause(): void;
  /** Stops delivery for good and drops the handler. */
  cancel(): void;
}
