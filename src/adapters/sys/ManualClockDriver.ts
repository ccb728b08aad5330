import type { AdvanceHandler, ClockDriverPort } from "../../ports/sys/ClockDriverPort";

/** A driver stepped by hand; `step` only delivers while the driver is resumed. */
export class ManualClockDriver implements ClockDriverPort {
  private handler: AdvanceHandler | null = null;
  private running = false;
  private cancelled = false;

  get isRunning(): boolean {
    return this.running;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  attach(handler: AdvanceHandler): void {
    if (this.cancelled) return;
    this.handler = handler;
  }

  resume(): void {
    if (this.cancelled) return;
    this.running = true;
  }

  pause(): void {
    this.running = false;
  }

  cancel(): void {
    this.running = false;
    this.handler = null;
    this.cancelled = true;
  }

  /** Returns whether a frame was delivered. */
  step(deltaTime: number): boolean {
    if (!this.running || !this.handler) return false;
    this.handler(deltaTime);
    return true;
  }

  /** Delivers `frames` equal steps; stops early once delivery is paused. */
  run(frames: number, deltaTime: number): number {
    let delivered = 0;
    for (let i = 0; i < frames; i++) {
      if (!this.step(deltaTime)) break;
      delivered++;
    }
    return delivered;
  }
}
