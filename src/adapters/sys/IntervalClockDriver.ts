import type { AdvanceHandler, ClockDriverPort } from "../../ports/sys/ClockDriverPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { TimePort } from "../../ports/sys/TimePort";
import { ConsoleLogger } from "./ConsoleLogger";
import { NodeTime } from "./NodeTime";

export const DEFAULT_FRAME_RATE = 60;

export interface IntervalClockDriverOptions {
  /** Frames delivered per second. */
  frameRate?: number;
  /** When false the interval handle is unref'd and will not hold the process open. */
  keepAlive?: boolean;
  time?: TimePort;
  logger?: LoggerPort;
}

/**
 * Delivers frames from `setInterval`, measuring each frame's delta from the
 * monotonic clock rather than trusting the nominal period.
 */
export class IntervalClockDriver implements ClockDriverPort {
  readonly frameRate: number;
  private readonly keepAlive: boolean;
  private readonly time: TimePort;
  private readonly logger: LoggerPort;
  private handler: AdvanceHandler | null = null;
  private interval: NodeJS.Timeout | null = null;
  private lastFrameAt = 0;
  private cancelled = false;

  constructor(options: IntervalClockDriverOptions = {}) {
    const frameRate = options.frameRate ?? DEFAULT_FRAME_RATE;
    if (!Number.isFinite(frameRate) || frameRate <= 0) {
      throw new Error("Frame rate must be a positive number of frames per second.");
    }
    this.frameRate = frameRate;
    this.keepAlive = options.keepAlive ?? true;
    this.time = options.time ?? new NodeTime();
    this.logger = options.logger ?? new ConsoleLogger();
  }

  get isRunning(): boolean {
    return this.interval !== null;
  }

  attach(handler: AdvanceHandler): void {
    if (this.cancelled) return;
    this.handler = handler;
  }

  resume(): void {
    if (this.cancelled || this.interval) return;
    this.lastFrameAt = this.time.uptime();
    this.interval = setInterval(() => this.frame(), 1000 / this.frameRate);
    if (!this.keepAlive && typeof this.interval.unref === "function") {
      this.interval.unref();
    }
  }

  pause(): void {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
  }

  cancel(): void {
    this.pause();
    this.handler = null;
    this.cancelled = true;
  }

  private frame() {
    const now = this.time.uptime();
    const deltaTime = (now - this.lastFrameAt) / 1000;
    this.lastFrameAt = now;
    if (!this.handler) return;
    try {
      this.handler(deltaTime);
    } catch (err) {
      this.logger.warn("Clock frame handler failed", { error: String(err) });
    }
  }
}
