export interface TimePort {
  /** Wall-clock time in epoch milliseconds. */
  now(): number;
  /** Monotonic milliseconds from an arbitrary origin, for measuring frame deltas. */
  uptime(): number;
  toLocaleTimeString(epochMs: number): string;
}
