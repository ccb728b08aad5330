import { performance } from "perf_hooks";
import type { TimePort } from "../../ports/sys/TimePort";

export class NodeTime implements TimePort {
  now(): number {
    return Date.now();
  }

  uptime(): number {
    return performance.now();
  }

  toLocaleTimeString(epochMs: number): string {
    return new Date(epochMs).toLocaleTimeString();
  }
}
