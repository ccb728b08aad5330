import type { TimerEvent } from "../domain/timers/TimerEvent";
import { TimerVariants, type TimerVariant } from "../domain/timers/TimerVariant";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimerOptions } from "../composition/container";
import type { RuntimeSettings } from "../config";

export type DemoVariantKind = "basic" | "stopwatch" | "countdown" | "countUp" | "delay";

export interface DemoRequest {
  variant: DemoVariantKind;
  interval?: number;
  count?: number;
  delay?: number;
  timeout?: number;
}

export class DemoUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const USAGE = `Usage: tickwork <basic|stopwatch|countdown|countup|delay> [options]
  --interval <seconds>   seconds between ticks (basic, countdown, countup)
  --count <seconds>      seconds to count (countdown, countup)
  --delay <seconds>      seconds to wait (delay)
  --timeout <seconds>    stopwatch timeout
  --config <path>        JSON config file
  --log-file <path>      mirror output to a file
  --debug, --no-debug    toggle debug logging`;

const VARIANTS: Record<string, DemoVariantKind> = {
  basic: "basic",
  stopwatch: "stopwatch",
  countdown: "countdown",
  countup: "countUp",
  delay: "delay",
};

const NUMERIC_FLAGS = {
  "--interval": "interval",
  "--count": "count",
  "--delay": "delay",
  "--timeout": "timeout",
} as const;

/** Flags read by env.ts; skipped here together with their values. */
const ENV_FLAGS_WITH_VALUE = new Set(["--config", "--log-file"]);
const ENV_SWITCHES = new Set(["--debug", "--no-debug"]);

function isNumericFlag(arg: string): arg is keyof typeof NUMERIC_FLAGS {
  return Object.hasOwn(NUMERIC_FLAGS, arg);
}

export function parseDemoArgs(argv: string[]): DemoRequest {
  let variant: DemoVariantKind | undefined;
  const values: Omit<DemoRequest, "variant"> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (ENV_FLAGS_WITH_VALUE.has(arg)) {
      i++;
      continue;
    }
    if (ENV_SWITCHES.has(arg)) continue;

    if (isNumericFlag(arg)) {
      const raw = argv[++i];
      const value = Number(raw);
      if (raw === undefined || !Number.isFinite(value) || value <= 0) {
        throw new DemoUsageError(`${arg} expects a positive number of seconds.`);
      }
      values[NUMERIC_FLAGS[arg]] = value;
      continue;
    }

    if (arg.startsWith("--")) {
      throw new DemoUsageError(`Unknown option ${arg}.`);
    }

    const name = arg.toLowerCase();
    if (name === "schedule") {
      throw new DemoUsageError("Schedule timers need a frequency function and cannot be run from the command line.");
    }
    const kind = Object.hasOwn(VARIANTS, name) ? VARIANTS[name] : undefined;
    if (!kind) {
      throw new DemoUsageError(`Unknown timer variant "${arg}".`);
    }
    if (variant) {
      throw new DemoUsageError("Only one timer variant can be run at a time.");
    }
    variant = kind;
  }

  if (!variant) {
    throw new DemoUsageError("No timer variant given.");
  }
  if ((variant === "countdown" || variant === "countUp") && values.count === undefined) {
    throw new DemoUsageError(`${variant} needs --count.`);
  }
  if (variant === "delay" && values.delay === undefined) {
    throw new DemoUsageError("delay needs --delay.");
  }

  return { variant, ...values };
}

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(1)}s`;
}

/**
 * The demo waits on the timer alone, so its driver must hold the process open
 * whatever `driver.keepAlive` says.
 */
export function demoTimerOptions(
  request: DemoRequest,
  settings: RuntimeSettings,
  logger: LoggerPort
): TimerOptions {
  return { settings, logger, label: request.variant, keepAlive: true };
}

/**
 * Builds the variant for a demo run. Every event is logged; `onDone` is called
 * once the timer finishes.
 */
export function buildDemoVariant(
  request: DemoRequest,
  logger: LoggerPort,
  onDone: () => void
): TimerVariant {
  const onFinish = (event: TimerEvent) => {
    logger.info(`Finished after ${formatSeconds(event.timerLifetime)}`);
    onDone();
  };

  switch (request.variant) {
    case "basic":
      return TimerVariants.basic({
        interval: request.interval,
        onTick: (event) => logger.info(`Tick #${event.timesFired} at ${formatSeconds(event.timerLifetime)}`),
      });

    case "stopwatch":
      return TimerVariants.stopwatch({
        timeout: request.timeout,
        onTimeout: onFinish,
      });

    case "countdown": {
      const count = requireValue(request.count, "countdown needs --count.");
      return TimerVariants.countdown({
        count,
        interval: request.interval,
        onCount: (event) => logger.info(formatSeconds(Math.max(0, count - event.timerLifetime))),
        onFinish,
      });
    }

    case "countUp": {
      const count = requireValue(request.count, "countUp needs --count.");
      return TimerVariants.countUp({
        count,
        interval: request.interval,
        onCount: (event) => logger.info(formatSeconds(Math.min(count, event.timerLifetime))),
        onFinish,
      });
    }

    case "delay": {
      const delay = requireValue(request.delay, "delay needs --delay.");
      return TimerVariants.delay({ delay, onFinish });
    }
  }
}

function requireValue(value: number | undefined, message: string): number {
  if (value === undefined) {
    throw new DemoUsageError(message);
  }
  return value;
}
