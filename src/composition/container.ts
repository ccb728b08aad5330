import { loadConfig, resolveSettings, type RuntimeSettings } from '../config';
import { CONFIG_PATH, DEBUG_MODE, TICKWORK_FRAME_RATE, TICKWORK_LOG_LEVEL } from '../env';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { IntervalClockDriver } from '../adapters/sys/IntervalClockDriver';
import { NodeTime } from '../adapters/sys/NodeTime';
import { Timer } from '../app/Timer';
import type { TimerVariant } from '../domain/timers/TimerVariant';
import type { ClockDriverPort } from '../ports/sys/ClockDriverPort';
import type { LoggerPort } from '../ports/sys/LoggerPort';
import type { TimePort } from '../ports/sys/TimePort';

export interface TimerOptions {
  label?: string;
  /** Build a timer without a driver; it only moves when `advance` is called. */
  manual?: boolean;
  driver?: ClockDriverPort;
  time?: TimePort;
  logger?: LoggerPort;
  frameRate?: number;
  keepAlive?: boolean;
  /** Skips reading the config file and environment. */
  settings?: RuntimeSettings;
}

let cachedSettings: RuntimeSettings | undefined;

export function loadRuntimeSettings(configPath: string | undefined = CONFIG_PATH): RuntimeSettings {
  const { config } = loadConfig(configPath);
  return resolveSettings(config, {
    frameRate: TICKWORK_FRAME_RATE,
    logLevel: TICKWORK_LOG_LEVEL,
    debug: DEBUG_MODE,
  });
}

function defaultSettings(): RuntimeSettings {
  if (!cachedSettings) {
    cachedSettings = loadRuntimeSettings();
  }
  return cachedSettings;
}

export function createTimer(variant: TimerVariant, options: TimerOptions = {}): Timer {
  const settings = options.settings ?? defaultSettings();
  const time = options.time ?? new NodeTime();
  const logger = options.logger ?? new ConsoleLogger({ level: settings.logLevel, prefix: 'tickwork' });

  let driver: ClockDriverPort | undefined;
  if (!options.manual) {
    driver =
      options.driver ??
      new IntervalClockDriver({
        frameRate: options.frameRate ?? settings.frameRate,
        keepAlive: options.keepAlive ?? settings.keepAlive,
        time,
        logger,
      });
  }

  return new Timer(variant, { time, logger, driver, label: options.label });
}
