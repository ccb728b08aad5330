import fs from "fs";
import path from "path";
import type { LogLevel } from "./ports/sys/LoggerPort";
import { isLogLevel } from "./adapters/sys/ConsoleLogger";
import { DEFAULT_FRAME_RATE } from "./adapters/sys/IntervalClockDriver";

export interface DriverConfig {
  frameRate?: number;
  keepAlive?: boolean;
}

export interface LoggingConfig {
  level?: LogLevel;
}

export interface AppConfig {
  driver?: DriverConfig;
  logging?: LoggingConfig;
}

const DEFAULT_CONFIG_FILENAMES = ["tickwork.config.json", "timer.config.json"];

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return { config: normalizeConfig(parsed), path: resolved };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

export function normalizeConfig(input: unknown): AppConfig {
  const out: AppConfig = {};
  if (!isRecord(input)) {
    console.warn("Config root must be a JSON object; ignoring it.");
    return out;
  }

  if (input.driver !== undefined) {
    out.driver = normalizeDriver(input.driver);
  }

  if (input.logging !== undefined) {
    out.logging = normalizeLogging(input.logging);
  }

  return out;
}

function normalizeDriver(input: unknown): DriverConfig {
  const out: DriverConfig = {};
  if (!isRecord(input)) {
    console.warn('Invalid "driver" configuration; expected an object.');
    return out;
  }

  const { frameRate, keepAlive } = input;
  if (frameRate !== undefined) {
    if (typeof frameRate === "number" && Number.isFinite(frameRate) && frameRate > 0) {
      out.frameRate = frameRate;
    } else {
      console.warn(`Invalid driver.frameRate ${JSON.stringify(frameRate)}; expected a positive number.`);
    }
  }

  if (keepAlive !== undefined) {
    if (typeof keepAlive === "boolean") {
      out.keepAlive = keepAlive;
    } else {
      console.warn(`Invalid driver.keepAlive ${JSON.stringify(keepAlive)}; expected true or false.`);
    }
  }

  return out;
}

function normalizeLogging(input: unknown): LoggingConfig {
  const out: LoggingConfig = {};
  if (!isRecord(input)) {
    console.warn('Invalid "logging" configuration; expected an object.');
    return out;
  }

  if (input.level !== undefined) {
    if (isLogLevel(input.level)) {
      out.level = input.level;
    } else {
      console.warn(
        `Invalid logging.level ${JSON.stringify(input.level)}; expected debug, info, warn or error.`
      );
    }
  }

  return out;
}

export interface EnvSettings {
  frameRate?: number;
  logLevel?: LogLevel;
  debug?: boolean;
}

export interface RuntimeSettings {
  frameRate: number;
  keepAlive: boolean;
  logLevel: LogLevel;
}

/** Environment wins over the config file, which wins over the defaults. */
export function resolveSettings(config: AppConfig, env: EnvSettings = {}): RuntimeSettings {
  return {
    frameRate: env.frameRate ?? config.driver?.frameRate ?? DEFAULT_FRAME_RATE,
    keepAlive: config.driver?.keepAlive ?? true,
    logLevel: env.debug ? "debug" : env.logLevel ?? config.logging?.level ?? "info",
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
