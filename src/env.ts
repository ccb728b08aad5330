import { config } from 'dotenv';
import type { LogLevel } from './ports/sys/LoggerPort';
import { isLogLevel } from './adapters/sys/ConsoleLogger';

config();

function parseFrameRate(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`Ignoring TICKWORK_FRAME_RATE=${raw}; expected a positive number.`);
    return undefined;
  }
  return value;
}

function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (!raw) return undefined;
  const value = raw.trim().toLowerCase();
  if (!isLogLevel(value)) {
    console.warn(`Ignoring TICKWORK_LOG_LEVEL=${raw}; expected debug, info, warn or error.`);
    return undefined;
  }
  return value;
}

export const TICKWORK_FRAME_RATE = parseFrameRate(process.env.TICKWORK_FRAME_RATE);
export const TICKWORK_LOG_LEVEL = parseLogLevel(process.env.TICKWORK_LOG_LEVEL);
export let DEBUG_MODE = process.env.DEBUG_MODE === 'true';

const cliArgs = process.argv.slice(2);
let configPathArg: string | undefined;
let logFileArg: string | undefined;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case '--config':
      if (cliArgs[i + 1]) {
        configPathArg = cliArgs[++i];
      }
      break;
    case '--log-file':
      if (cliArgs[i + 1]) {
        logFileArg = cliArgs[++i];
      }
      break;
    case '--debug':
      DEBUG_MODE = true;
      break;
    case '--no-debug':
      DEBUG_MODE = false;
      break;
    default:
      break;
  }
}

export const CONFIG_PATH = configPathArg;
export const LOG_FILE = logFileArg;
