import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  /** Settles once the log file has been flushed after `shutdown`, or has failed. */
  readonly closed: Promise<void>;
  shutdown(): void;
}

type ConsoleMethod = "log" | "info" | "warn" | "error" | "debug";

const MIRRORED: ConsoleMethod[] = ["log", "info", "warn", "error", "debug"];

function stringify(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Mirrors console output into `logFile` (appending) until `shutdown` restores
 * the console. Without a file this is a no-op.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      closed: Promise.resolve(),
      shutdown: () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  const startedAt = new Date().toISOString();
  stream.write(`[${startedAt}] --- tickwork session started ---\n`);

  const original: Record<ConsoleMethod, (...args: unknown[]) => void> = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
    debug: console.debug,
  };

  const mirror = (level: ConsoleMethod) =>
    (...args: unknown[]) => {
      original[level].apply(console, args);
      const timestamp = new Date().toISOString();
      const message = args.map(stringify).join(" ");
      stream.write(`[${timestamp}] ${level.toUpperCase()} ${message}\n`);
    };

  for (const level of MIRRORED) {
    console[level] = mirror(level);
  }

  let ended = false;
  const restoreConsole = () => {
    ended = true;
    for (const level of MIRRORED) {
      console[level] = original[level];
    }
  };

  // A stream that fails (unwritable path, full disk) stops mirroring at once.
  const closed = new Promise<void>((resolve) => {
    stream.once("finish", () => resolve());
    stream.once("error", (err) => {
      if (!ended) restoreConsole();
      original.error.call(console, `Failed to write log file ${resolvedLog}:`, err);
      resolve();
    });
  });

  const shutdown = () => {
    if (ended) return;
    restoreConsole();
    const endedAt = new Date().toISOString();
    stream.write(`[${endedAt}] --- tickwork session ended ---\n`);
    stream.end();
  };

  return {
    logPath: resolvedLog,
    closed,
    shutdown,
  };
}
