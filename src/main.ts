#!/usr/bin/env node
import { createTimer, loadRuntimeSettings } from "./composition/container";
import { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
import { initializeLogging } from "./runtime/logging";
import { buildDemoVariant, demoTimerOptions, DemoUsageError, formatSeconds, parseDemoArgs, USAGE } from "./runtime/demo";
import { LOG_FILE } from "./env";

async function main() {
  const request = parseDemoArgs(process.argv.slice(2));

  const loggingHandle = initializeLogging(LOG_FILE);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  const settings = loadRuntimeSettings();
  const logger = new ConsoleLogger({ level: settings.logLevel });

  let done: () => void = () => undefined;
  const finished = new Promise<void>((resolve) => {
    done = resolve;
  });

  const timer = createTimer(
    buildDemoVariant(request, logger, () => done()),
    demoTimerOptions(request, settings, logger)
  );

  process.once("SIGINT", () => {
    console.log("\nExiting…");
    done();
  });

  timer.start();
  logger.info(`Running ${request.variant} timer at ${settings.frameRate} fps`);

  try {
    await finished;
    logger.info(
      `Ran for ${formatSeconds(timer.elapsedTime)} (${timer.timesTicked} ticks, ${timer.timesFinished} finishes)`
    );
  } finally {
    timer.dispose();
    loggingHandle.shutdown();
    await loggingHandle.closed;
  }
}

main().catch((err) => {
  if (err instanceof DemoUsageError) {
    console.error(`${err.message}\n\n${USAGE}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
