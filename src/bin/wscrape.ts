#!/usr/bin/env node
import { LoggingCaptureObserver } from "../adapters/logging-capture-observer.js";
import { StructuredLogger } from "../adapters/structured-logger.js";
import { HELP_TEXT, parseCliArgs } from "../config/cli-args.js";
import { CaptureLoop } from "../core/capture-loop.js";
import { registerShutdownHandlers } from "../daemon/signal-handler.js";
import { ConfigurationError } from "../errors.js";

async function main(): Promise<void> {
  let command: ReturnType<typeof parseCliArgs>;
  try {
    command = parseCliArgs(process.argv);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
  if (command.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }

  const { options, logLevel } = command.config;
  const logger = new StructuredLogger({ component: "wscrape", level: logLevel });

  let loop: CaptureLoop;
  try {
    loop = await CaptureLoop.connect(
      { ...options, observer: new LoggingCaptureObserver(logger) },
      { logger },
    );
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  registerShutdownHandlers(loop, { logger });

  loop.start();
  console.log(`
  wscrape

  Host:     ${options.sshHost}
  Interval: ${options.captureIntervalMs}ms

  Press Ctrl+C to stop
`);
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
