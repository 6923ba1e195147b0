import { noopLogger } from "../adapters/noop-logger.js";
import type { Logger } from "../interfaces/logger.js";

const DEFAULT_TIMEOUT_MS = 10_000;
const SHUTDOWN_SIGNALS = ["SIGTERM", "SIGINT"] as const;

export type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];

/** What a signal shuts down: released synchronously, finished once `done` settles. */
export interface ShutdownTarget {
  dispose(): void;
  readonly done: Promise<void>;
}

export interface SignalHandlerOptions {
  logger?: Logger;
  timeoutMs?: number;
}

/**
 * On SIGTERM or SIGINT, dispose `target` and exit 0 once its task has ended.
 * Exits 1 if that takes longer than `timeoutMs` or disposal throws.
 * Later signals are ignored while shutting down.
 */
export function registerShutdownHandlers(target: ShutdownTarget, options: SignalHandlerOptions = {}): void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  let shuttingDown = false;

  const shutdown = (signal: ShutdownSignal) => {
    if (shuttingDown) {
      logger.info("Already shutting down", { component: "shutdown", signal });
      return;
    }
    shuttingDown = true;
    logger.info("Shutting down", { component: "shutdown", signal });

    const forceTimer = setTimeout(() => {
      logger.error("Shutdown timed out, force exiting", { component: "shutdown", timeoutMs });
      process.exit(1);
    }, timeoutMs);
    forceTimer.unref();

    try {
      target.dispose();
    } catch (err) {
      clearTimeout(forceTimer);
      logger.error("Shutdown failed", { component: "shutdown", error: err });
      process.exit(1);
      return;
    }

    void target.done.then(
      () => {
        clearTimeout(forceTimer);
        logger.info("Shutdown complete", { component: "shutdown" });
        process.exit(0);
      },
      (err: unknown) => {
        clearTimeout(forceTimer);
        logger.error("Shutdown failed", { component: "shutdown", error: err });
        process.exit(1);
      },
    );
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, () => shutdown(signal));
  }
}
