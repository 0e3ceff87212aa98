import { noopLogger } from "../adapters/noop-logger.js";
import type { Logger } from "../interfaces/logger.js";

const DEFAULT_TIMEOUT_MS = 10_000;
const SIGNALS = ["SIGINT", "SIGTERM"] as const;

export interface SignalHandlerOptions {
  logger?: Logger;
  /** Force exit(1) if shutdown has not finished by then. */
  timeoutMs?: number;
}

/**
 * On SIGINT or SIGTERM, run `shutdown` once and exit: 0 after it settles
 * (a failure is logged), 1 if it stalls past `timeoutMs`. Further signals
 * during shutdown are ignored. Returns a function that removes the handlers.
 */
export function registerSignalHandlers(
  shutdown: () => Promise<void>,
  options: SignalHandlerOptions = {},
): () => void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { component: "daemon", signal });

    const forceTimer = setTimeout(() => {
      logger.error("Shutdown timed out, forcing exit", { component: "daemon", timeoutMs });
      process.exit(1);
    }, timeoutMs);
    forceTimer.unref();

    shutdown()
      .catch((err: unknown) => {
        logger.error("Shutdown failed", { component: "daemon", error: err });
      })
      .finally(() => {
        clearTimeout(forceTimer);
        process.exit(0);
      });
  };

  for (const signal of SIGNALS) process.on(signal, handler);
  return () => {
    for (const signal of SIGNALS) process.off(signal, handler);
  };
}
