import type { Logger } from "../interfaces/logger.js";

/** Discards everything. Default for components built without a logger. */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export const noopLogger: Logger = new NoopLogger();
