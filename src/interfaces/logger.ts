/**
 * Structured logger contract.
 * Servers, the serializer and the daemon log through this; StructuredLogger
 * and NoopLogger implement it.
 * @module
 */

/** Context values are merged into the log record. */
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}
