export class CueBridgeError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CueBridgeError";
    this.code = code;
  }
}

// ── Dispatch errors ──

/** Inbound bytes are not a well-formed request. */
export class ParseError extends CueBridgeError {
  override name: "ParseError" = "ParseError";

  constructor(message: string, options?: ErrorOptions) {
    super(message, "PARSE", options);
  }
}

export class UnknownCommandError extends CueBridgeError {
  override name: "UnknownCommandError" = "UnknownCommandError";
  readonly commandName: string;

  constructor(commandName: string) {
    super(`Unknown command: ${commandName}`, "UNKNOWN_COMMAND");
    this.commandName = commandName;
  }
}

export class TransportNotAllowedError extends CueBridgeError {
  override name: "TransportNotAllowedError" = "TransportNotAllowedError";
  readonly commandName: string;
  readonly transport: string;

  constructor(commandName: string, transport: string) {
    super(`Command ${commandName} is not allowed over ${transport.toUpperCase()}`, "TRANSPORT");
    this.commandName = commandName;
    this.transport = transport;
  }
}

/** The host API rejected or failed a command. */
export class HostError extends CueBridgeError {
  override name: "HostError" = "HostError";

  constructor(message: string, options?: ErrorOptions) {
    super(message, "HOST", options);
  }
}

export class TimeoutError extends CueBridgeError {
  override name: "TimeoutError" = "TimeoutError";

  constructor(message = "Timeout waiting for operation to complete") {
    super(message, "TIMEOUT");
  }
}

export class ShutdownError extends CueBridgeError {
  override name: "ShutdownError" = "ShutdownError";

  constructor(message = "Server is shutting down") {
    super(message, "SHUTDOWN");
  }
}

export const ERROR_KINDS = [
  "ParseError",
  "UnknownCommandError",
  "TransportNotAllowedError",
  "HostError",
  "TimeoutError",
  "ShutdownError",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

const ERROR_KIND_SET: ReadonlySet<unknown> = new Set(ERROR_KINDS);

export function isErrorKind(value: unknown): value is ErrorKind {
  return ERROR_KIND_SET.has(value);
}

// ── Utilities ──

/** Coerce unknown thrown value to CueBridgeError (preserves cause chain). */
export function toCueBridgeError(value: unknown): CueBridgeError {
  if (value instanceof CueBridgeError) return value;
  if (value instanceof Error) return new CueBridgeError(value.message, "UNKNOWN", { cause: value });
  return new CueBridgeError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
