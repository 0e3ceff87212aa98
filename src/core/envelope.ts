import { CueBridgeError, errorMessage, isErrorKind } from "../errors.js";
import type { ErrorEnvelope, JsonValue, Outcome, SuccessEnvelope } from "../types/commands.js";
import { serializeNDJSON } from "../utils/ndjson.js";

export function successEnvelope(result: JsonValue): SuccessEnvelope {
  return { status: "success", result };
}

/**
 * Build the client-visible error for any thrown value. Dispatch errors keep
 * their kind; anything else is reported by message only.
 */
export function errorEnvelope(error: unknown): ErrorEnvelope {
  const envelope: ErrorEnvelope = { status: "error", message: errorMessage(error) };
  if (error instanceof CueBridgeError && isErrorKind(error.name)) {
    envelope.kind = error.name;
  }
  return envelope;
}

/** One NDJSON response line. */
export function serializeOutcome(outcome: Outcome): string {
  return serializeNDJSON(outcome);
}
