import type { TransportNotAllowedError, UnknownCommandError } from "../errors.js";
import { ParseError } from "../errors.js";
import type { Command, Transport } from "../types/commands.js";
import { commandRequestSchema } from "../types/wire-schema.js";
import { checkTransport } from "./command-classifier.js";

export type DecodeResult =
  | { ok: true; command: Command }
  | {
      ok: false;
      error: ParseError | UnknownCommandError | TransportNotAllowedError;
      /** Present once the message parsed far enough to name a command. */
      commandName?: string;
    };

/**
 * Turn one complete wire message into a classified, frozen Command.
 * Rejections happen here, before anything reaches the serializer.
 */
export function decodeCommand(raw: string, transport: Transport, now = Date.now()): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: new ParseError("Malformed JSON message", { cause: err }) };
  }

  const validation = commandRequestSchema.safeParse(parsed);
  if (!validation.success) {
    const issue = validation.error.issues[0];
    const where = issue?.path.join(".") || "message";
    return {
      ok: false,
      error: new ParseError(`Invalid command message: ${where}: ${issue?.message ?? "invalid"}`),
    };
  }

  const { type, params } = validation.data;
  const check = checkTransport(type, transport);
  if (!check.ok) {
    return { ok: false, error: check.error, commandName: type };
  }

  const command: Command = Object.freeze({
    name: check.entry.commandName,
    params: Object.freeze(params ?? {}),
    transport,
    receivedAt: now,
  });
  return { ok: true, command };
}
