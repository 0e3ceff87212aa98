import { describe, expect, it } from "vitest";
import {
  ParseError,
  TransportNotAllowedError,
  UnknownCommandError,
} from "../errors.js";
import { decodeCommand } from "./command-decoder.js";

describe("decodeCommand", () => {
  it("builds a frozen command from a valid TCP request", () => {
    const result = decodeCommand(
      '{"type":"set_track_volume","params":{"track_index":0,"volume":0.5}}',
      "tcp",
      1_700_000_000_000,
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.command).toEqual({
      name: "set_track_volume",
      params: { track_index: 0, volume: 0.5 },
      transport: "tcp",
      receivedAt: 1_700_000_000_000,
    });
    expect(Object.isFrozen(result.command)).toBe(true);
    expect(Object.isFrozen(result.command.params)).toBe(true);
  });

  it("defaults missing params to an empty object", () => {
    const result = decodeCommand('{"type":"get_session_info"}', "tcp");
    expect(result.ok && result.command.params).toEqual({});
  });

  it("preserves parameter order", () => {
    const result = decodeCommand('{"type":"set_loop","params":{"start_bar":1,"end_bar":9,"enabled":true}}', "tcp");
    expect(result.ok && Object.keys(result.command.params)).toEqual([
      "start_bar",
      "end_bar",
      "enabled",
    ]);
  });

  it("rejects malformed JSON as ParseError", () => {
    const result = decodeCommand('{"type":"get_session_info"', "tcp");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error.message).toBe("Malformed JSON message");
    expect(result.commandName).toBeUndefined();
  });

  it("rejects a message without a type", () => {
    const result = decodeCommand('{"params":{}}', "tcp");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error.message).toBe("Invalid command message: type: Required");
  });

  it("rejects non-object roots and non-object params", () => {
    const root = decodeCommand("42", "udp");
    expect(!root.ok && root.error.message).toBe(
      "Invalid command message: message: Expected object, received number",
    );

    const params = decodeCommand('{"type":"undo","params":[1,2]}', "tcp");
    expect(!params.ok && params.error).toBeInstanceOf(ParseError);
  });

  it("rejects unknown command names", () => {
    const result = decodeCommand('{"type":"launch_rocket","params":{}}', "udp");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnknownCommandError);
    expect(result.commandName).toBe("launch_rocket");
  });

  it("rejects critical commands over UDP", () => {
    const result = decodeCommand('{"type":"delete_track","params":{"track_index":0}}', "udp");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TransportNotAllowedError);
    expect(result.commandName).toBe("delete_track");
  });

  it("accepts the same critical command over TCP", () => {
    const result = decodeCommand('{"type":"delete_track","params":{"track_index":0}}', "tcp");
    expect(result.ok).toBe(true);
  });
});
