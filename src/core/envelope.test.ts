import { describe, expect, it } from "vitest";
import { HostError, TimeoutError, UnknownCommandError } from "../errors.js";
import { errorEnvelope, serializeOutcome, successEnvelope } from "./envelope.js";

describe("envelopes", () => {
  it("wraps results as success", () => {
    expect(successEnvelope({ tempo: 120 })).toEqual({ status: "success", result: { tempo: 120 } });
  });

  it("keeps the kind of dispatch errors", () => {
    expect(errorEnvelope(new UnknownCommandError("foo"))).toEqual({
      status: "error",
      message: "Unknown command: foo",
      kind: "UnknownCommandError",
    });
    expect(errorEnvelope(new TimeoutError())).toEqual({
      status: "error",
      message: "Timeout waiting for operation to complete",
      kind: "TimeoutError",
    });
    expect(errorEnvelope(new HostError("Track index out of range")).kind).toBe("HostError");
  });

  it("reports foreign errors by message only", () => {
    expect(errorEnvelope(new RangeError("bad"))).toEqual({ status: "error", message: "bad" });
    expect(errorEnvelope("plain")).toEqual({ status: "error", message: "plain" });
  });

  it("serializes one outcome per line", () => {
    expect(serializeOutcome({ status: "success", result: null })).toBe(
      '{"status":"success","result":null}\n',
    );
  });
});
