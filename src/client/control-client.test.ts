import { createServer, type Server, type Socket } from "node:net";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InMemoryHost } from "../adapters/in-memory-host.js";
import { ControlDaemon } from "../daemon/control-daemon.js";
import { TimeoutError } from "../errors.js";
import type { JsonValue } from "../types/commands.js";
import { ControlClient, RemoteCommandError } from "./control-client.js";

async function eventually(
  read: () => Promise<JsonValue>,
  accept: (value: JsonValue) => boolean,
  timeoutMs = 2000,
): Promise<JsonValue> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const value = await read();
    if (accept(value)) return value;
    if (Date.now() > deadline) throw new Error("value never matched");
    await new Promise((r) => setTimeout(r, 10));
  }
}

describe("ControlClient against a daemon", () => {
  let daemon: ControlDaemon;
  let client: ControlClient;

  beforeEach(async () => {
    daemon = new ControlDaemon({
      host: new InMemoryHost({ sceneCount: 2 }),
      config: { host: "127.0.0.1", port: 0 },
    });
    const { tcp, udp } = await daemon.start();
    client = new ControlClient({ port: tcp.port, udpPort: udp.port });
    await client.connect();
  });

  afterEach(async () => {
    await client.close();
    await daemon.stop();
  });

  it("resolves send() with the command result", async () => {
    await expect(client.send("create_midi_track")).resolves.toEqual({ index: 0, name: "1-MIDI" });
  });

  it("rejects with the remote error and its kind", async () => {
    const err = await client.send("delete_track", { track_index: 7 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteCommandError);
    expect(err).toMatchObject({
      message: "Track index out of range",
      kind: "HostError",
      commandName: "delete_track",
    });
  });

  it("matches pipelined responses to their requests", async () => {
    const results = await Promise.all([
      client.send("set_tempo", { tempo: 90 }),
      client.send("set_tempo", { tempo: 1 }).catch((e: unknown) => e),
      client.send("set_tempo", { tempo: 110 }),
    ]);

    expect(results[0]).toEqual({ tempo: 90 });
    expect(results[1]).toBeInstanceOf(RemoteCommandError);
    expect(results[2]).toEqual({ tempo: 110 });
  });

  it("refuses TCP-only commands on sendUdp()", async () => {
    await expect(client.sendUdp("delete_track", { track_index: 0 })).rejects.toThrow(
      "Command delete_track is not allowed over UDP",
    );
  });

  it("delivers eligible commands over UDP", async () => {
    await client.send("create_midi_track");
    await client.sendUdp("set_track_volume", { track_index: 0, volume: 0.2 });

    const info = await eventually(
      () => client.send("get_all_tracks"),
      (v) => JSON.stringify(v).includes('"volume":0.2'),
    );
    expect(info).toMatchObject([{ index: 0, volume: 0.2 }]);
  });

  it("dispatch() fires eligible commands and awaits the rest", async () => {
    await expect(client.dispatch("create_audio_track")).resolves.toEqual({
      index: 0,
      name: "1-Audio",
    });
    await expect(client.dispatch("set_track_mute", { track_index: 0, mute: true })).resolves.toBe(
      undefined,
    );

    await eventually(
      () => client.send("get_all_tracks"),
      (v) => JSON.stringify(v).includes('"mute":true'),
    );
  });

  it("dispatch() falls back to TCP for payloads too large for a datagram", async () => {
    const oversized = { track_index: 3, volume: 0.5, label: "x".repeat(4096) };

    await expect(client.dispatch("set_track_volume", oversized)).rejects.toMatchObject({
      message: "Track index out of range",
      kind: "HostError",
    });
  });
});

describe("ControlClient against a scripted server", () => {
  let server: Server;
  let port: number;
  let peers: Socket[];
  let reply: ((peer: Socket) => void) | null;

  beforeEach(async () => {
    peers = [];
    reply = null;
    server = createServer((peer) => {
      peers.push(peer);
      peer.on("data", () => reply?.(peer));
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    port = address && typeof address === "object" ? address.port : 0;
  });

  afterEach(async () => {
    for (const peer of peers) peer.destroy();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("rejects send() before connect()", async () => {
    const client = new ControlClient({ port });
    await expect(client.send("undo")).rejects.toThrow("Not connected");
  });

  it("times out a silent request", async () => {
    const client = new ControlClient({ port });
    await client.connect();

    const err = await client.send("get_session_info", {}, { timeoutMs: 30 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toHaveProperty("message", "No response to get_session_info within 30ms");
    await client.close();
  });

  it("rejects pending requests when closed", async () => {
    const client = new ControlClient({ port });
    await client.connect();

    const pending = client.send("get_session_info");
    await client.close();

    await expect(pending).rejects.toThrow("Connection closed");
  });

  it("rejects pending requests when the server drops the connection", async () => {
    reply = (peer) => peer.destroy();
    const client = new ControlClient({ port });
    await client.connect();

    await expect(client.send("undo")).rejects.toThrow("Connection closed");
    expect(client.isConnected).toBe(false);
  });

  it("treats an unreadable response as a protocol error", async () => {
    reply = (peer) => peer.write("garbage\n");
    const client = new ControlClient({ port });
    await client.connect();

    await expect(client.send("undo")).rejects.toThrow("Malformed response from server");
    await client.close();
  });

  it("fails connect() when nothing is listening", async () => {
    const closed = new ControlClient({ port: 1 });
    await expect(closed.connect()).rejects.toMatchObject({ code: "ECONNREFUSED" });
  });
});
