/**
 * ControlClient: talks to a running control daemon.
 *
 * `send` uses the TCP channel and resolves with the command's result (or
 * rejects with RemoteCommandError). `sendUdp` fires a datagram and returns as
 * soon as it is handed to the OS. `dispatch` picks UDP for commands that are
 * UDP-eligible and fit in a datagram, TCP for everything else.
 *
 * The server answers TCP requests strictly in order, so responses are matched
 * to pending requests first-in first-out.
 */

import { createSocket, type Socket as UdpSocket } from "node:dgram";
import { isIPv6, connect as netConnect, type Socket } from "node:net";
import { noopLogger } from "../adapters/noop-logger.js";
import { isUdpEligible } from "../core/command-classifier.js";
import {
  CueBridgeError,
  type ErrorKind,
  ParseError,
  TimeoutError,
  TransportNotAllowedError,
} from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { CommandName, CommandParams, JsonValue } from "../types/commands.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import { outcomeSchema } from "../types/wire-schema.js";
import { NDJSONLineBuffer, serializeNDJSON } from "../utils/ndjson.js";

/** The server answered with an error envelope. */
export class RemoteCommandError extends CueBridgeError {
  override name: "RemoteCommandError" = "RemoteCommandError";
  readonly kind: ErrorKind | undefined;
  readonly commandName: CommandName;

  constructor(commandName: CommandName, message: string, kind?: ErrorKind) {
    super(message, "REMOTE");
    this.commandName = commandName;
    this.kind = kind;
  }
}

export interface ControlClientOptions {
  host?: string; // default: "127.0.0.1"
  port?: number; // default: 9877
  udpPort?: number; // default: port + 1
  /** Default per-request timeout for send() (default: 10000). */
  timeoutMs?: number;
  /** Datagrams larger than this go over TCP in dispatch() (default: 2048). */
  maxDatagramBytes?: number;
  logger?: Logger;
}

export interface SendOptions {
  timeoutMs?: number;
}

interface PendingRequest {
  commandName: CommandName;
  resolve: (result: JsonValue) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
  /** Timed out locally; its response is still expected and discarded. */
  abandoned: boolean;
}

export class ControlClient {
  private readonly host: string;
  private readonly port: number;
  private readonly udpPort: number;
  private readonly timeoutMs: number;
  private readonly maxDatagramBytes: number;
  private readonly logger: Logger;
  private socket: Socket | null = null;
  private udp: UdpSocket | null = null;
  private readonly pending: PendingRequest[] = [];
  private buffer = new NDJSONLineBuffer();

  constructor(options: ControlClientOptions = {}) {
    this.host = options.host ?? DEFAULT_CONFIG.host;
    this.port = options.port ?? DEFAULT_CONFIG.port;
    this.udpPort = options.udpPort ?? this.port + 1;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs;
    this.maxDatagramBytes = options.maxDatagramBytes ?? DEFAULT_CONFIG.maxDatagramBytes;
    this.logger = options.logger ?? noopLogger;
  }

  get isConnected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  /** Open the TCP connection and the UDP socket. */
  async connect(): Promise<void> {
    if (this.isConnected) return;

    const socket = netConnect(this.port, this.host);
    await new Promise<void>((resolve, reject) => {
      socket.once("connect", () => {
        socket.off("error", reject);
        resolve();
      });
      socket.once("error", reject);
    });
    socket.setNoDelay(true);

    this.buffer = new NDJSONLineBuffer();
    socket.on("data", (chunk: Buffer) => this.onData(chunk));
    socket.on("error", (err) => {
      this.logger.warn("Control connection error", { component: "client", error: err });
    });
    socket.on("close", () => {
      if (this.socket === socket) this.socket = null;
      this.failPending(new CueBridgeError("Connection closed", "CONNECTION_CLOSED"));
    });
    this.socket = socket;

    this.udp ??= createSocket(isIPv6(this.host) ? "udp6" : "udp4");
  }

  /** Send over TCP and wait for the result. */
  send(name: CommandName, params: CommandParams = {}, options: SendOptions = {}): Promise<JsonValue> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.reject(new CueBridgeError("Not connected", "NOT_CONNECTED"));
    }
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    return new Promise<JsonValue>((resolve, reject) => {
      const entry: PendingRequest = {
        commandName: name,
        resolve,
        reject,
        abandoned: false,
        timer: setTimeout(() => {
          entry.abandoned = true;
          reject(new TimeoutError(`No response to ${name} within ${timeoutMs}ms`));
        }, timeoutMs),
      };
      this.pending.push(entry);
      socket.write(serializeNDJSON({ type: name, params }));
    });
  }

  /** Fire-and-forget over UDP. Only UDP-eligible commands are accepted. */
  sendUdp(name: CommandName, params: CommandParams = {}): Promise<void> {
    if (!isUdpEligible(name)) {
      return Promise.reject(new TransportNotAllowedError(name, "udp"));
    }
    const udp = this.udp;
    if (!udp) return Promise.reject(new CueBridgeError("Not connected", "NOT_CONNECTED"));

    const payload = Buffer.from(JSON.stringify({ type: name, params }));
    if (payload.length > this.maxDatagramBytes) {
      return Promise.reject(
        new CueBridgeError(
          `Datagram of ${payload.length} bytes exceeds ${this.maxDatagramBytes}`,
          "DATAGRAM_TOO_LARGE",
        ),
      );
    }

    return new Promise((resolve, reject) => {
      udp.send(payload, this.udpPort, this.host, (err) => (err ? reject(err) : resolve()));
    });
  }

  /**
   * UDP when the command allows it and fits in a datagram (resolves with
   * undefined), TCP otherwise (resolves with the result).
   */
  async dispatch(name: CommandName, params: CommandParams = {}): Promise<JsonValue | undefined> {
    const size = Buffer.byteLength(JSON.stringify({ type: name, params }));
    if (isUdpEligible(name) && size <= this.maxDatagramBytes) {
      await this.sendUdp(name, params);
      return undefined;
    }
    return this.send(name, params);
  }

  /** Close both sockets. Pending requests reject. */
  async close(): Promise<void> {
    const socket = this.socket;
    const udp = this.udp;
    this.socket = null;
    this.udp = null;

    if (udp) await new Promise<void>((resolve) => udp.close(() => resolve()));
    if (socket && !socket.destroyed) {
      const closed = new Promise<void>((resolve) => socket.once("close", () => resolve()));
      socket.destroy();
      await closed;
    }
    this.failPending(new CueBridgeError("Connection closed", "CONNECTION_CLOSED"));
  }

  private onData(chunk: Buffer): void {
    for (const frame of this.buffer.feed(chunk)) {
      if (frame.kind !== "line") continue;
      this.onLine(frame.line);
    }
  }

  private onLine(line: string): void {
    const entry = this.pending.shift();
    if (!entry) {
      this.logger.warn("Unexpected response with no pending request", { component: "client" });
      return;
    }
    clearTimeout(entry.timer);

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      this.protocolError(entry, new ParseError("Malformed response from server", { cause: err }));
      return;
    }
    const outcome = outcomeSchema.safeParse(parsed);
    if (!outcome.success) {
      this.protocolError(entry, new ParseError("Unrecognized response from server"));
      return;
    }

    if (entry.abandoned) return;
    if (outcome.data.status === "success") {
      entry.resolve(outcome.data.result);
    } else {
      entry.reject(
        new RemoteCommandError(entry.commandName, outcome.data.message, outcome.data.kind),
      );
    }
  }

  /** Correlation is lost once a response cannot be read; drop the connection. */
  private protocolError(entry: PendingRequest, err: ParseError): void {
    if (!entry.abandoned) entry.reject(err);
    this.failPending(err);
    this.socket?.destroy();
  }

  private failPending(err: Error): void {
    for (const entry of this.pending.splice(0)) {
      clearTimeout(entry.timer);
      if (!entry.abandoned) entry.reject(err);
    }
  }
}
