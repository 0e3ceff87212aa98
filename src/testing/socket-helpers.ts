import { createSocket, type Socket as UdpSocket } from "node:dgram";
import { once } from "node:events";
import { connect, type Socket } from "node:net";
import { NDJSONLineBuffer } from "../utils/ndjson.js";

/** Raw NDJSON peer for exercising the TCP listener. */
export interface LineClient {
  readonly socket: Socket;
  /** Write one value as a JSON line. */
  send(value: unknown): void;
  /** Write bytes exactly as given. */
  sendRaw(text: string): void;
  /** Next response line, parsed. */
  next(timeoutMs?: number): Promise<unknown>;
  /** Resolves when the server closes the connection. */
  readonly closed: Promise<void>;
  close(): Promise<void>;
}

export async function connectLineClient(port: number, host = "127.0.0.1"): Promise<LineClient> {
  const socket = connect(port, host);
  socket.setNoDelay(true);
  await once(socket, "connect");

  const buffer = new NDJSONLineBuffer();
  const lines: string[] = [];
  const waiters: Array<(line: string) => void> = [];

  socket.on("data", (chunk: Buffer) => {
    for (const frame of buffer.feed(chunk)) {
      if (frame.kind !== "line") continue;
      const waiter = waiters.shift();
      if (waiter) waiter(frame.line);
      else lines.push(frame.line);
    }
  });
  // Resets after a server-side destroy surface through `closed`
  socket.on("error", () => {});
  const closed = new Promise<void>((resolve) => socket.once("close", () => resolve()));

  return {
    socket,
    closed,
    send(value) {
      socket.write(`${JSON.stringify(value)}\n`);
    },
    sendRaw(text) {
      socket.write(text);
    },
    next(timeoutMs = 2000) {
      const line = lines.shift();
      if (line !== undefined) return Promise.resolve(JSON.parse(line));
      return new Promise((resolve, reject) => {
        const timer = setTimeout(() => {
          const idx = waiters.indexOf(onLine);
          if (idx !== -1) waiters.splice(idx, 1);
          reject(new Error("No response line in time"));
        }, timeoutMs);
        const onLine = (l: string) => {
          clearTimeout(timer);
          resolve(JSON.parse(l));
        };
        waiters.push(onLine);
      });
    },
    async close() {
      if (socket.destroyed) return;
      socket.destroy();
      await closed;
    },
  };
}

/** UDP sender that also records anything the server might send back. */
export interface DatagramSender {
  send(payload: string | Buffer): Promise<void>;
  readonly received: Buffer[];
  close(): Promise<void>;
}

export async function createDatagramSender(port: number, host = "127.0.0.1"): Promise<DatagramSender> {
  const socket: UdpSocket = createSocket("udp4");
  const received: Buffer[] = [];
  socket.on("message", (msg) => received.push(msg));
  await new Promise<void>((resolve) => socket.bind(0, "127.0.0.1", () => resolve()));

  return {
    received,
    send(payload) {
      return new Promise((resolve, reject) => {
        socket.send(payload, port, host, (err) => (err ? reject(err) : resolve()));
      });
    },
    close() {
      return new Promise((resolve) => socket.close(() => resolve()));
    },
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
