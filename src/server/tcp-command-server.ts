/**
 * TCP request/response listener.
 *
 * Each connection reads NDJSON requests and answers every one with exactly one
 * NDJSON envelope, in request order. A connection handles one request at a
 * time: request N+1 is not decoded until the reply to N has been written.
 *
 * Reading pauses while a connection has `MAX_QUEUED_REQUESTS` requests waiting
 * and while the peer is not reading replies, so a client that pipelines
 * faster than the host executes is held back by TCP flow control.
 */

import { createServer, type Server, type Socket } from "node:net";
import { noopLogger } from "../adapters/noop-logger.js";
import { noopMetrics } from "../adapters/noop-metrics-collector.js";
import { AsyncMessageQueue } from "../core/async-message-queue.js";
import { decodeCommand } from "../core/command-decoder.js";
import { CompletionHandle } from "../core/completion-handle.js";
import { errorEnvelope, serializeOutcome } from "../core/envelope.js";
import { ParseError, ShutdownError, TimeoutError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector } from "../interfaces/metrics.js";
import type { TaskSink } from "../interfaces/task-sink.js";
import type { Outcome } from "../types/commands.js";
import type { BoundAddress } from "../types/config.js";
import { type NDJSONFrame, NDJSONLineBuffer } from "../utils/ndjson.js";

export interface TcpCommandServerOptions {
  host: string;
  /** 0 binds an ephemeral port. */
  port: number;
  sink: TaskSink;
  /** How long a request waits for its outcome (default: 10000). */
  requestTimeoutMs?: number;
  /** Longest accepted request line (default: 1 MiB). */
  maxMessageBytes?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
}

type CloseReason = "end" | "error" | "shutdown";

/** Parsed requests a connection buffers before it stops reading the socket. */
export const MAX_QUEUED_REQUESTS = 64;

export class TcpCommandServer {
  private server: Server | null = null;
  private closed: Promise<void> = Promise.resolve();
  private readonly connections = new Map<number, TcpConnection>();
  private nextConnectionId = 1;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(private readonly options: TcpCommandServerOptions) {
    this.logger = options.logger ?? noopLogger;
    this.metrics = options.metrics ?? noopMetrics;
  }

  get address(): BoundAddress | undefined {
    const addr = this.server?.address();
    if (addr && typeof addr === "object") return { address: addr.address, port: addr.port };
    return undefined;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /** Bind and start accepting. Rejects with the bind error (e.g. EADDRINUSE). */
  listen(): Promise<BoundAddress> {
    if (this.server) return Promise.reject(new Error("TCP server is already listening"));

    // Half-open so a client that ends its side after writing still gets replies
    const server = createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));
    this.server = server;
    this.closed = new Promise((resolve) => server.once("close", () => resolve()));

    return new Promise((resolve, reject) => {
      const onBindError = (err: Error) => {
        this.server = null;
        this.closed = Promise.resolve();
        reject(err);
      };
      server.once("error", onBindError);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", onBindError);
        server.on("error", (err) => {
          this.logger.error("TCP server error", { component: "tcp-server", error: err });
        });
        const addr = server.address();
        if (addr && typeof addr === "object") {
          resolve({ address: addr.address, port: addr.port });
        } else {
          reject(new Error("TCP server bound to an unexpected address"));
        }
      });
    });
  }

  /** Close the listening socket. Live connections keep being served. */
  stopAccepting(): void {
    const server = this.server;
    if (!server?.listening) return;
    server.close();
  }

  /** Destroy every live connection. Their outstanding tasks still execute. */
  closeConnections(): void {
    for (const connection of this.connections.values()) {
      connection.destroy();
    }
  }

  /** stopAccepting() + closeConnections(), resolving once the server is fully closed. */
  async close(): Promise<void> {
    this.stopAccepting();
    this.closeConnections();
    await this.closed;
    this.server = null;
  }

  private accept(socket: Socket): void {
    const id = this.nextConnectionId++;
    const remoteAddress =
      socket.remoteAddress !== undefined ? `${socket.remoteAddress}:${socket.remotePort}` : undefined;

    const connection = new TcpConnection(id, socket, {
      sink: this.options.sink,
      requestTimeoutMs: this.options.requestTimeoutMs ?? 10_000,
      maxMessageBytes: this.options.maxMessageBytes ?? 1_048_576,
      logger: this.logger,
      metrics: this.metrics,
    });
    this.connections.set(id, connection);

    this.metrics.recordEvent({
      type: "connection:opened",
      timestamp: Date.now(),
      connectionId: id,
      remoteAddress,
    });

    connection.closed
      .then((reason) => {
        this.connections.delete(id);
        this.metrics.recordEvent({
          type: "connection:closed",
          timestamp: Date.now(),
          connectionId: id,
          reason,
        });
      })
      .catch((err: unknown) => {
        this.logger.error("Connection teardown failed", {
          component: "tcp-server",
          connectionId: id,
          error: err,
        });
      });
  }
}

interface ConnectionDeps {
  sink: TaskSink;
  requestTimeoutMs: number;
  maxMessageBytes: number;
  logger: Logger;
  metrics: MetricsCollector;
}

/** Serves one socket until it closes. */
class TcpConnection {
  /** Resolves with the close reason once the socket is gone. */
  readonly closed: Promise<CloseReason>;
  private readonly frames = new AsyncMessageQueue<NDJSONFrame>();
  private readonly buffer: NDJSONLineBuffer;
  private shuttingDown = false;
  private hadError = false;
  private readPaused = false;

  constructor(
    private readonly id: number,
    private readonly socket: Socket,
    private readonly deps: ConnectionDeps,
  ) {
    this.buffer = new NDJSONLineBuffer({ maxLineBytes: deps.maxMessageBytes });

    socket.on("data", (chunk: Buffer) => {
      for (const frame of this.buffer.feed(chunk)) this.frames.enqueue(frame);
      if (!this.readPaused && this.frames.size >= MAX_QUEUED_REQUESTS) {
        this.readPaused = true;
        socket.pause();
      }
    });
    // Peer finished sending: answer what is queued, then end our side
    socket.on("end", () => this.frames.finish());
    socket.on("error", (err) => {
      this.hadError = true;
      deps.logger.debug?.("Connection error", {
        component: "tcp-server",
        connectionId: id,
        error: err.message,
      });
    });

    this.closed = new Promise((resolve) => {
      socket.once("close", () => {
        // Abandon unanswered requests; tasks already submitted still run
        this.frames.takeAll();
        this.frames.finish();
        resolve(this.shuttingDown ? "shutdown" : this.hadError ? "error" : "end");
      });
    });

    this.serve().catch((err: unknown) => {
      deps.logger.error("Connection handler failed", {
        component: "tcp-server",
        connectionId: id,
        error: err,
      });
      socket.destroy();
    });
  }

  destroy(): void {
    this.shuttingDown = true;
    this.socket.destroy();
  }

  private async serve(): Promise<void> {
    for await (const frame of this.frames) {
      if (this.readPaused && this.frames.size < MAX_QUEUED_REQUESTS) {
        this.readPaused = false;
        this.socket.resume();
      }
      const outcome = await this.handle(frame);
      if (this.socket.destroyed) return;
      if (!this.socket.write(serializeOutcome(outcome))) await this.writable();
    }
    if (!this.socket.destroyed) this.socket.end();
  }

  /** Resolves on "drain", or on "close" if the socket goes away first. */
  private writable(): Promise<void> {
    const { socket } = this;
    return new Promise((resolve) => {
      const done = () => {
        socket.off("drain", done);
        socket.off("close", done);
        resolve();
      };
      socket.on("drain", done);
      socket.on("close", done);
    });
  }

  private async handle(frame: NDJSONFrame): Promise<Outcome> {
    const { sink, requestTimeoutMs, maxMessageBytes, metrics } = this.deps;

    if (frame.kind === "overflow") {
      metrics.recordEvent({
        type: "command:rejected",
        timestamp: Date.now(),
        transport: "tcp",
        kind: "ParseError",
      });
      return errorEnvelope(new ParseError(`Message exceeds ${maxMessageBytes} bytes`));
    }

    const decoded = decodeCommand(frame.line, "tcp");
    if (!decoded.ok) {
      metrics.recordEvent({
        type: "command:rejected",
        timestamp: Date.now(),
        transport: "tcp",
        kind: decoded.error.name,
        commandName: decoded.commandName,
      });
      return errorEnvelope(decoded.error);
    }

    const { command } = decoded;
    metrics.recordEvent({
      type: "command:received",
      timestamp: Date.now(),
      transport: "tcp",
      commandName: command.name,
    });

    const completion = new CompletionHandle<Outcome>();
    if (!sink.submit({ command, completion }) && !completion.isSettled) {
      return errorEnvelope(new ShutdownError());
    }

    try {
      return await completion.wait(requestTimeoutMs);
    } catch (err) {
      if (err instanceof TimeoutError) {
        metrics.recordEvent({
          type: "command:timeout",
          timestamp: Date.now(),
          commandName: command.name,
          timeoutMs: requestTimeoutMs,
        });
        this.deps.logger.debug?.("Request timed out", {
          component: "tcp-server",
          connectionId: this.id,
          command: command.name,
        });
      }
      return errorEnvelope(err);
    }
  }
}
