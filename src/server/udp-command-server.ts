/**
 * UDP command listener: one datagram is one command, submitted without a
 * completion handle. Nothing is ever sent back; failures are logged and the
 * datagram is dropped.
 */

import { createSocket, type RemoteInfo, type Socket } from "node:dgram";
import { isIPv6 } from "node:net";
import { noopLogger } from "../adapters/noop-logger.js";
import { noopMetrics } from "../adapters/noop-metrics-collector.js";
import { KeyedRateLimiter } from "../adapters/token-bucket-limiter.js";
import { decodeCommand } from "../core/command-decoder.js";
import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector } from "../interfaces/metrics.js";
import type { RateLimiter } from "../interfaces/rate-limiter.js";
import type { TaskSink } from "../interfaces/task-sink.js";
import type { BoundAddress, UdpRateLimit } from "../types/config.js";

export interface UdpCommandServerOptions {
  host: string;
  /** 0 binds an ephemeral port. */
  port: number;
  sink: TaskSink;
  /** Larger datagrams are dropped unread (default: 2048). */
  maxDatagramBytes?: number;
  /** Per-sender budget; null or omitted disables limiting. */
  rateLimit?: UdpRateLimit | null;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export class UdpCommandServer {
  private socket: Socket | null = null;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly limiter: RateLimiter | null;
  private readonly maxDatagramBytes: number;

  constructor(private readonly options: UdpCommandServerOptions) {
    this.logger = options.logger ?? noopLogger;
    this.metrics = options.metrics ?? noopMetrics;
    this.maxDatagramBytes = options.maxDatagramBytes ?? 2048;
    this.limiter = options.rateLimit
      ? new KeyedRateLimiter({
          capacity: options.rateLimit.burstSize,
          tokensPerSecond: options.rateLimit.datagramsPerSecond,
        })
      : null;
  }

  /** Bound address after listen(). */
  get address(): BoundAddress | undefined {
    if (!this.socket) return undefined;
    const { address, port } = this.socket.address();
    return { address, port };
  }

  /** Bind the socket. Rejects with the bind error (e.g. EADDRINUSE). */
  listen(): Promise<BoundAddress> {
    if (this.socket) return Promise.reject(new Error("UDP server is already listening"));

    const socket = createSocket(isIPv6(this.options.host) ? "udp6" : "udp4");
    this.socket = socket;

    return new Promise((resolve, reject) => {
      const onBindError = (err: Error) => {
        this.socket = null;
        socket.close();
        reject(err);
      };
      socket.once("error", onBindError);
      socket.bind(this.options.port, this.options.host, () => {
        socket.off("error", onBindError);
        socket.on("error", (err) => {
          this.logger.error("UDP socket error", { component: "udp-server", error: err });
        });
        socket.on("message", (msg, rinfo) => this.handleDatagram(msg, rinfo));
        const { address, port } = socket.address();
        resolve({ address, port });
      });
    });
  }

  /** Close the socket. Safe to call when not listening. */
  close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.limiter?.clear();
    if (!socket) return Promise.resolve();
    return new Promise((resolve) => socket.close(() => resolve()));
  }

  private handleDatagram(msg: Buffer, rinfo: RemoteInfo): void {
    const source = `${rinfo.address}:${rinfo.port}`;

    if (msg.length > this.maxDatagramBytes) {
      this.logger.debug?.("Dropped oversized datagram", {
        component: "udp-server",
        source,
        bytes: msg.length,
      });
      this.reject("ParseError");
      return;
    }

    const decoded = decodeCommand(msg.toString("utf8"), "udp");
    if (!decoded.ok) {
      this.logger.debug?.("Dropped datagram", {
        component: "udp-server",
        source,
        commandName: decoded.commandName,
        error: decoded.error.message,
      });
      this.reject(decoded.error.name, decoded.commandName);
      return;
    }

    const { command } = decoded;
    if (this.limiter && !this.limiter.tryConsume(source)) {
      this.metrics.recordEvent({ type: "ratelimit:exceeded", timestamp: Date.now(), source });
      return;
    }

    this.metrics.recordEvent({
      type: "command:received",
      timestamp: Date.now(),
      transport: "udp",
      commandName: command.name,
    });
    if (!this.options.sink.submit({ command })) {
      this.logger.debug?.("Datagram refused during shutdown", {
        component: "udp-server",
        commandName: command.name,
      });
    }
  }

  private reject(
    kind: "ParseError" | "UnknownCommandError" | "TransportNotAllowedError",
    commandName?: string,
  ): void {
    this.metrics.recordEvent({
      type: "command:rejected",
      timestamp: Date.now(),
      transport: "udp",
      kind,
      commandName,
    });
  }
}
