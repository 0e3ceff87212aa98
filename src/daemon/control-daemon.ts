import { setImmediate as nextTurn } from "node:timers/promises";
import { noopLogger } from "../adapters/noop-logger.js";
import { noopMetrics } from "../adapters/noop-metrics-collector.js";
import { ExecutionSerializer } from "../core/execution-serializer.js";
import type { HostApiAdapter } from "../interfaces/host-api.js";
import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector } from "../interfaces/metrics.js";
import { TcpCommandServer } from "../server/tcp-command-server.js";
import { UdpCommandServer } from "../server/udp-command-server.js";
import {
  type BoundAddress,
  type ResolvedConfig,
  resolveConfig,
  type ServerConfig,
} from "../types/config.js";

export interface ControlDaemonOptions {
  host: HostApiAdapter;
  config: ServerConfig;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface DaemonAddresses {
  tcp: BoundAddress;
  udp: BoundAddress;
}

type DaemonState = "idle" | "starting" | "running" | "stopped";

/**
 * Owns the serializer and both listeners.
 *
 * start(): serializer, then TCP, then UDP. A bind failure closes whatever
 * opened and rejects. stop(): stop accepting, close UDP, drain in-flight tasks
 * for `shutdownGraceMs`, destroy remaining TCP connections, stop the serializer.
 */
export class ControlDaemon {
  readonly config: ResolvedConfig;
  private readonly serializer: ExecutionSerializer;
  private readonly tcp: TcpCommandServer;
  private readonly udp: UdpCommandServer;
  private readonly logger: Logger;
  private state: DaemonState = "idle";
  private bound: DaemonAddresses | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: ControlDaemonOptions) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? noopLogger;
    const metrics = options.metrics ?? noopMetrics;
    const { logger } = this;

    this.serializer = new ExecutionSerializer(options.host, { logger, metrics });
    this.tcp = new TcpCommandServer({
      host: this.config.host,
      port: this.config.port,
      sink: this.serializer,
      requestTimeoutMs: this.config.requestTimeoutMs,
      maxMessageBytes: this.config.maxMessageBytes,
      logger,
      metrics,
    });
    this.udp = new UdpCommandServer({
      host: this.config.host,
      port: this.config.udpPort,
      sink: this.serializer,
      maxDatagramBytes: this.config.maxDatagramBytes,
      rateLimit: this.config.udpRateLimit,
      logger,
      metrics,
    });
  }

  get isRunning(): boolean {
    return this.state === "running";
  }

  /** Bound listener addresses while running. */
  get addresses(): DaemonAddresses | undefined {
    return this.bound ?? undefined;
  }

  async start(): Promise<DaemonAddresses> {
    if (this.state !== "idle") throw new Error("ControlDaemon can only be started once");
    this.state = "starting";
    this.serializer.start();

    let bound: DaemonAddresses;
    try {
      const tcp = await this.tcp.listen();
      const udp = await this.udp.listen();
      bound = { tcp, udp };
    } catch (err) {
      this.logger.error("Failed to bind listeners", { component: "daemon", error: err });
      await Promise.all([this.tcp.close(), this.udp.close()]);
      this.serializer.stop();
      this.state = "stopped";
      throw err;
    }

    this.bound = bound;
    this.state = "running";
    this.logger.info("Control daemon listening", {
      component: "daemon",
      tcp: `${bound.tcp.address}:${bound.tcp.port}`,
      udp: `${bound.udp.address}:${bound.udp.port}`,
    });
    return bound;
  }

  /** Idempotent; concurrent callers share one shutdown. */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    if (this.state === "stopped") return;
    if (this.state === "idle") {
      this.serializer.stop();
      this.state = "stopped";
      return;
    }

    this.logger.info("Control daemon stopping", { component: "daemon" });
    this.tcp.stopAccepting();
    await this.udp.close();

    const drained = await this.serializer.drain(this.config.shutdownGraceMs);
    if (!drained) {
      this.logger.warn("Grace period elapsed with tasks in flight", {
        component: "daemon",
        graceMs: this.config.shutdownGraceMs,
        queued: this.serializer.depth,
      });
    }
    // Let replies to the last drained tasks reach their sockets
    await nextTurn();

    await this.tcp.close();
    this.serializer.stop();
    this.bound = null;
    this.state = "stopped";
    this.logger.info("Control daemon stopped", { component: "daemon" });
  }
}
