import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector, MetricsEventType } from "../interfaces/metrics.js";

const QUEUE_DEPTH_WARNING = 100;

export type DispatchStats = {
  openConnections: number;
  received: { tcp: number; udp: number };
  rejected: number;
  executed: { success: number; error: number };
  timeouts: number;
  rateLimited: number;
  maxQueueDepth: number;
};

function emptyStats(): DispatchStats {
  return {
    openConnections: 0,
    received: { tcp: 0, udp: 0 },
    rejected: 0,
    executed: { success: 0, error: 0 },
    timeouts: 0,
    rateLimited: 0,
    maxQueueDepth: 0,
  };
}

/**
 * Logger-backed metrics collector.
 * Keeps dispatch counters and logs the events worth an operator's attention.
 */
export class ConsoleMetricsCollector implements MetricsCollector {
  private stats = emptyStats();

  constructor(private logger: Logger) {}

  recordEvent(event: MetricsEventType): void {
    switch (event.type) {
      case "connection:opened":
        this.stats.openConnections++;
        this.logger.info("Client connected", {
          component: "metrics",
          connectionId: event.connectionId,
          remoteAddress: event.remoteAddress,
        });
        break;

      case "connection:closed":
        this.stats.openConnections = Math.max(0, this.stats.openConnections - 1);
        this.logger.info("Client disconnected", {
          component: "metrics",
          connectionId: event.connectionId,
          reason: event.reason,
        });
        break;

      case "command:received":
        this.stats.received[event.transport]++;
        this.logger.debug?.("Command received", {
          component: "metrics",
          transport: event.transport,
          commandName: event.commandName,
        });
        break;

      case "command:rejected":
        this.stats.rejected++;
        this.logger.debug?.("Command rejected", {
          component: "metrics",
          transport: event.transport,
          kind: event.kind,
          commandName: event.commandName,
        });
        break;

      case "command:executed":
        this.stats.executed[event.outcome]++;
        this.logger.debug?.("Command executed", {
          component: "metrics",
          transport: event.transport,
          commandName: event.commandName,
          outcome: event.outcome,
          durationMs: event.durationMs,
        });
        break;

      case "command:timeout":
        this.stats.timeouts++;
        this.logger.warn("Command timed out", {
          component: "metrics",
          commandName: event.commandName,
          timeoutMs: event.timeoutMs,
        });
        break;

      case "ratelimit:exceeded":
        this.stats.rateLimited++;
        this.logger.debug?.("Rate limit exceeded", { component: "metrics", source: event.source });
        break;

      case "queue:depth":
        this.stats.maxQueueDepth = Math.max(this.stats.maxQueueDepth, event.depth);
        if (event.depth >= QUEUE_DEPTH_WARNING && event.depth % QUEUE_DEPTH_WARNING === 0) {
          this.logger.warn("Queue depth warning", { component: "metrics", depth: event.depth });
        }
        break;
    }
  }

  getStats(): DispatchStats {
    return {
      ...this.stats,
      received: { ...this.stats.received },
      executed: { ...this.stats.executed },
    };
  }

  reset(): void {
    this.stats = emptyStats();
  }
}
