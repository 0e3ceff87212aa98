import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Logger } from "../interfaces/logger.js";
import { ConsoleMetricsCollector } from "./console-metrics-collector.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createMockLogger(): Logger & {
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
} {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

const ts = Date.now();

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("ConsoleMetricsCollector", () => {
  let logger: ReturnType<typeof createMockLogger>;
  let collector: ConsoleMetricsCollector;

  beforeEach(() => {
    logger = createMockLogger();
    collector = new ConsoleMetricsCollector(logger);
  });

  describe("connections", () => {
    it("counts open connections and logs both edges", () => {
      collector.recordEvent({
        type: "connection:opened",
        timestamp: ts,
        connectionId: 1,
        remoteAddress: "127.0.0.1:50000",
      });
      collector.recordEvent({ type: "connection:opened", timestamp: ts, connectionId: 2 });
      collector.recordEvent({
        type: "connection:closed",
        timestamp: ts,
        connectionId: 1,
        reason: "end",
      });

      expect(collector.getStats().openConnections).toBe(1);
      expect(logger.info).toHaveBeenCalledWith("Client connected", {
        component: "metrics",
        connectionId: 1,
        remoteAddress: "127.0.0.1:50000",
      });
      expect(logger.info).toHaveBeenCalledWith("Client disconnected", {
        component: "metrics",
        connectionId: 1,
        reason: "end",
      });
    });

    it("never goes below zero open connections", () => {
      collector.recordEvent({
        type: "connection:closed",
        timestamp: ts,
        connectionId: 9,
        reason: "shutdown",
      });
      expect(collector.getStats().openConnections).toBe(0);
    });
  });

  describe("commands", () => {
    it("counts received commands per transport", () => {
      collector.recordEvent({
        type: "command:received",
        timestamp: ts,
        transport: "tcp",
        commandName: "get_session_info",
      });
      collector.recordEvent({
        type: "command:received",
        timestamp: ts,
        transport: "udp",
        commandName: "set_track_volume",
      });
      collector.recordEvent({
        type: "command:received",
        timestamp: ts,
        transport: "udp",
        commandName: "set_track_pan",
      });

      expect(collector.getStats().received).toEqual({ tcp: 1, udp: 2 });
    });

    it("counts outcomes and rejections", () => {
      collector.recordEvent({
        type: "command:executed",
        timestamp: ts,
        transport: "tcp",
        commandName: "set_tempo",
        outcome: "success",
        durationMs: 2,
      });
      collector.recordEvent({
        type: "command:executed",
        timestamp: ts,
        transport: "tcp",
        commandName: "delete_track",
        outcome: "error",
        durationMs: 1,
      });
      collector.recordEvent({
        type: "command:rejected",
        timestamp: ts,
        transport: "udp",
        kind: "TransportNotAllowedError",
        commandName: "delete_track",
      });

      const stats = collector.getStats();
      expect(stats.executed).toEqual({ success: 1, error: 1 });
      expect(stats.rejected).toBe(1);
    });

    it("warns on timeouts", () => {
      collector.recordEvent({
        type: "command:timeout",
        timestamp: ts,
        commandName: "load_browser_item",
        timeoutMs: 10_000,
      });

      expect(collector.getStats().timeouts).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith("Command timed out", {
        component: "metrics",
        commandName: "load_browser_item",
        timeoutMs: 10_000,
      });
    });
  });

  describe("rate limiting and queue depth", () => {
    it("counts rate-limited datagrams", () => {
      collector.recordEvent({ type: "ratelimit:exceeded", timestamp: ts, source: "10.0.0.5:4000" });
      expect(collector.getStats().rateLimited).toBe(1);
    });

    it("tracks the deepest queue seen", () => {
      collector.recordEvent({ type: "queue:depth", timestamp: ts, depth: 3 });
      collector.recordEvent({ type: "queue:depth", timestamp: ts, depth: 7 });
      collector.recordEvent({ type: "queue:depth", timestamp: ts, depth: 1 });

      expect(collector.getStats().maxQueueDepth).toBe(7);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("warns at every hundredth queued task", () => {
      collector.recordEvent({ type: "queue:depth", timestamp: ts, depth: 99 });
      collector.recordEvent({ type: "queue:depth", timestamp: ts, depth: 100 });
      collector.recordEvent({ type: "queue:depth", timestamp: ts, depth: 150 });
      collector.recordEvent({ type: "queue:depth", timestamp: ts, depth: 200 });

      expect(logger.warn).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenLastCalledWith("Queue depth warning", {
        component: "metrics",
        depth: 200,
      });
    });
  });

  it("getStats() returns a copy", () => {
    const stats = collector.getStats();
    stats.received.tcp = 42;
    expect(collector.getStats().received.tcp).toBe(0);
  });

  it("reset() clears every counter", () => {
    collector.recordEvent({ type: "ratelimit:exceeded", timestamp: ts, source: "a" });
    collector.recordEvent({ type: "queue:depth", timestamp: ts, depth: 4 });
    collector.reset();

    expect(collector.getStats()).toEqual({
      openConnections: 0,
      received: { tcp: 0, udp: 0 },
      rejected: 0,
      executed: { success: 0, error: 0 },
      timeouts: 0,
      rateLimited: 0,
      maxQueueDepth: 0,
    });
  });
});
