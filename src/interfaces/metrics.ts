/**
 * Metrics events for the dispatch path: connections, command outcomes,
 * rate limiting and queue depth.
 */

import type { ErrorKind } from "../errors.js";
import type { Transport } from "../types/commands.js";

export interface MetricsEvent {
  timestamp: number; // Unix timestamp in milliseconds
  type: string;
}

/** Connection events (TCP only) */
export interface ConnectionOpenedEvent extends MetricsEvent {
  type: "connection:opened";
  connectionId: number;
  remoteAddress?: string;
}

export interface ConnectionClosedEvent extends MetricsEvent {
  type: "connection:closed";
  connectionId: number;
  reason: "end" | "error" | "shutdown";
}

/** Command events */
export interface CommandReceivedEvent extends MetricsEvent {
  type: "command:received";
  transport: Transport;
  commandName: string;
}

export interface CommandRejectedEvent extends MetricsEvent {
  type: "command:rejected";
  transport: Transport;
  kind: ErrorKind;
  commandName?: string;
}

export interface CommandExecutedEvent extends MetricsEvent {
  type: "command:executed";
  transport: Transport;
  commandName: string;
  outcome: "success" | "error";
  durationMs: number;
}

export interface CommandTimeoutEvent extends MetricsEvent {
  type: "command:timeout";
  commandName: string;
  timeoutMs: number;
}

/** Rate limiting events */
export interface RateLimitExceededEvent extends MetricsEvent {
  type: "ratelimit:exceeded";
  source: string;
}

/** Serializer backlog after each submission */
export interface QueueDepthEvent extends MetricsEvent {
  type: "queue:depth";
  depth: number;
}

/** Union of all metrics events */
export type MetricsEventType =
  | ConnectionOpenedEvent
  | ConnectionClosedEvent
  | CommandReceivedEvent
  | CommandRejectedEvent
  | CommandExecutedEvent
  | CommandTimeoutEvent
  | RateLimitExceededEvent
  | QueueDepthEvent;

export interface MetricsCollector {
  recordEvent(event: MetricsEventType): void;

  /** Current counters (optional). */
  getStats?(): Record<string, unknown>;

  /** Reset counters (optional). */
  reset?(): void;
}
