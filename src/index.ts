/**
 * cuebridge public API barrel.
 *
 * Re-exports the daemon, both listeners, the execution serializer, the
 * command model and the adapters that make up the public surface of the
 * `cuebridge` package.
 * @module
 */

// Adapters
export { ConsoleMetricsCollector, type DispatchStats } from "./adapters/console-metrics-collector.js";
export { InMemoryHost, type InMemoryHostOptions } from "./adapters/in-memory-host.js";
export { NoopLogger, noopLogger } from "./adapters/noop-logger.js";
export { noopMetrics } from "./adapters/noop-metrics-collector.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export {
  type Clock,
  KeyedRateLimiter,
  type KeyedRateLimiterOptions,
  TokenBucketLimiter,
} from "./adapters/token-bucket-limiter.js";
// Client
export {
  ControlClient,
  type ControlClientOptions,
  RemoteCommandError,
  type SendOptions,
} from "./client/control-client.js";
export { serverConfigSchema } from "./config/config-schema.js";
// Core
export { AsyncMessageQueue } from "./core/async-message-queue.js";
export {
  checkTransport,
  classificationTable,
  classify,
  isUdpEligible,
  type TransportCheck,
} from "./core/command-classifier.js";
export { type DecodeResult, decodeCommand } from "./core/command-decoder.js";
export { CompletionHandle } from "./core/completion-handle.js";
export { errorEnvelope, serializeOutcome, successEnvelope } from "./core/envelope.js";
export {
  ExecutionSerializer,
  type ExecutionSerializerOptions,
} from "./core/execution-serializer.js";
// Daemon
export {
  ControlDaemon,
  type ControlDaemonOptions,
  type DaemonAddresses,
} from "./daemon/control-daemon.js";
export { registerSignalHandlers, type SignalHandlerOptions } from "./daemon/signal-handler.js";
// Errors
export {
  CueBridgeError,
  ERROR_KINDS,
  type ErrorKind,
  errorMessage,
  HostError,
  isErrorKind,
  ParseError,
  ShutdownError,
  TimeoutError,
  TransportNotAllowedError,
  toCueBridgeError,
  UnknownCommandError,
} from "./errors.js";
// Interfaces
export type { HostApiAdapter } from "./interfaces/host-api.js";
export type { LogContext, Logger } from "./interfaces/logger.js";
export type { MetricsCollector, MetricsEventType } from "./interfaces/metrics.js";
export type { RateLimiter } from "./interfaces/rate-limiter.js";
export type { TaskSink } from "./interfaces/task-sink.js";
// Servers
export { TcpCommandServer, type TcpCommandServerOptions } from "./server/tcp-command-server.js";
export { UdpCommandServer, type UdpCommandServerOptions } from "./server/udp-command-server.js";
// Types
export {
  type ClassificationEntry,
  type Command,
  COMMAND_NAMES,
  type CommandName,
  type CommandParams,
  type Criticality,
  type ErrorEnvelope,
  type ExecutionTask,
  isCommandName,
  type JsonObject,
  type JsonValue,
  type Outcome,
  type SuccessEnvelope,
  type Transport,
} from "./types/commands.js";
export {
  type BoundAddress,
  DEFAULT_CONFIG,
  DEFAULT_UDP_RATE_LIMIT,
  type ResolvedConfig,
  resolveConfig,
  type ServerConfig,
  type UdpRateLimit,
} from "./types/config.js";
export { type CommandRequest, commandRequestSchema, outcomeSchema } from "./types/wire-schema.js";
export { type NDJSONFrame, NDJSONLineBuffer, serializeNDJSON } from "./utils/ndjson.js";
