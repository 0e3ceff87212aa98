/**
 * ExecutionSerializer: the only caller of the host API.
 *
 * Tasks from every TCP connection and the UDP loop share one FIFO queue with
 * a single consumer. Each task runs to completion (including an async host
 * call) before the next one starts, so host calls never overlap or reorder.
 *
 * Task lifecycle: queued → executing → completed. TCP tasks settle their
 * completion handle exactly once; UDP outcomes are dropped, errors logged.
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { noopMetrics } from "../adapters/noop-metrics-collector.js";
import { errorMessage, HostError, ShutdownError } from "../errors.js";
import type { HostApiAdapter } from "../interfaces/host-api.js";
import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector } from "../interfaces/metrics.js";
import type { TaskSink } from "../interfaces/task-sink.js";
import type { ExecutionTask, Outcome } from "../types/commands.js";
import { AsyncMessageQueue } from "./async-message-queue.js";
import { errorEnvelope, successEnvelope } from "./envelope.js";

export interface ExecutionSerializerOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
}

interface QueuedTask {
  readonly task: ExecutionTask;
  /** Submission order, strictly increasing. */
  readonly seq: number;
}

export class ExecutionSerializer implements TaskSink {
  private readonly queue = new AsyncMessageQueue<QueuedTask>();
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private loop: Promise<void> | null = null;
  private current: QueuedTask | null = null;
  private accepting = true;
  private stopped = false;
  private nextSeq = 1;
  private readonly idleWaiters = new Set<() => void>();

  constructor(
    private readonly host: HostApiAdapter,
    options: ExecutionSerializerOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger;
    this.metrics = options.metrics ?? noopMetrics;
  }

  /** Start the consumer loop. Tasks submitted earlier are kept in order. */
  start(): void {
    if (this.stopped) throw new Error("ExecutionSerializer has been stopped");
    if (this.loop) return;
    this.loop = this.run().catch((err) => {
      this.logger.error("Serializer loop crashed", { component: "serializer", error: err });
    });
  }

  /**
   * Enqueue a task. Safe to call from any connection handler. After drain()
   * or stop() the task is refused and its handle settled with a shutdown error.
   */
  submit(task: ExecutionTask): boolean {
    if (!this.accepting || !this.queue.enqueue({ task, seq: this.nextSeq++ })) {
      task.completion?.settle(errorEnvelope(new ShutdownError()));
      return false;
    }
    this.metrics.recordEvent({
      type: "queue:depth",
      timestamp: Date.now(),
      depth: this.queue.size,
    });
    return true;
  }

  /** Tasks waiting behind the one executing. */
  get depth(): number {
    return this.queue.size;
  }

  get isIdle(): boolean {
    return this.current === null && this.queue.size === 0;
  }

  /**
   * Stop accepting tasks and wait for everything already queued to finish.
   * Resolves false if `graceMs` elapses first.
   */
  drain(graceMs: number): Promise<boolean> {
    this.accepting = false;
    if (this.isIdle) return Promise.resolve(true);

    return new Promise<boolean>((resolve) => {
      const onIdle = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.idleWaiters.delete(onIdle);
        resolve(false);
      }, graceMs);
      this.idleWaiters.add(onIdle);
    });
  }

  /**
   * Refuse new tasks, fail the ones still queued and end the loop once the
   * executing task (if any) returns. Does not wait for a stuck host call.
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.accepting = false;

    const dropped = this.queue.takeAll();
    for (const { task } of dropped) {
      task.completion?.settle(errorEnvelope(new ShutdownError()));
    }
    if (dropped.length > 0) {
      this.logger.warn("Dropped queued tasks on shutdown", {
        component: "serializer",
        count: dropped.length,
      });
    }
    this.queue.finish();
  }

  /** Resolves when the consumer loop has exited. */
  async whenStopped(): Promise<void> {
    await this.loop;
  }

  private async run(): Promise<void> {
    for await (const entry of this.queue) {
      this.current = entry;
      try {
        await this.execute(entry);
      } catch (err) {
        // Never let one task end the loop
        this.logger.error("Task failed outside host invocation", {
          component: "serializer",
          seq: entry.seq,
          error: err,
        });
        entry.task.completion?.settle(errorEnvelope(err));
      }
      this.current = null;
      if (this.queue.size === 0) this.notifyIdle();
    }
  }

  private async execute({ task, seq }: QueuedTask): Promise<void> {
    const { command, completion } = task;
    const startedAt = Date.now();

    let outcome: Outcome;
    try {
      const result = await this.host.invoke(command.name, command.params);
      outcome = successEnvelope(result);
    } catch (err) {
      const hostError =
        err instanceof HostError ? err : new HostError(errorMessage(err), { cause: err });
      outcome = errorEnvelope(hostError);
      const ctx = {
        component: "serializer",
        seq,
        command: command.name,
        transport: command.transport,
        error: hostError.message,
      };
      // UDP senders never see the error, so it is only visible here
      if (completion) this.logger.debug?.("Host rejected command", ctx);
      else this.logger.warn("Host rejected UDP command", ctx);
    }

    this.metrics.recordEvent({
      type: "command:executed",
      timestamp: Date.now(),
      transport: command.transport,
      commandName: command.name,
      outcome: outcome.status,
      durationMs: Date.now() - startedAt,
    });

    completion?.settle(outcome);
  }

  private notifyIdle(): void {
    const waiters = [...this.idleWaiters];
    this.idleWaiters.clear();
    for (const w of waiters) w();
  }
}
