import type { HostApiAdapter } from "../interfaces/host-api.js";
import type { Command, CommandName, CommandParams, JsonValue, Transport } from "../types/commands.js";

export interface RecordedCall {
  name: CommandName;
  params: CommandParams;
}

type Handler = (params: CommandParams) => JsonValue | Promise<JsonValue>;

/**
 * Host fake that records every invocation in order and tracks how many calls
 * were in flight at once. Commands without a handler return null.
 */
export class RecordingHost implements HostApiAdapter {
  readonly calls: RecordedCall[] = [];
  maxConcurrent = 0;
  private active = 0;
  private handlers = new Map<CommandName, Handler>();

  handle(name: CommandName, handler: Handler): this {
    this.handlers.set(name, handler);
    return this;
  }

  async invoke(name: CommandName, params: CommandParams): Promise<JsonValue> {
    this.active++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.active);
    this.calls.push({ name, params });
    try {
      const handler = this.handlers.get(name);
      return handler ? await handler(params) : null;
    } finally {
      this.active--;
    }
  }

  callNames(): CommandName[] {
    return this.calls.map((c) => c.name);
  }
}

export function makeCommand(
  name: CommandName,
  params: CommandParams = {},
  transport: Transport = "tcp",
): Command {
  return Object.freeze({ name, params: Object.freeze({ ...params }), transport, receivedAt: Date.now() });
}

/** A promise plus its resolver, for holding a host call open. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Poll until `predicate` holds or `timeoutMs` passes. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("waitFor: condition not met in time");
    await new Promise((r) => setTimeout(r, 5));
  }
}
