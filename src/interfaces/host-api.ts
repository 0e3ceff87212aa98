/**
 * Boundary to the host control surface.
 *
 * The host is single-threaded and not reentrant: only the ExecutionSerializer
 * may call `invoke`, and never while a previous call is still running.
 * @module
 */

import type { CommandName, CommandParams, JsonValue } from "../types/commands.js";

export interface HostApiAdapter {
  /**
   * Run one operation against the host. Throws (or rejects) when the host
   * refuses or fails it; the serializer turns that into an error outcome.
   */
  invoke(name: CommandName, params: CommandParams): JsonValue | Promise<JsonValue>;
}
