import type { ExecutionTask } from "../types/commands.js";

/**
 * Where transports hand decoded commands. The ExecutionSerializer is the only
 * production implementation; returns false when the task was refused.
 */
export interface TaskSink {
  submit(task: ExecutionTask): boolean;
}
