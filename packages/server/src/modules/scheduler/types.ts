import type { Logger } from "@conductor/shared/logger";
import type { Task } from "../state/domain/types.js";

export interface ExecutorResult {
  success: boolean;
  output: string;
  error?: string;
}

/**
 * Carries out one task. A rejected promise counts as a failed outcome.
 */
export type TaskExecutor = (task: Task) => Promise<ExecutorResult>;

export interface TaskOutcome {
  taskId: string;
  success: boolean;
  output: string;
  error?: string;
}

export interface TaskSchedulerOptions {
  /** Upper bound on tasks running at once (default 3) */
  maxParallel?: number;
  /** Idle wait while other work is still queued or running (default 500) */
  pollIntervalMs?: number;
  logger?: Logger;
}
