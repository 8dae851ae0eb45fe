import type {
  AgentExecution,
  AppendLogInput,
  CreateExecutionInput,
  CreateRunInput,
  CreateTaskInput,
  FinishExecutionInput,
  ListRunsOptions,
  Run,
  RunStatus,
  RunSummary,
  Task,
  TaskLog,
  TaskStatus,
} from "../types.js";

/**
 * Durable ledger of runs, tasks, logs and agent executions.
 *
 * Every write is committed before the returned promise resolves. Readiness is
 * always derived from stored state; nothing here caches it.
 *
 * Errors: `DuplicateKeyError` on create with an existing id, `NotFoundError`
 * on writes against unknown ids, `StoreUnavailableError` when the backing
 * driver fails.
 */
export interface StateStore {
  createRun(input: CreateRunInput): Promise<Run>;
  setRunStatus(runId: string, status: RunStatus): Promise<void>;
  getRun(runId: string): Promise<Run | null>;
  listRuns(options?: ListRunsOptions): Promise<Run[]>;

  createTask(input: CreateTaskInput): Promise<Task>;
  /**
   * Terminal tasks (completed, failed, skipped) are left untouched and the
   * stored task is returned as-is.
   */
  setTaskStatus(taskId: string, status: TaskStatus, result?: string): Promise<Task>;
  getTask(taskId: string): Promise<Task | null>;
  /** Priority descending, then creation order */
  listTasks(runId: string): Promise<Task[]>;
  /** Pending tasks whose dependencies are all completed, in `listTasks` order */
  readyTasks(runId: string): Promise<Task[]>;

  appendLog(input: AppendLogInput): Promise<TaskLog>;
  listLogs(taskId: string): Promise<TaskLog[]>;

  createExecution(input: CreateExecutionInput): Promise<number>;
  finishExecution(input: FinishExecutionInput): Promise<void>;
  listExecutions(taskId: string): Promise<AgentExecution[]>;

  runSummary(runId: string): Promise<RunSummary>;
}
