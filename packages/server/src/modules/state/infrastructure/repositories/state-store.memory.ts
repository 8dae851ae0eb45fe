import { DuplicateKeyError, NotFoundError } from "../../../../types.js";
import {
  countStatuses,
  findStarvedTasks,
  selectReadyTasks,
  sortTasks,
} from "../../domain/readiness.js";
import type { StateStore } from "../../domain/repositories/state-store.js";
import {
  DEFAULT_LIST_RUNS_LIMIT,
  isTerminalTaskStatus,
  type AgentExecution,
  type AppendLogInput,
  type CreateExecutionInput,
  type CreateRunInput,
  type CreateTaskInput,
  type FinishExecutionInput,
  type ListRunsOptions,
  type Run,
  type RunStatus,
  type RunSummary,
  type Task,
  type TaskLog,
  type TaskStatus,
} from "../../domain/types.js";

/**
 * Process-local state store with the same contract as the SQLite one.
 *
 * Records are copied on the way in and out, so callers never hold a live
 * reference to stored state.
 */
export class InMemoryStateStore implements StateStore {
  private readonly runs = new Map<string, Run>();
  private readonly tasks = new Map<string, Task>();
  private readonly logs: TaskLog[] = [];
  private readonly executions = new Map<number, AgentExecution>();
  private nextLogId = 1;
  private nextExecutionId = 1;

  async createRun(input: CreateRunInput): Promise<Run> {
    if (this.runs.has(input.id)) throw new DuplicateKeyError(`Run '${input.id}'`);
    const now = new Date();
    const run: Run = {
      id: input.id,
      projectName: input.projectName,
      status: "pending",
      createdAt: now,
      updatedAt: now,
      configSnapshot: input.configSnapshot ? structuredClone(input.configSnapshot) : null,
    };
    this.runs.set(run.id, run);
    return copyRun(run);
  }

  async setRunStatus(runId: string, status: RunStatus): Promise<void> {
    const run = this.runs.get(runId);
    if (!run) throw new NotFoundError(`Run '${runId}'`);
    this.runs.set(runId, { ...run, status, updatedAt: new Date() });
  }

  async getRun(runId: string): Promise<Run | null> {
    const run = this.runs.get(runId);
    return run ? copyRun(run) : null;
  }

  async listRuns(options: ListRunsOptions = {}): Promise<Run[]> {
    const limit = options.limit ?? DEFAULT_LIST_RUNS_LIMIT;
    return [...this.runs.values()]
      .filter(run => !options.projectName || run.projectName === options.projectName)
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map(copyRun);
  }

  async createTask(input: CreateTaskInput): Promise<Task> {
    if (!this.runs.has(input.runId)) throw new NotFoundError(`Run '${input.runId}'`);
    if (this.tasks.has(input.id)) throw new DuplicateKeyError(`Task '${input.id}'`);
    const now = new Date();
    const task: Task = {
      id: input.id,
      runId: input.runId,
      ticketId: input.ticketId ?? null,
      title: input.title,
      description: input.description ?? "",
      assignedAgent: input.assignedAgent ?? null,
      status: "pending",
      priority: input.priority ?? 0,
      dependencies: [...(input.dependencies ?? [])],
      result: null,
      createdAt: now,
      updatedAt: now,
    };
    this.tasks.set(task.id, task);
    return copyTask(task);
  }

  async setTaskStatus(taskId: string, status: TaskStatus, result?: string): Promise<Task> {
    const task = this.tasks.get(taskId);
    if (!task) throw new NotFoundError(`Task '${taskId}'`);
    if (isTerminalTaskStatus(task.status)) return copyTask(task);

    const updated: Task = {
      ...task,
      status,
      result: result === undefined ? task.result : result,
      updatedAt: new Date(),
    };
    this.tasks.set(taskId, updated);
    return copyTask(updated);
  }

  async getTask(taskId: string): Promise<Task | null> {
    const task = this.tasks.get(taskId);
    return task ? copyTask(task) : null;
  }

  async listTasks(runId: string): Promise<Task[]> {
    return sortTasks([...this.tasks.values()].filter(t => t.runId === runId)).map(copyTask);
  }

  async readyTasks(runId: string): Promise<Task[]> {
    return selectReadyTasks(await this.listTasks(runId));
  }

  async appendLog(input: AppendLogInput): Promise<TaskLog> {
    if (!this.tasks.has(input.taskId)) throw new NotFoundError(`Task '${input.taskId}'`);
    const log: TaskLog = {
      id: this.nextLogId++,
      taskId: input.taskId,
      agentName: input.agentName ?? null,
      level: input.level ?? "info",
      message: input.message,
      metadata: input.metadata ? structuredClone(input.metadata) : null,
      createdAt: new Date(),
    };
    this.logs.push(log);
    return copyLog(log);
  }

  async listLogs(taskId: string): Promise<TaskLog[]> {
    return this.logs.filter(log => log.taskId === taskId).map(copyLog);
  }

  async createExecution(input: CreateExecutionInput): Promise<number> {
    if (!this.tasks.has(input.taskId)) throw new NotFoundError(`Task '${input.taskId}'`);
    const id = this.nextExecutionId++;
    this.executions.set(id, {
      id,
      taskId: input.taskId,
      runId: input.runId,
      agentName: input.agentName,
      implementer: input.implementer ?? null,
      status: "running",
      inputPrompt: input.inputPrompt ?? null,
      output: null,
      error: null,
      tokensUsed: null,
      startedAt: new Date(),
      finishedAt: null,
    });
    return id;
  }

  async finishExecution(input: FinishExecutionInput): Promise<void> {
    const execution = this.executions.get(input.executionId);
    if (!execution) throw new NotFoundError(`Execution ${input.executionId}`);
    this.executions.set(input.executionId, {
      ...execution,
      status: input.status,
      output: input.output ?? null,
      error: input.error ?? null,
      tokensUsed: input.tokensUsed ? structuredClone(input.tokensUsed) : null,
      finishedAt: new Date(),
    });
  }

  async listExecutions(taskId: string): Promise<AgentExecution[]> {
    return [...this.executions.values()]
      .filter(execution => execution.taskId === taskId)
      .map(copyExecution);
  }

  async runSummary(runId: string): Promise<RunSummary> {
    const run = await this.getRun(runId);
    if (!run) throw new NotFoundError(`Run '${runId}'`);
    const tasks = await this.listTasks(runId);
    return {
      run,
      totalTasks: tasks.length,
      statusCounts: countStatuses(tasks),
      tasks,
      starvedTaskIds: findStarvedTasks(tasks).map(t => t.id),
    };
  }
}

function copyRun(run: Run): Run {
  return { ...run, configSnapshot: run.configSnapshot ? structuredClone(run.configSnapshot) : null };
}

function copyTask(task: Task): Task {
  return { ...task, dependencies: [...task.dependencies] };
}

function copyLog(log: TaskLog): TaskLog {
  return { ...log, metadata: log.metadata ? structuredClone(log.metadata) : null };
}

function copyExecution(execution: AgentExecution): AgentExecution {
  return {
    ...execution,
    tokensUsed: execution.tokensUsed ? structuredClone(execution.tokensUsed) : null,
  };
}
