import { and, asc, desc, eq, notInArray, sql } from "drizzle-orm";
import type { ConductorDatabase } from "../../../../../db/index.js";
import { agentExecutions, runs, taskLogs, tasks } from "../../../../../db/schema.js";
import {
  AppError,
  DuplicateKeyError,
  NotFoundError,
  StoreUnavailableError,
} from "../../../../types.js";
import { countStatuses, findStarvedTasks } from "../../domain/readiness.js";
import type { StateStore } from "../../domain/repositories/state-store.js";
import {
  DEFAULT_LIST_RUNS_LIMIT,
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
import { toAgentExecution, toRun, toTask, toTaskLog } from "./row-mapping.js";

const TERMINAL_TASK_STATUSES: TaskStatus[] = ["completed", "failed", "skipped"];

/**
 * Walk the cause chain looking for a SQLite constraint violation
 */
export function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    const code = "code" in current ? current.code : undefined;
    if (typeof code === "string" && code.startsWith("SQLITE_CONSTRAINT")) {
      if (/UNIQUE|PRIMARYKEY/i.test(code) || /UNIQUE constraint failed/i.test(current.message)) {
        return true;
      }
    }
    if (/UNIQUE constraint failed/i.test(current.message)) return true;
    current = current.cause;
  }
  return false;
}

/**
 * SQLite-backed state store (libsql through drizzle-orm)
 *
 * Each method issues its writes as single statements, so a call is either
 * fully visible or not at all.
 */
export class DrizzleStateStore implements StateStore {
  constructor(private readonly db: ConductorDatabase) {}

  async createRun(input: CreateRunInput): Promise<Run> {
    return this.guard("createRun", async () => {
      const now = new Date();
      const row = {
        id: input.id,
        project_name: input.projectName,
        status: "pending",
        created_at: now,
        updated_at: now,
        config_snapshot: input.configSnapshot ?? null,
      };

      try {
        await this.db.insert(runs).values(row);
      } catch (error) {
        if (isUniqueViolation(error)) throw new DuplicateKeyError(`Run '${input.id}'`);
        throw error;
      }
      return toRun(row);
    });
  }

  async setRunStatus(runId: string, status: RunStatus): Promise<void> {
    return this.guard("setRunStatus", async () => {
      const updated = await this.db
        .update(runs)
        .set({ status, updated_at: new Date() })
        .where(eq(runs.id, runId))
        .returning({ id: runs.id });
      if (updated.length === 0) throw new NotFoundError(`Run '${runId}'`);
    });
  }

  async getRun(runId: string): Promise<Run | null> {
    return this.guard("getRun", async () => {
      const row = await this.db.select().from(runs).where(eq(runs.id, runId)).get();
      return row ? toRun(row) : null;
    });
  }

  async listRuns(options: ListRunsOptions = {}): Promise<Run[]> {
    return this.guard("listRuns", async () => {
      const limit = options.limit ?? DEFAULT_LIST_RUNS_LIMIT;
      const rows = await this.db
        .select()
        .from(runs)
        .where(options.projectName ? eq(runs.project_name, options.projectName) : undefined)
        .orderBy(desc(runs.created_at), desc(sql`rowid`))
        .limit(limit);
      return rows.map(toRun);
    });
  }

  async createTask(input: CreateTaskInput): Promise<Task> {
    return this.guard("createTask", async () => {
      const run = await this.db
        .select({ id: runs.id })
        .from(runs)
        .where(eq(runs.id, input.runId))
        .get();
      if (!run) throw new NotFoundError(`Run '${input.runId}'`);

      const now = new Date();
      const row = {
        id: input.id,
        run_id: input.runId,
        ticket_id: input.ticketId ?? null,
        title: input.title,
        description: input.description ?? "",
        assigned_agent: input.assignedAgent ?? null,
        status: "pending",
        priority: input.priority ?? 0,
        dependencies: [...(input.dependencies ?? [])],
        result: null,
        created_at: now,
        updated_at: now,
      };

      try {
        await this.db.insert(tasks).values(row);
      } catch (error) {
        if (isUniqueViolation(error)) throw new DuplicateKeyError(`Task '${input.id}'`);
        throw error;
      }
      return toTask(row);
    });
  }

  async setTaskStatus(taskId: string, status: TaskStatus, result?: string): Promise<Task> {
    return this.guard("setTaskStatus", async () => {
      // The terminal-state guard lives in the WHERE clause so the check and
      // the write are one statement.
      const updated = await this.db
        .update(tasks)
        .set(
          result === undefined
            ? { status, updated_at: new Date() }
            : { status, result, updated_at: new Date() }
        )
        .where(and(eq(tasks.id, taskId), notInArray(tasks.status, TERMINAL_TASK_STATUSES)))
        .returning();

      const row = updated[0];
      if (row) return toTask(row);

      const existing = await this.db.select().from(tasks).where(eq(tasks.id, taskId)).get();
      if (!existing) throw new NotFoundError(`Task '${taskId}'`);
      return toTask(existing);
    });
  }

  async getTask(taskId: string): Promise<Task | null> {
    return this.guard("getTask", async () => {
      const row = await this.db.select().from(tasks).where(eq(tasks.id, taskId)).get();
      return row ? toTask(row) : null;
    });
  }

  async listTasks(runId: string): Promise<Task[]> {
    return this.guard("listTasks", async () => {
      const rows = await this.db
        .select()
        .from(tasks)
        .where(eq(tasks.run_id, runId))
        .orderBy(desc(tasks.priority), asc(tasks.created_at), asc(sql`rowid`));
      return rows.map(toTask);
    });
  }

  async readyTasks(runId: string): Promise<Task[]> {
    return this.guard("readyTasks", async () => {
      const rows = await this.db
        .select()
        .from(tasks)
        .where(
          and(
            eq(tasks.run_id, runId),
            eq(tasks.status, "pending"),
            sql`NOT EXISTS (
              SELECT 1 FROM json_each(${tasks.dependencies}) AS dep
              WHERE dep.value NOT IN (
                SELECT done.id FROM tasks AS done
                WHERE done.run_id = ${runId} AND done.status = 'completed'
              )
            )`
          )
        )
        .orderBy(desc(tasks.priority), asc(tasks.created_at), asc(sql`rowid`));
      return rows.map(toTask);
    });
  }

  async appendLog(input: AppendLogInput): Promise<TaskLog> {
    return this.guard("appendLog", async () => {
      await this.requireTask(input.taskId);
      const inserted = await this.db
        .insert(taskLogs)
        .values({
          task_id: input.taskId,
          agent_name: input.agentName ?? null,
          level: input.level ?? "info",
          message: input.message,
          metadata: input.metadata ?? null,
          created_at: new Date(),
        })
        .returning();
      const row = inserted[0];
      if (!row) throw new Error("Log insert returned no row");
      return toTaskLog(row);
    });
  }

  async listLogs(taskId: string): Promise<TaskLog[]> {
    return this.guard("listLogs", async () => {
      const rows = await this.db
        .select()
        .from(taskLogs)
        .where(eq(taskLogs.task_id, taskId))
        .orderBy(asc(taskLogs.id));
      return rows.map(toTaskLog);
    });
  }

  async createExecution(input: CreateExecutionInput): Promise<number> {
    return this.guard("createExecution", async () => {
      await this.requireTask(input.taskId);
      const inserted = await this.db
        .insert(agentExecutions)
        .values({
          task_id: input.taskId,
          run_id: input.runId,
          agent_name: input.agentName,
          implementer: input.implementer ?? null,
          status: "running",
          input_prompt: input.inputPrompt ?? null,
          started_at: new Date(),
        })
        .returning({ id: agentExecutions.id });
      const row = inserted[0];
      if (!row) throw new Error("Execution insert returned no row");
      return row.id;
    });
  }

  async finishExecution(input: FinishExecutionInput): Promise<void> {
    return this.guard("finishExecution", async () => {
      const updated = await this.db
        .update(agentExecutions)
        .set({
          status: input.status,
          output: input.output ?? null,
          error: input.error ?? null,
          tokens_used: input.tokensUsed ?? null,
          finished_at: new Date(),
        })
        .where(eq(agentExecutions.id, input.executionId))
        .returning({ id: agentExecutions.id });
      if (updated.length === 0) throw new NotFoundError(`Execution ${input.executionId}`);
    });
  }

  async listExecutions(taskId: string): Promise<AgentExecution[]> {
    return this.guard("listExecutions", async () => {
      const rows = await this.db
        .select()
        .from(agentExecutions)
        .where(eq(agentExecutions.task_id, taskId))
        .orderBy(asc(agentExecutions.id));
      return rows.map(toAgentExecution);
    });
  }

  async runSummary(runId: string): Promise<RunSummary> {
    const run = await this.getRun(runId);
    if (!run) throw new NotFoundError(`Run '${runId}'`);

    const taskList = await this.listTasks(runId);
    return {
      run,
      totalTasks: taskList.length,
      statusCounts: countStatuses(taskList),
      tasks: taskList,
      starvedTaskIds: findStarvedTasks(taskList).map(t => t.id),
    };
  }

  private async requireTask(taskId: string): Promise<void> {
    const row = await this.db.select({ id: tasks.id }).from(tasks).where(eq(tasks.id, taskId)).get();
    if (!row) throw new NotFoundError(`Task '${taskId}'`);
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new StoreUnavailableError(operation, error);
    }
  }
}
