import type { AgentExecutionRow, RunRow, TaskLogRow, TaskRow } from "../../../../../db/schema.js";
import {
  isExecutionStatus,
  isRunStatus,
  isTaskLogLevel,
  isTaskStatus,
  type AgentExecution,
  type Run,
  type Task,
  type TaskLog,
} from "../../domain/types.js";

function invalidValue(column: string, value: string): Error {
  return new Error(`Unexpected ${column} value in store: '${value}'`);
}

export function toRun(row: RunRow): Run {
  if (!isRunStatus(row.status)) throw invalidValue("runs.status", row.status);
  return {
    id: row.id,
    projectName: row.project_name,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    configSnapshot: row.config_snapshot ?? null,
  };
}

export function toTask(row: TaskRow): Task {
  if (!isTaskStatus(row.status)) throw invalidValue("tasks.status", row.status);
  return {
    id: row.id,
    runId: row.run_id,
    ticketId: row.ticket_id,
    title: row.title,
    description: row.description,
    assignedAgent: row.assigned_agent,
    status: row.status,
    priority: row.priority,
    dependencies: row.dependencies,
    result: row.result,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toTaskLog(row: TaskLogRow): TaskLog {
  if (!isTaskLogLevel(row.level)) throw invalidValue("task_logs.level", row.level);
  return {
    id: row.id,
    taskId: row.task_id,
    agentName: row.agent_name,
    level: row.level,
    message: row.message,
    metadata: row.metadata ?? null,
    createdAt: row.created_at,
  };
}

export function toAgentExecution(row: AgentExecutionRow): AgentExecution {
  if (!isExecutionStatus(row.status)) throw invalidValue("agent_executions.status", row.status);
  return {
    id: row.id,
    taskId: row.task_id,
    runId: row.run_id,
    agentName: row.agent_name,
    implementer: row.implementer,
    status: row.status,
    inputPrompt: row.input_prompt,
    output: row.output,
    error: row.error,
    tokensUsed: row.tokens_used ?? null,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}
