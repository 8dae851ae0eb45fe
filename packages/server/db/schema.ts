/**
 * Database schema definitions
 *
 * Four relations back the state store: runs, tasks, task_logs and
 * agent_executions. Timestamps are stored as unix milliseconds so creation
 * order stays stable for tasks created within the same second.
 */

import { sql } from "drizzle-orm";
import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Runs table - one orchestration attempt for a project
 *
 * - id: caller-generated identifier
 * - project_name: name of the project the run belongs to
 * - status: pending | planning | running | completed | failed
 * - config_snapshot: JSON copy of the project config used for the run
 */
export const runs = sqliteTable(
  "runs",
  {
    id: text("id").primaryKey(),
    project_name: text("project_name").notNull(),
    status: text("status").notNull().default("pending"),
    created_at: integer("created_at", { mode: "timestamp_ms" }).notNull(),
    updated_at: integer("updated_at", { mode: "timestamp_ms" }).notNull(),
    config_snapshot: text("config_snapshot", { mode: "json" }).$type<Record<string, unknown>>(),
  },
  table => ({
    projectIndex: index("idx_runs_project_name").on(table.project_name),
  })
);

/**
 * Tasks table - atomic units of work within a run
 *
 * - dependencies: JSON array of task ids (same run) that must complete first
 * - result: success output or failure reason
 */
export const tasks = sqliteTable(
  "tasks",
  {
    id: text("id").primaryKey(),
    run_id: text("run_id")
      .notNull()
      .references(() => runs.id),
    ticket_id: text("ticket_id"),
    title: text("title").notNull(),
    description: text("description").notNull().default(""),
    assigned_agent: text("assigned_agent"),
    status: text("status").notNull().default("pending"),
    priority: integer("priority").notNull().default(0),
    dependencies: text("dependencies", { mode: "json" })
      .$type<string[]>()
      .notNull()
      .default(sql`'[]'`),
    result: text("result"),
    created_at: integer("created_at", { mode: "timestamp_ms" }).notNull(),
    updated_at: integer("updated_at", { mode: "timestamp_ms" }).notNull(),
  },
  table => ({
    runIndex: index("idx_tasks_run_id").on(table.run_id),
    statusIndex: index("idx_tasks_status").on(table.status),
  })
);

/**
 * Task logs table - append-only notes attached to a task
 */
export const taskLogs = sqliteTable(
  "task_logs",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    task_id: text("task_id")
      .notNull()
      .references(() => tasks.id),
    agent_name: text("agent_name"),
    level: text("level").notNull().default("info"),
    message: text("message").notNull(),
    metadata: text("metadata", { mode: "json" }).$type<Record<string, unknown>>(),
    created_at: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  },
  table => ({
    taskIndex: index("idx_task_logs_task_id").on(table.task_id),
  })
);

/**
 * Agent executions table - one attempt to carry out a task with an agent/implementer pair
 */
export const agentExecutions = sqliteTable(
  "agent_executions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    task_id: text("task_id")
      .notNull()
      .references(() => tasks.id),
    run_id: text("run_id")
      .notNull()
      .references(() => runs.id),
    agent_name: text("agent_name").notNull(),
    implementer: text("implementer"),
    status: text("status").notNull().default("pending"),
    input_prompt: text("input_prompt"),
    output: text("output"),
    error: text("error"),
    tokens_used: text("tokens_used", { mode: "json" }).$type<Record<string, unknown>>(),
    started_at: integer("started_at", { mode: "timestamp_ms" }),
    finished_at: integer("finished_at", { mode: "timestamp_ms" }),
  },
  table => ({
    runIndex: index("idx_agent_executions_run_id").on(table.run_id),
    taskIndex: index("idx_agent_executions_task_id").on(table.task_id),
  })
);

export type RunRow = typeof runs.$inferSelect;
export type TaskRow = typeof tasks.$inferSelect;
export type TaskLogRow = typeof taskLogs.$inferSelect;
export type AgentExecutionRow = typeof agentExecutions.$inferSelect;
