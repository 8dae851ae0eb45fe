/**
 * Schema bootstrap
 *
 * Creates the state store tables on first connection. Statements are
 * idempotent, so this is safe to run on every startup.
 */

import type { Client } from "@libsql/client";

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS runs (
    id TEXT PRIMARY KEY,
    project_name TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending',
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    config_snapshot TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    run_id TEXT NOT NULL REFERENCES runs(id),
    ticket_id TEXT,
    title TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    assigned_agent TEXT,
    status TEXT NOT NULL DEFAULT 'pending',
    priority INTEGER NOT NULL DEFAULT 0,
    dependencies TEXT NOT NULL DEFAULT '[]',
    result TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS task_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id TEXT NOT NULL REFERENCES tasks(id),
    agent_name TEXT,
    level TEXT NOT NULL DEFAULT 'info',
    message TEXT NOT NULL,
    metadata TEXT,
    created_at INTEGER NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS agent_executions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id TEXT NOT NULL REFERENCES tasks(id),
    run_id TEXT NOT NULL REFERENCES runs(id),
    agent_name TEXT NOT NULL,
    implementer TEXT,
    status TEXT NOT NULL DEFAULT 'pending',
    input_prompt TEXT,
    output TEXT,
    error TEXT,
    tokens_used TEXT,
    started_at INTEGER,
    finished_at INTEGER
  )`,
  `CREATE INDEX IF NOT EXISTS idx_runs_project_name ON runs(project_name)`,
  `CREATE INDEX IF NOT EXISTS idx_tasks_run_id ON tasks(run_id)`,
  `CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status)`,
  `CREATE INDEX IF NOT EXISTS idx_task_logs_task_id ON task_logs(task_id)`,
  `CREATE INDEX IF NOT EXISTS idx_agent_executions_run_id ON agent_executions(run_id)`,
  `CREATE INDEX IF NOT EXISTS idx_agent_executions_task_id ON agent_executions(task_id)`,
];

export const STORE_TABLES = ["runs", "tasks", "task_logs", "agent_executions"] as const;

/**
 * Create every table and index the state store needs
 */
export async function ensureSchema(client: Client): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await client.execute(statement);
  }
}
