export const RUN_STATUSES = ["pending", "planning", "running", "completed", "failed"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export const TASK_STATUSES = [
  "pending",
  "queued",
  "running",
  "completed",
  "failed",
  "skipped",
] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type TaskLogLevel = (typeof LOG_LEVELS)[number];

export const EXECUTION_STATUSES = ["running", "completed", "failed"] as const;
export type ExecutionStatus = (typeof EXECUTION_STATUSES)[number];

const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set(["completed", "failed", "skipped"]);
const TERMINAL_RUN_STATUSES: ReadonlySet<RunStatus> = new Set(["completed", "failed"]);

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.has(status);
}

export function isTerminalRunStatus(status: RunStatus): boolean {
  return TERMINAL_RUN_STATUSES.has(status);
}

export function isRunStatus(value: string): value is RunStatus {
  return RUN_STATUSES.some(status => status === value);
}

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some(status => status === value);
}

export function isTaskLogLevel(value: string): value is TaskLogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function isExecutionStatus(value: string): value is ExecutionStatus {
  return EXECUTION_STATUSES.some(status => status === value);
}

export type JsonObject = Record<string, unknown>;

export interface Run {
  id: string;
  projectName: string;
  status: RunStatus;
  createdAt: Date;
  updatedAt: Date;
  configSnapshot: JsonObject | null;
}

export interface Task {
  id: string;
  runId: string;
  ticketId: string | null;
  title: string;
  description: string;
  assignedAgent: string | null;
  status: TaskStatus;
  priority: number;
  dependencies: string[];
  result: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface TaskLog {
  id: number;
  taskId: string;
  agentName: string | null;
  level: TaskLogLevel;
  message: string;
  metadata: JsonObject | null;
  createdAt: Date;
}

export interface AgentExecution {
  id: number;
  taskId: string;
  runId: string;
  agentName: string;
  implementer: string | null;
  status: ExecutionStatus;
  inputPrompt: string | null;
  output: string | null;
  error: string | null;
  tokensUsed: JsonObject | null;
  startedAt: Date | null;
  finishedAt: Date | null;
}

export interface CreateRunInput {
  id: string;
  projectName: string;
  configSnapshot?: JsonObject | null;
}

export interface ListRunsOptions {
  projectName?: string;
  limit?: number;
}

export interface CreateTaskInput {
  id: string;
  runId: string;
  title: string;
  description?: string;
  ticketId?: string | null;
  assignedAgent?: string | null;
  priority?: number;
  dependencies?: string[];
}

export interface AppendLogInput {
  taskId: string;
  message: string;
  level?: TaskLogLevel;
  agentName?: string | null;
  metadata?: JsonObject | null;
}

export interface CreateExecutionInput {
  taskId: string;
  runId: string;
  agentName: string;
  implementer?: string | null;
  inputPrompt?: string | null;
}

export interface FinishExecutionInput {
  executionId: number;
  status: Exclude<ExecutionStatus, "running">;
  output?: string | null;
  error?: string | null;
  tokensUsed?: JsonObject | null;
}

export type StatusCounts = Partial<Record<TaskStatus, number>>;

export interface RunSummary {
  run: Run;
  totalTasks: number;
  statusCounts: StatusCounts;
  tasks: Task[];
  starvedTaskIds: string[];
}

export const DEFAULT_LIST_RUNS_LIMIT = 20;
