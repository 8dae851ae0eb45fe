/**
 * @conductor/server
 *
 * Durable run/task state, dependency-aware scheduling, the run orchestrator
 * and a read-only status API.
 */

export { createApp, type CreateAppOptions } from "./app/app.js";
export type { Env } from "./app/context.js";
export { startServer, type RunningServer, type StartServerOptions } from "./server.js";

export * from "./types.js";

export * from "./modules/state/domain/types.js";
export type { StateStore } from "./modules/state/domain/repositories/state-store.js";
export {
  countStatuses,
  findStarvedTasks,
  selectReadyTasks,
  sortTasks,
} from "./modules/state/domain/readiness.js";
export { DrizzleStateStore } from "./modules/state/infrastructure/repositories/state-store.drizzle.js";
export { InMemoryStateStore } from "./modules/state/infrastructure/repositories/state-store.memory.js";

export { Semaphore } from "./modules/scheduler/semaphore.js";
export {
  DEFAULT_MAX_PARALLEL,
  DEFAULT_POLL_INTERVAL_MS,
  TaskScheduler,
} from "./modules/scheduler/task-scheduler.js";
export type {
  ExecutorResult,
  TaskExecutor,
  TaskOutcome,
  TaskSchedulerOptions,
} from "./modules/scheduler/types.js";

export {
  loadProjectConfig,
  findProjectConfig,
  parseProjectConfig,
  type ProjectConfig,
} from "./config/project-config.js";
export {
  loadServerConfig,
  loadWorkspaceConfig,
  type ServerConfig,
  type WorkspaceConfig,
} from "./config/workspace-config.js";

export { AgentRegistry } from "./modules/agents/agent-registry.js";
export type { AgentDefinition } from "./modules/agents/agent-definition.js";
export { CliImplementer } from "./modules/implementers/cli-implementer.js";
export { ImplementerRegistry } from "./modules/implementers/registry.js";
export type {
  Implementer,
  ImplementerRequest,
  ImplementerResult,
} from "./modules/implementers/types.js";

export { createOrchestrator } from "./modules/orchestrator/factory.js";
export { FilePlanner } from "./modules/orchestrator/file-planner.js";
export { Orchestrator } from "./modules/orchestrator/orchestrator.js";
export { TicketPlanner } from "./modules/orchestrator/ticket-planner.js";
export type {
  OrchestratorRunOptions,
  OrchestratorRunResult,
  PlannedTask,
  Planner,
  PlanningContext,
} from "./modules/orchestrator/types.js";

export { createTicketSource } from "./modules/tickets/factory.js";
export { LocalYamlTicketSource } from "./modules/tickets/local-yaml-ticket-source.js";
export type { Ticket, TicketSource } from "./modules/tickets/types.js";
export { initWorkspace, type InitWorkspaceResult } from "./modules/workspace/init-workspace.js";
