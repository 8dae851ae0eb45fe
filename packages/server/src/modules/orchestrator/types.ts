import type { ProjectConfig } from "../../config/project-config.js";
import type { AgentDefinition } from "../agents/agent-definition.js";
import type { TaskOutcome } from "../scheduler/types.js";
import type { Ticket } from "../tickets/types.js";
import type { RunStatus } from "../state/domain/types.js";

export interface PlannedTask {
  id: string;
  title: string;
  description: string;
  assignedAgent: string;
  priority: number;
  dependencies: string[];
  ticketId?: string;
}

export interface PlanningContext {
  project: ProjectConfig;
  agents: AgentDefinition[];
  /** Open tickets of the project's ticket source */
  tickets: Ticket[];
}

/**
 * Produces the task graph for a run
 */
export interface Planner {
  /** When set, a run without open tickets completes before planning */
  readonly requiresTickets?: boolean;
  plan(context: PlanningContext): Promise<PlannedTask[]>;
}

export interface OrchestratorRunOptions {
  planner: Planner;
  runId?: string;
}

export interface OrchestratorRunResult {
  runId: string;
  status: Extract<RunStatus, "completed" | "failed">;
  outcomes: TaskOutcome[];
}
