/**
 * Run lifecycle
 *
 * Creates a run, asks the planner for tasks, stores them, and hands the run
 * to the scheduler with an executor that drives agents through implementers.
 */

import { createLogger, type Logger } from "@conductor/shared/logger";
import type { ProjectConfig } from "../../config/project-config.js";
import { StoreUnavailableError } from "../../types.js";
import type { AgentRegistry } from "../agents/agent-registry.js";
import type { ImplementerRegistry } from "../implementers/registry.js";
import { TaskScheduler } from "../scheduler/task-scheduler.js";
import type { ExecutorResult } from "../scheduler/types.js";
import type { StateStore } from "../state/domain/repositories/state-store.js";
import type { Task } from "../state/domain/types.js";
import type { Ticket, TicketSource } from "../tickets/types.js";
import { generateRunId } from "./ids.js";
import { buildTaskPrompt } from "./prompt.js";
import type { OrchestratorRunOptions, OrchestratorRunResult, PlannedTask } from "./types.js";

export const DEFAULT_AGENT = "developer";

export interface OrchestratorDeps {
  store: StateStore;
  project: ProjectConfig;
  agents: AgentRegistry;
  implementers: ImplementerRegistry;
  tickets?: TicketSource;
  logger?: Logger;
}

export class Orchestrator {
  private readonly store: StateStore;
  private readonly project: ProjectConfig;
  private readonly agents: AgentRegistry;
  private readonly implementers: ImplementerRegistry;
  private readonly tickets: TicketSource | undefined;
  private readonly logger: Logger;

  public constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.project = deps.project;
    this.agents = deps.agents;
    this.implementers = deps.implementers;
    this.tickets = deps.tickets;
    this.logger = (deps.logger ?? createLogger("server")).child({ module: "orchestrator" });
  }

  public async run(options: OrchestratorRunOptions): Promise<OrchestratorRunResult> {
    const runId = options.runId ?? generateRunId();
    const log = this.logger.child({ runId });
    const { settings } = this.project;

    await this.store.createRun({
      id: runId,
      projectName: this.project.name,
      configSnapshot: { ...this.project },
    });
    log.info(`Run created for project '${this.project.name}'`);

    await this.store.setRunStatus(runId, "planning");
    let planned: PlannedTask[];
    try {
      const tickets = await this.loadOpenTickets(log);
      if (options.planner.requiresTickets && tickets.length === 0) {
        log.info("No open tickets to process");
        planned = [];
      } else {
        const agents = this.project.agents.map(name => this.agents.get(name));
        planned = await options.planner.plan({ project: this.project, agents, tickets });
      }
    } catch (error) {
      log.error("Planning failed", error instanceof Error ? error : undefined);
      await this.markFailed(runId, log);
      throw error;
    }
    log.info(`Planned ${planned.length} tasks`);

    if (planned.length === 0) {
      await this.store.setRunStatus(runId, "completed");
      return { runId, status: "completed", outcomes: [] };
    }

    try {
      for (const task of planned) {
        await this.store.createTask({
          id: task.id,
          runId,
          title: task.title,
          description: task.description,
          ticketId: task.ticketId ?? null,
          assignedAgent: task.assignedAgent,
          priority: task.priority,
          dependencies: task.dependencies,
        });
      }
      this.warnDanglingDependencies(planned, log);

      await this.store.setRunStatus(runId, "running");
      log.info(`Executing tasks (max parallel: ${settings.maxParallelAgents})`);

      const scheduler = new TaskScheduler(this.store, {
        maxParallel: settings.maxParallelAgents,
        pollIntervalMs: settings.pollIntervalMs,
        logger: this.logger,
      });
      const outcomes = await scheduler.executeAll(runId, task => this.executeTask(task));

      const failed = outcomes.filter(o => !o.success).length;
      const status = failed === 0 ? "completed" : "failed";
      await this.store.setRunStatus(runId, status);

      const summary = await this.store.runSummary(runId);
      if (summary.starvedTaskIds.length > 0) {
        const starved = summary.starvedTaskIds.join(", ");
        log.warn(`Tasks left pending behind unfinished dependencies: ${starved}`);
      }
      log.info(
        `Run ${status}: ${outcomes.length - failed} completed, ${failed} failed, ${outcomes.length} total`
      );

      return { runId, status, outcomes };
    } catch (error) {
      log.error("Run aborted", error instanceof Error ? error : undefined);
      await this.markFailed(runId, log);
      throw error;
    }
  }

  /**
   * Executor handed to the scheduler: one agent execution per task
   */
  private async executeTask(task: Task): Promise<ExecutorResult> {
    const agentName = task.assignedAgent ?? DEFAULT_AGENT;
    if (!this.agents.has(agentName)) {
      return { success: false, output: "", error: `Agent '${agentName}' not found` };
    }

    const agent = this.agents.get(agentName);
    const implementerName = agent.implementer ?? this.project.settings.implementer;
    const prompt = buildTaskPrompt(task, agent, this.project);

    const executionId = await this.store.createExecution({
      taskId: task.id,
      runId: task.runId,
      agentName,
      implementer: implementerName,
      inputPrompt: prompt,
    });
    await this.store.appendLog({
      taskId: task.id,
      agentName,
      message: `Starting execution with agent '${agentName}' via '${implementerName}'`,
    });

    try {
      const implementer = this.implementers.get(implementerName);
      const result = await implementer.execute({
        prompt,
        projectPath: this.project.repoPath,
        context: {
          taskId: task.id,
          runId: task.runId,
          agent: agentName,
          project: this.project.name,
        },
      });

      await this.store.finishExecution({
        executionId,
        status: result.success ? "completed" : "failed",
        output: result.output,
        error: result.error ?? null,
      });
      await this.store.appendLog({
        taskId: task.id,
        agentName,
        level: result.success ? "info" : "error",
        message: `Execution ${result.success ? "completed" : "failed"}`,
        metadata: result.error ? { error: result.error } : null,
      });

      return { success: result.success, output: result.output, error: result.error };
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;

      const message = error instanceof Error ? error.message : String(error);
      await this.store.finishExecution({ executionId, status: "failed", error: message });
      await this.store.appendLog({
        taskId: task.id,
        agentName,
        level: "error",
        message: `Execution error: ${message}`,
      });
      return { success: false, output: "", error: message };
    }
  }

  private async loadOpenTickets(log: Logger): Promise<Ticket[]> {
    if (!this.tickets) return [];
    const tickets = await this.tickets.loadTickets();
    const open = tickets.filter(ticket => ticket.status === "open");
    log.info(`Found ${tickets.length} tickets (${open.length} open)`);
    return open;
  }

  private warnDanglingDependencies(planned: PlannedTask[], log: Logger): void {
    const ids = new Set(planned.map(t => t.id));
    for (const task of planned) {
      const dangling = task.dependencies.filter(dep => !ids.has(dep));
      if (dangling.length > 0) {
        log.warn(`Task '${task.id}' depends on unknown tasks: ${dangling.join(", ")}`, {
          taskId: task.id,
        });
      }
    }
  }

  private async markFailed(runId: string, log: Logger): Promise<void> {
    try {
      await this.store.setRunStatus(runId, "failed");
    } catch (statusError) {
      log.error(
        "Could not mark run as failed",
        statusError instanceof Error ? statusError : undefined
      );
    }
  }
}
