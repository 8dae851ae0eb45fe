import type { AgentDefinition } from "../modules/agents/agent-definition.js";
import type { OrchestratorRunResult } from "../modules/orchestrator/types.js";
import type { Ticket } from "../modules/tickets/types.js";
import type { InitWorkspaceResult } from "../modules/workspace/init-workspace.js";
import {
  TASK_STATUSES,
  type Run,
  type RunSummary,
  type StatusCounts,
} from "../modules/state/domain/types.js";

function firstLine(text: string): string {
  return text.split("\n", 1)[0]?.trim() ?? "";
}

export function formatRunResult(result: OrchestratorRunResult): string {
  const lines = [`Run ${result.runId}: ${result.status}`];
  for (const outcome of result.outcomes) {
    const detail = outcome.success ? firstLine(outcome.output) : (outcome.error ?? "unknown error");
    const marker = outcome.success ? "ok" : "failed";
    lines.push(`  [${marker}] ${outcome.taskId}${detail ? `: ${detail}` : ""}`);
  }
  return lines.join("\n");
}

export function formatStatusCounts(counts: StatusCounts): string {
  return TASK_STATUSES.flatMap(status => {
    const count = counts[status];
    return count ? [`${status} ${count}`] : [];
  }).join(", ");
}

export function formatRunList(runs: readonly Run[]): string {
  if (runs.length === 0) {
    return "No runs found";
  }
  return runs
    .map(run => `${run.id}  ${run.status.padEnd(9)}  ${run.createdAt.toISOString()}`)
    .join("\n");
}

export function formatRunSummary(summary: RunSummary): string {
  const { run } = summary;
  const counts = formatStatusCounts(summary.statusCounts);
  const lines = [
    `Run ${run.id} (${run.projectName}): ${run.status}`,
    `Tasks: ${summary.totalTasks}${counts ? ` (${counts})` : ""}`,
  ];

  for (const task of summary.tasks) {
    const waits = task.dependencies.length > 0 ? ` (after ${task.dependencies.join(", ")})` : "";
    lines.push(`  [${task.status}] ${task.id} ${task.title}${waits}`);
  }

  if (summary.starvedTaskIds.length > 0) {
    lines.push(`Starved: ${summary.starvedTaskIds.join(", ")}`);
  }
  return lines.join("\n");
}

export function formatAgentList(agents: readonly AgentDefinition[]): string {
  if (agents.length === 0) {
    return "No agents defined";
  }
  return agents
    .map(agent => {
      const implementer = agent.implementer ? ` [${agent.implementer}]` : "";
      return `${agent.name}  ${agent.role}${implementer}`;
    })
    .join("\n");
}

export function formatTicketList(projectName: string, tickets: readonly Ticket[]): string {
  if (tickets.length === 0) {
    return `No tickets found for project '${projectName}'`;
  }
  return tickets
    .map(ticket => {
      const labels = ticket.labels.length > 0 ? `  [${ticket.labels.join(", ")}]` : "";
      const status = ticket.status.padEnd(11);
      return `${ticket.id}  ${ticket.priority.padEnd(6)}  ${status}  ${ticket.title}${labels}`;
    })
    .join("\n");
}

export function formatInitResult(result: InitWorkspaceResult): string {
  const lines = [`Workspace initialized at ${result.baseDir}`];
  if (result.createdDirs.length > 0) {
    lines.push(`  directories: ${result.createdDirs.join(", ")}`);
  }
  if (result.createdAgents.length > 0) {
    lines.push(`  agents: ${result.createdAgents.join(", ")}`);
  }
  if (result.configCreated) {
    lines.push("  config: conductor.yaml");
  }
  lines.push("Next: add a project to projects/ and tickets to tickets/, then run `conductor run <project>`");
  return lines.join("\n");
}
