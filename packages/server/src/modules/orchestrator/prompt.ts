import type { ProjectConfig } from "../../config/project-config.js";
import type { AgentDefinition } from "../agents/agent-definition.js";
import type { Task } from "../state/domain/types.js";

/**
 * Combine the agent's system prompt with the task and project details
 */
export function buildTaskPrompt(
  task: Pick<Task, "title" | "description">,
  agent: Pick<AgentDefinition, "systemPrompt">,
  project: Pick<ProjectConfig, "repoPath" | "structure">
): string {
  const parts = [
    agent.systemPrompt,
    "",
    "---",
    "",
    `## Task: ${task.title}`,
    "",
    task.description,
    "",
    `**Project path:** ${project.repoPath}`,
    `**Language:** ${project.structure.language}`,
  ];
  if (project.structure.framework) {
    parts.push(`**Framework:** ${project.structure.framework}`);
  }
  if (project.structure.testRunner) {
    parts.push(`**Test runner:** ${project.structure.testRunner}`);
  }
  return parts.join("\n");
}
