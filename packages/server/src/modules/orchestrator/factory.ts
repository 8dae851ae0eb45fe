import type { Logger } from "@conductor/shared/logger";
import { findProjectConfig, loadProjectConfig } from "../../config/project-config.js";
import { loadWorkspaceConfig } from "../../config/workspace-config.js";
import { AgentRegistry } from "../agents/agent-registry.js";
import { ImplementerRegistry } from "../implementers/registry.js";
import type { StateStore } from "../state/domain/repositories/state-store.js";
import { createTicketSource } from "../tickets/factory.js";
import { Orchestrator } from "./orchestrator.js";

export interface CreateOrchestratorOptions {
  projectName: string;
  store: StateStore;
  /** Workspace holding conductor.yaml (defaults to cwd) */
  baseDir?: string;
  implementers?: ImplementerRegistry;
  logger?: Logger;
}

/**
 * Wire an orchestrator from the workspace and project configuration files
 */
export function createOrchestrator(options: CreateOrchestratorOptions): Orchestrator {
  const workspace = loadWorkspaceConfig(options.baseDir);
  const project = loadProjectConfig(findProjectConfig(options.projectName, workspace.projectsDir));

  const agents = new AgentRegistry(workspace.agentsDir);
  agents.loadAll();

  return new Orchestrator({
    store: options.store,
    project,
    agents,
    tickets: createTicketSource(project, options.baseDir ?? process.cwd()),
    implementers:
      options.implementers ??
      new ImplementerRegistry({
        timeoutMs: project.settings.executionTimeoutMs,
        logger: options.logger,
      }),
    logger: options.logger,
  });
}
