import { createLogger } from "@conductor/shared/logger";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { WORKSPACE_CONFIG_FILE } from "../../config/workspace-config.js";

const logger = createLogger("server");

export const WORKSPACE_DIRS = ["agents", "projects", "tickets"] as const;

const AGENT_TEMPLATES_DIR = fileURLToPath(new URL("../../../templates/agents/", import.meta.url));

const DEFAULT_WORKSPACE_CONFIG = [
  "agentsDir: ./agents",
  "projectsDir: ./projects",
  "dbPath: ./conductor.db",
  "",
].join("\n");

export interface InitWorkspaceResult {
  baseDir: string;
  createdDirs: string[];
  createdAgents: string[];
  configCreated: boolean;
}

/**
 * Lay out a workspace: agents/, projects/ and tickets/, the default agent
 * definitions and a conductor.yaml. Existing files are left alone.
 */
export function initWorkspace(
  dir: string,
  templatesDir: string = AGENT_TEMPLATES_DIR
): InitWorkspaceResult {
  const baseDir = path.resolve(dir);
  fs.mkdirSync(baseDir, { recursive: true });

  const createdDirs = WORKSPACE_DIRS.filter(name => {
    const target = path.join(baseDir, name);
    if (fs.existsSync(target)) return false;
    fs.mkdirSync(target);
    return true;
  });

  const agentsDir = path.join(baseDir, "agents");
  const templates = fs.readdirSync(templatesDir).filter(name => name.endsWith(".md")).sort();
  const createdAgents = templates.filter(name => {
    const target = path.join(agentsDir, name);
    if (fs.existsSync(target)) return false;
    fs.copyFileSync(path.join(templatesDir, name), target);
    return true;
  });

  const configPath = path.join(baseDir, WORKSPACE_CONFIG_FILE);
  const configCreated = !fs.existsSync(configPath);
  if (configCreated) {
    fs.writeFileSync(configPath, DEFAULT_WORKSPACE_CONFIG);
  }

  logger.info(`Workspace initialized at ${baseDir}`, {
    module: "workspace",
    agents: createdAgents.length,
  });
  return { baseDir, createdDirs: [...createdDirs], createdAgents, configCreated };
}
