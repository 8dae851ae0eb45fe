/**
 * Workspace configuration
 *
 * `conductor.yaml` in the working directory is optional; every field has a
 * default. Relative directories resolve against the directory holding it.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ValidationError } from "../types.js";
import { readYamlFile, validate } from "./yaml.js";

export const WORKSPACE_CONFIG_FILE = "conductor.yaml";

export const WorkspaceConfigSchema = z.object({
  agentsDir: z.string().min(1).default("./agents"),
  projectsDir: z.string().min(1).default("./projects"),
  dbPath: z.string().min(1).optional(),
});

export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;

export function loadWorkspaceConfig(baseDir: string = process.cwd()): WorkspaceConfig {
  const configPath = path.join(baseDir, WORKSPACE_CONFIG_FILE);
  const data = fs.existsSync(configPath) ? (readYamlFile(configPath) ?? {}) : {};
  const config = validate(WorkspaceConfigSchema, data, configPath);

  return {
    agentsDir: path.resolve(baseDir, config.agentsDir),
    projectsDir: path.resolve(baseDir, config.projectsDir),
    dbPath: config.dbPath ? path.resolve(baseDir, config.dbPath) : undefined,
  };
}

export interface ServerConfig {
  port: number;
  host: string;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const rawPort = env.PORT ?? "0";
  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ValidationError(`Invalid PORT: ${rawPort}`);
  }
  return {
    port,
    host: env.HOST || "127.0.0.1",
  };
}
