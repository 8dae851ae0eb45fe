/**
 * Project configuration
 *
 * One YAML file per managed project, found by name under the workspace's
 * projects directory.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { NotFoundError } from "../types.js";
import { readYamlFile, validate } from "./yaml.js";

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export const ProjectStructureSchema = z.object({
  language: z.string().default("python"),
  framework: z.string().optional(),
  testRunner: z.string().optional(),
});

export const ProjectSettingsSchema = z.object({
  maxParallelAgents: z.number().int().min(1).max(20).default(3),
  implementer: z.string().min(1).default("claude_code"),
  pollIntervalMs: z.number().int().positive().default(500),
  executionTimeoutMs: z.number().int().positive().default(600_000),
});

export const TICKET_SOURCE_TYPES = ["local_yaml"] as const;

/** `path` resolves against the workspace directory */
export const TicketSourceConfigSchema = z.object({
  type: z.enum(TICKET_SOURCE_TYPES).default("local_yaml"),
  path: z.string().min(1).default("./tickets"),
});

export const ProjectConfigSchema = z.object({
  name: z.string().min(1),
  repoPath: z
    .string()
    .min(1)
    .transform(value => path.resolve(expandHome(value)))
    .refine(
      value => fs.existsSync(value),
      value => ({ message: `Repository path does not exist: ${value}` })
    ),
  structure: ProjectStructureSchema.default({}),
  agents: z.array(z.string().min(1)).default(["developer", "reviewer"]),
  settings: ProjectSettingsSchema.default({}),
  ticketSource: TicketSourceConfigSchema.default({}),
});

export type ProjectStructure = z.infer<typeof ProjectStructureSchema>;
export type ProjectSettings = z.infer<typeof ProjectSettingsSchema>;
export type TicketSourceConfig = z.infer<typeof TicketSourceConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export function parseProjectConfig(data: unknown, source = "project config"): ProjectConfig {
  return validate(ProjectConfigSchema, data, source);
}

export function loadProjectConfig(filePath: string): ProjectConfig {
  return parseProjectConfig(readYamlFile(filePath), filePath);
}

/**
 * Locate `<name>.yaml` or `<name>.yml` in the projects directory
 */
export function findProjectConfig(projectName: string, projectsDir: string): string {
  const candidates = [
    path.join(projectsDir, `${projectName}.yaml`),
    path.join(projectsDir, `${projectName}.yml`),
  ];
  const found = candidates.find(candidate => fs.existsSync(candidate));
  if (!found) {
    throw new NotFoundError(
      `Config for project '${projectName}' (looked for ${candidates.join(", ")})`
    );
  }
  return found;
}
