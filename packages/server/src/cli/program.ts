/**
 * conductor command line
 *
 *   conductor init [dir]
 *   conductor run <project> [--plan plan.yaml]
 *   conductor status <project> [--run-id <id>]
 *   conductor tickets <project>
 *   conductor agents
 *   conductor serve [--port <n>]
 */

import { Command, InvalidArgumentError } from "commander";
import { pathToFileURL } from "node:url";
import { openDatabase, type DatabaseHandle } from "../../db/index.js";
import { findProjectConfig, loadProjectConfig } from "../config/project-config.js";
import { loadWorkspaceConfig } from "../config/workspace-config.js";
import { AgentRegistry } from "../modules/agents/agent-registry.js";
import type { ImplementerRegistry } from "../modules/implementers/registry.js";
import { createOrchestrator } from "../modules/orchestrator/factory.js";
import { FilePlanner } from "../modules/orchestrator/file-planner.js";
import { TicketPlanner } from "../modules/orchestrator/ticket-planner.js";
import { DEFAULT_LIST_RUNS_LIMIT } from "../modules/state/domain/types.js";
import { DrizzleStateStore } from "../modules/state/infrastructure/repositories/state-store.drizzle.js";
import { createTicketSource } from "../modules/tickets/factory.js";
import { initWorkspace } from "../modules/workspace/init-workspace.js";
import { startServer } from "../server.js";
import {
  formatAgentList,
  formatInitResult,
  formatRunList,
  formatRunResult,
  formatRunSummary,
  formatTicketList,
} from "./format.js";

export const CLI_VERSION = "0.1.0";

export interface CliIO {
  out(text: string): void;
}

export interface CliDeps {
  io?: CliIO;
  implementers?: ImplementerRegistry;
}

interface DirOption {
  dir: string;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

/**
 * Workspace `dbPath` wins over DATABASE_URL and the app home default
 */
export function workspaceDatabaseUrl(baseDir: string): string | undefined {
  const { dbPath } = loadWorkspaceConfig(baseDir);
  return dbPath ? pathToFileURL(dbPath).href : undefined;
}

async function withDatabase<T>(
  baseDir: string,
  fn: (handle: DatabaseHandle) => Promise<T>
): Promise<T> {
  const handle = await openDatabase({ url: workspaceDatabaseUrl(baseDir) });
  try {
    return await fn(handle);
  } finally {
    handle.close();
  }
}

export function createProgram(deps: CliDeps = {}): Command {
  const io: CliIO = deps.io ?? { out: text => console.log(text) };
  const program = new Command();

  program
    .name("conductor")
    .description("Run dependency-ordered agent tasks against a project")
    .version(CLI_VERSION);

  program
    .command("init")
    .description("Create a workspace with default agents")
    .argument("[dir]", "workspace directory", ".")
    .action((dir: string) => {
      io.out(formatInitResult(initWorkspace(dir)));
    });

  program
    .command("run")
    .description("Plan and execute a run for a project")
    .argument("<project>", "project name (projects/<name>.yaml)")
    .option("-p, --plan <file>", "YAML plan file listing the tasks (default: open tickets)")
    .option("-d, --dir <dir>", "workspace directory", process.cwd())
    .option("--run-id <id>", "explicit run id")
    .action(async (projectName: string, options: DirOption & { plan?: string; runId?: string }) => {
      await withDatabase(options.dir, async handle => {
        const orchestrator = createOrchestrator({
          projectName,
          store: new DrizzleStateStore(handle.db),
          baseDir: options.dir,
          implementers: deps.implementers,
        });
        const result = await orchestrator.run({
          planner: options.plan ? new FilePlanner(options.plan) : new TicketPlanner(),
          runId: options.runId,
        });
        io.out(formatRunResult(result));
        if (result.status === "failed") {
          process.exitCode = 1;
        }
      });
    });

  program
    .command("status")
    .description("List recent runs of a project, or summarize one run")
    .argument("<project>", "project name")
    .option("-d, --dir <dir>", "workspace directory", process.cwd())
    .option("--run-id <id>", "summarize this run")
    .option("-n, --limit <n>", "number of runs to list", parseInteger, DEFAULT_LIST_RUNS_LIMIT)
    .action(async (projectName: string, options: DirOption & { runId?: string; limit: number }) => {
      await withDatabase(options.dir, async handle => {
        const store = new DrizzleStateStore(handle.db);
        if (options.runId) {
          io.out(formatRunSummary(await store.runSummary(options.runId)));
          return;
        }
        io.out(formatRunList(await store.listRuns({ projectName, limit: options.limit })));
      });
    });

  program
    .command("tickets")
    .description("List the tickets of a project")
    .argument("<project>", "project name")
    .option("-d, --dir <dir>", "workspace directory", process.cwd())
    .action(async (projectName: string, options: DirOption) => {
      const workspace = loadWorkspaceConfig(options.dir);
      const project = loadProjectConfig(findProjectConfig(projectName, workspace.projectsDir));
      const tickets = await createTicketSource(project, options.dir).loadTickets();
      io.out(formatTicketList(projectName, tickets));
    });

  program
    .command("agents")
    .description("List agent definitions of the workspace")
    .option("-d, --dir <dir>", "workspace directory", process.cwd())
    .action((options: DirOption) => {
      const registry = new AgentRegistry(loadWorkspaceConfig(options.dir).agentsDir);
      registry.loadAll();
      io.out(formatAgentList(registry.list()));
    });

  program
    .command("serve")
    .description("Serve the read-only status API")
    .option("-d, --dir <dir>", "workspace directory", process.cwd())
    .option("--port <n>", "port to listen on (0 picks one)", parseInteger)
    .option("--host <host>", "interface to bind")
    .action(async (options: DirOption & { port?: number; host?: string }) => {
      const running = await startServer({
        databaseUrl: workspaceDatabaseUrl(options.dir),
        port: options.port,
        host: options.host,
      });
      io.out(`Status API listening on http://${running.host}:${running.port}`);
    });

  return program;
}
