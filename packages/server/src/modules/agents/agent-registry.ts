import { createLogger } from "@conductor/shared/logger";
import fs from "node:fs";
import path from "node:path";
import { NotFoundError } from "../../types.js";
import { parseAgentDefinition, type AgentDefinition } from "./agent-definition.js";

const logger = createLogger("server");

/**
 * Agent definitions loaded from a directory of Markdown files.
 *
 * Loading is lazy: the first `get` or `list` reads the directory.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, AgentDefinition>();

  public constructor(private readonly agentsDir: string) {}

  public loadAll(): ReadonlyMap<string, AgentDefinition> {
    if (!fs.existsSync(this.agentsDir)) {
      throw new NotFoundError(`Agents directory '${this.agentsDir}'`);
    }

    this.agents.clear();
    const files = fs
      .readdirSync(this.agentsDir)
      .filter(file => file.endsWith(".md"))
      .sort();

    for (const file of files) {
      const sourcePath = path.join(this.agentsDir, file);
      const agent = parseAgentDefinition(fs.readFileSync(sourcePath, "utf-8"), sourcePath);
      this.agents.set(agent.name, agent);
    }

    logger.debug(`Loaded ${this.agents.size} agent definitions`, {
      module: "agents",
      agentsDir: this.agentsDir,
    });
    return this.agents;
  }

  public has(name: string): boolean {
    this.ensureLoaded();
    return this.agents.has(name);
  }

  public get(name: string): AgentDefinition {
    this.ensureLoaded();
    const agent = this.agents.get(name);
    if (!agent) {
      throw new NotFoundError(`Agent '${name}'`, `Available: ${this.names().join(", ") || "none"}`);
    }
    return agent;
  }

  public list(): AgentDefinition[] {
    this.ensureLoaded();
    return [...this.agents.values()];
  }

  public names(): string[] {
    return [...this.agents.keys()];
  }

  private ensureLoaded(): void {
    if (this.agents.size === 0) {
      this.loadAll();
    }
  }
}
