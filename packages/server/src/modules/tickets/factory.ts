import path from "node:path";
import { expandHome, type ProjectConfig } from "../../config/project-config.js";
import { LocalYamlTicketSource } from "./local-yaml-ticket-source.js";
import type { TicketSource } from "./types.js";

export function createTicketSource(project: ProjectConfig, baseDir: string): TicketSource {
  const { type, path: location } = project.ticketSource;
  switch (type) {
    case "local_yaml":
      return new LocalYamlTicketSource(path.resolve(baseDir, expandHome(location)));
  }
}
