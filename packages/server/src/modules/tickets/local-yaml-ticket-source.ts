/**
 * Tickets kept as YAML files in a directory.
 *
 * `tickets.yaml` is read first, then every other `*.yaml` and `*.yml` file in
 * name order. A file holds a list of tickets, a `tickets:` list, or a single
 * ticket. When two files use the same id the first one read wins.
 */

import { createLogger } from "@conductor/shared/logger";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { readYamlFile, validate } from "../../config/yaml.js";
import { TicketSchema, type Ticket, type TicketSource } from "./types.js";

const logger = createLogger("server");

export const TICKETS_FILE = "tickets.yaml";

const TicketListSchema = z.array(TicketSchema);
const TicketFileSchema = z.object({ tickets: TicketListSchema });

function parseTicketFile(data: unknown, source: string): Ticket[] {
  if (data === null || data === undefined) return [];
  if (Array.isArray(data)) return validate(TicketListSchema, data, source);
  if (typeof data === "object" && data !== null && "tickets" in data) {
    return validate(TicketFileSchema, data, source).tickets;
  }
  return [validate(TicketSchema, data, source)];
}

export class LocalYamlTicketSource implements TicketSource {
  public constructor(private readonly dir: string) {}

  public async loadTickets(): Promise<Ticket[]> {
    if (!fs.existsSync(this.dir)) {
      logger.debug("Ticket directory does not exist", { module: "tickets", dir: this.dir });
      return [];
    }

    const seen = new Set<string>();
    const tickets: Ticket[] = [];
    for (const file of this.ticketFiles()) {
      for (const ticket of parseTicketFile(readYamlFile(file), file)) {
        if (seen.has(ticket.id)) continue;
        seen.add(ticket.id);
        tickets.push(ticket);
      }
    }
    return tickets;
  }

  public async getTicket(ticketId: string): Promise<Ticket | null> {
    const tickets = await this.loadTickets();
    return tickets.find(ticket => ticket.id === ticketId) ?? null;
  }

  private ticketFiles(): string[] {
    const names = fs.readdirSync(this.dir).sort();
    const yaml = names.filter(name => name.endsWith(".yaml") && name !== TICKETS_FILE);
    const yml = names.filter(name => name.endsWith(".yml"));
    const ordered = [...(names.includes(TICKETS_FILE) ? [TICKETS_FILE] : []), ...yaml, ...yml];
    return ordered.map(name => path.join(this.dir, name));
  }
}
