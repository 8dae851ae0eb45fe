import type { Ticket, TicketPriority } from "../tickets/types.js";
import { generateTaskId } from "./ids.js";
import { DEFAULT_AGENT } from "./orchestrator.js";
import type { PlannedTask, Planner, PlanningContext } from "./types.js";

const PRIORITY_WEIGHTS: Record<TicketPriority, number> = { high: 2, medium: 1, low: 0 };

function describeTicket(ticket: Ticket): string {
  if (ticket.acceptanceCriteria.length === 0) return ticket.description;
  const criteria = ticket.acceptanceCriteria.map(item => `- ${item}`);
  return [ticket.description, "", "Acceptance criteria:", ...criteria].join("\n").trim();
}

/**
 * One task per open ticket. Ticket dependencies become task dependencies;
 * a dependency on a ticket that is not open counts as done.
 */
export class TicketPlanner implements Planner {
  public readonly requiresTickets = true;

  public constructor(private readonly agent: string = DEFAULT_AGENT) {}

  public async plan({ tickets }: PlanningContext): Promise<PlannedTask[]> {
    const taskIds = new Map(tickets.map(ticket => [ticket.id, generateTaskId()]));

    return tickets.map(ticket => ({
      id: taskIds.get(ticket.id) ?? generateTaskId(),
      title: ticket.title || ticket.id,
      description: describeTicket(ticket),
      assignedAgent: this.agent,
      priority: PRIORITY_WEIGHTS[ticket.priority],
      dependencies: ticket.dependencies.flatMap(dep => {
        const taskId = taskIds.get(dep);
        return taskId ? [taskId] : [];
      }),
      ticketId: ticket.id,
    }));
  }
}
