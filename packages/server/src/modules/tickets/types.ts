import { z } from "zod";

export const TICKET_STATUSES = ["open", "in_progress", "done", "blocked"] as const;
export type TicketStatus = (typeof TICKET_STATUSES)[number];

export const TICKET_PRIORITIES = ["high", "medium", "low"] as const;
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];

const TicketIdSchema = z
  .union([z.string(), z.number()])
  .transform(value => String(value))
  .pipe(z.string().min(1));

export const TicketSchema = z.object({
  id: TicketIdSchema,
  title: z.string().default(""),
  description: z.string().default(""),
  priority: z.enum(TICKET_PRIORITIES).default("medium"),
  status: z.enum(TICKET_STATUSES).default("open"),
  labels: z.array(z.string()).default([]),
  dependencies: z.array(TicketIdSchema).default([]),
  acceptanceCriteria: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
});

/**
 * A work item handed to planning
 */
export type Ticket = z.infer<typeof TicketSchema>;

export interface TicketSource {
  loadTickets(): Promise<Ticket[]>;
  getTicket(ticketId: string): Promise<Ticket | null>;
}
