import { z } from "zod";
import { readYamlFile, validate } from "../../config/yaml.js";
import { generateTaskId } from "./ids.js";
import type { PlannedTask, Planner } from "./types.js";

export const PlannedTaskSchema = z.object({
  id: z.string().min(1).optional(),
  title: z.string().min(1),
  description: z.string().default(""),
  assignedAgent: z.string().min(1).default("developer"),
  priority: z.number().int().default(0),
  dependencies: z.array(z.string().min(1)).default([]),
  ticketId: z.string().min(1).optional(),
});

export const PlanFileSchema = z.object({
  tasks: z.array(PlannedTaskSchema),
});

/**
 * Reads a ready-made plan from a YAML file:
 *
 * ```yaml
 * tasks:
 *   - id: api
 *     title: Add endpoint
 *     dependencies: []
 * ```
 */
export class FilePlanner implements Planner {
  public constructor(private readonly planPath: string) {}

  public async plan(): Promise<PlannedTask[]> {
    const plan = validate(PlanFileSchema, readYamlFile(this.planPath), this.planPath);
    return plan.tasks.map(task => ({ ...task, id: task.id ?? generateTaskId() }));
  }
}
