import { z } from "zod";
import { DEFAULT_LIST_RUNS_LIMIT } from "../../../state/domain/types.js";

export const ListRunsQuerySchema = z.object({
  projectName: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(1000).default(DEFAULT_LIST_RUNS_LIMIT),
});

export type ListRunsQuery = z.infer<typeof ListRunsQuerySchema>;
