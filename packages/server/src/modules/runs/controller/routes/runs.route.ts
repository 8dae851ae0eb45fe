import { Hono } from "hono";
import type { Env } from "../../../../app/context.js";
import { zValidator } from "../../../../shared/controller/http/validators.js";
import {
  getRunSummaryUsecase,
  getRunUsecase,
  listRunTasksUsecase,
  listRunsUsecase,
} from "../../application/usecases/run-queries.usecase.js";
import { ListRunsQuerySchema } from "../schemas/run.schema.js";

const app = new Hono<Env>();

app.get("/api/runs", zValidator("query", ListRunsQuerySchema), async c => {
  const query = c.req.valid("query");
  const runs = await listRunsUsecase(c.get("store"), query);
  return c.json({ runs });
});

app.get("/api/runs/:runId", async c => {
  const run = await getRunUsecase(c.get("store"), c.req.param("runId"));
  return c.json({ run });
});

app.get("/api/runs/:runId/summary", async c => {
  const summary = await getRunSummaryUsecase(c.get("store"), c.req.param("runId"));
  return c.json(summary);
});

app.get("/api/runs/:runId/tasks", async c => {
  const tasks = await listRunTasksUsecase(c.get("store"), c.req.param("runId"));
  return c.json({ tasks });
});

export const runsRoutes = app;
