import { Hono } from "hono";
import type { Env } from "../../../../app/context.js";
import {
  getTaskUsecase,
  listTaskExecutionsUsecase,
  listTaskLogsUsecase,
} from "../../application/usecases/task-queries.usecase.js";

const app = new Hono<Env>();

app.get("/api/tasks/:taskId", async c => {
  const task = await getTaskUsecase(c.get("store"), c.req.param("taskId"));
  return c.json({ task });
});

app.get("/api/tasks/:taskId/logs", async c => {
  const logs = await listTaskLogsUsecase(c.get("store"), c.req.param("taskId"));
  return c.json({ logs });
});

app.get("/api/tasks/:taskId/executions", async c => {
  const executions = await listTaskExecutionsUsecase(c.get("store"), c.req.param("taskId"));
  return c.json({ executions });
});

export const tasksRoutes = app;
