import type { Hono } from "hono";
import { healthRoutes } from "../modules/health/controller/routes/health.route.js";
import { runsRoutes } from "../modules/runs/controller/routes/runs.route.js";
import { tasksRoutes } from "../modules/tasks/controller/routes/tasks.route.js";
import type { Env } from "./context.js";

export function registerRoutes(app: Hono<Env>): void {
  app.route("/", healthRoutes);
  app.route("/", runsRoutes);
  app.route("/", tasksRoutes);
}
