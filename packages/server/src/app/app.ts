import { createLogger, type Logger } from "@conductor/shared/logger";
import { Hono } from "hono";
import { errorHandler } from "../middleware/error-handler.js";
import type { StateStore } from "../modules/state/domain/repositories/state-store.js";
import type { Env } from "./context.js";
import { composeMiddleware } from "./middleware.js";
import { registerRoutes } from "./register-routes.js";

export interface CreateAppOptions {
  store: StateStore;
  logger?: Logger;
}

/**
 * Build the read-only status API over a state store
 */
export function createApp(options: CreateAppOptions): Hono<Env> {
  const app = new Hono<Env>();

  composeMiddleware(app, options.store, options.logger ?? createLogger("server"));

  registerRoutes(app);

  app.onError(errorHandler);

  app.notFound(c =>
    c.json(
      {
        error: {
          code: "NOT_FOUND",
          message: `Route ${c.req.method} ${c.req.path} not found`,
          requestId: c.get("requestId"),
        },
      },
      404
    )
  );

  app.get("/", c => {
    return c.text("conductor server running");
  });

  return app;
}
