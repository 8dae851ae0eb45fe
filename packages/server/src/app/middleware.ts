import type { Logger } from "@conductor/shared/logger";
import type { Hono, MiddlewareHandler } from "hono";
import { cors } from "hono/cors";
import { v7 as uuidv7 } from "uuid";
import type { StateStore } from "../modules/state/domain/repositories/state-store.js";
import type { Env } from "./context.js";

export const REQUEST_ID_HEADER = "X-Request-ID";

/**
 * Tags the request with a UUIDv7 and logs it once the response is ready
 */
export function requestLogging(logger: Logger): MiddlewareHandler<Env> {
  const log = logger.child({ module: "api" });

  return async (c, next) => {
    const requestId = uuidv7();
    const startTime = Date.now();
    c.set("requestId", requestId);
    c.set("startTime", startTime);
    c.header(REQUEST_ID_HEADER, requestId);

    const label = `${c.req.method} ${c.req.path}`;
    log.debug(label, { requestId });
    await next();
    log.info(`${label} ${c.res.status}`, {
      requestId,
      status: c.res.status,
      duration: Date.now() - startTime,
    });
  };
}

export function provideStore(store: StateStore): MiddlewareHandler<Env> {
  return async (c, next) => {
    c.set("store", store);
    await next();
  };
}

export function composeMiddleware(app: Hono<Env>, store: StateStore, logger: Logger): void {
  app.use("*", requestLogging(logger));
  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "OPTIONS"],
      allowHeaders: ["Content-Type"],
      exposeHeaders: [REQUEST_ID_HEADER],
    })
  );
  app.use("*", provideStore(store));
}
