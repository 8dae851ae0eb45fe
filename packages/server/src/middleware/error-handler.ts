/**
 * Error handler
 *
 * Maps errors thrown anywhere in the chain to the standard error body.
 * Unknown errors become a generic 500 without internal details.
 *
 * Register with `app.onError(errorHandler)`.
 */

import { createLogger } from "@conductor/shared/logger";
import type { Context } from "hono";
import type { Env } from "../app/context.js";
import { AppError, ValidationError, type ErrorResponse } from "../types.js";

const logger = createLogger("server");

export function createErrorResponse(error: unknown, requestId: string): ErrorResponse {
  if (!(error instanceof AppError)) {
    return {
      error: { code: "INTERNAL_ERROR", message: "An unexpected error occurred", requestId },
    };
  }

  const body: ErrorResponse["error"] = { code: error.code, message: error.message, requestId };
  if (error instanceof ValidationError && error.details !== undefined) {
    body.details = error.details;
  }
  return { error: body };
}

export function errorHandler(err: unknown, c: Context<Env>): Response {
  const requestId = c.get("requestId");
  const context = {
    module: "error-handler",
    requestId,
    path: c.req.path,
    method: c.req.method,
  };

  if (err instanceof AppError && err.status < 500) {
    logger.warn(`Request failed: ${err.message}`, context);
  } else if (err instanceof Error) {
    logger.error("Request failed", err, context);
  } else {
    logger.error("Request failed", undefined, { ...context, error: String(err) });
  }

  const status = err instanceof AppError ? err.status : 500;
  return c.json(createErrorResponse(err, requestId), status);
}
