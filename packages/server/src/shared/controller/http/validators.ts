import { zValidator as baseZValidator } from "@hono/zod-validator";
import type { ValidationTargets } from "hono";
import type { z } from "zod";
import { formatIssues } from "../../../config/yaml.js";
import { ValidationError } from "../../../types.js";

/**
 * zod validator whose failures go through the central error handler
 */
export const zValidator = <TSchema extends z.ZodSchema, TTarget extends keyof ValidationTargets>(
  target: TTarget,
  schema: TSchema
) =>
  baseZValidator(target, schema, result => {
    if (!result.success) {
      const firstIssue = result.error.issues[0];
      const field = typeof firstIssue?.path[0] === "string" ? firstIssue.path[0] : undefined;
      throw new ValidationError(
        field ? `Invalid ${field} parameter` : "Invalid request",
        formatIssues(result.error)
      );
    }
  });
