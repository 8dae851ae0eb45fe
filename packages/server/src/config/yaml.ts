import fs from "node:fs";
import yaml from "js-yaml";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { NotFoundError, ValidationError } from "../types.js";

export interface IssueDetail {
  path: string;
  message: string;
}

export function formatIssues(error: ZodError): IssueDetail[] {
  return error.issues.map(issue => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Parse YAML text. Syntax errors become ValidationError naming the source.
 */
export function parseYaml(text: string, source: string): unknown {
  try {
    return yaml.load(text, { filename: source });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid YAML in ${source}: ${reason}`);
  }
}

export function readYamlFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError(`File '${filePath}'`);
  }
  return parseYaml(fs.readFileSync(filePath, "utf-8"), filePath);
}

/**
 * Validate parsed data against a schema, raising ValidationError with the
 * zod issues as details.
 */
export function validate<TOutput, TInput>(
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  data: unknown,
  source: string
): TOutput {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration in ${source}`, formatIssues(parsed.error));
  }
  return parsed.data;
}
