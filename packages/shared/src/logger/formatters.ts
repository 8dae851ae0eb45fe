/**
 * Pino formatters for @conductor/shared/logger
 */

import type { LoggerContext } from "./types.js";

/**
 * `[package:module]`, else `[package:agent:<name>]` or
 * `[package:implementer:<name>]`, else `[package]`
 */
export function createPrefix(context: LoggerContext): string {
  const scope = context.module
    ? [context.module]
    : context.agent
      ? ["agent", context.agent]
      : context.implementer
        ? ["implementer", context.implementer]
        : [];
  return `[${[context.package, ...scope].join(":")}]`;
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Pino `formatters.log` hook: attaches the prefix and an ISO time to each record
 */
export function createLogFormatter(packageName: string) {
  return (object: Record<string, unknown>): Record<string, unknown> => {
    const prefix = createPrefix({
      package: readString(object.package) ?? packageName,
      module: readString(object.module),
      agent: readString(object.agent),
      implementer: readString(object.implementer),
    });
    return {
      ...object,
      prefix,
      time: object.time ?? new Date().toISOString(),
    };
  };
}
