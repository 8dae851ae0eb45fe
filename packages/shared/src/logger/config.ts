/**
 * Logger configuration for @conductor/shared/logger
 *
 *   LOG_LEVEL, LOG_LEVEL_<PACKAGE>   debug | info | warn | error | silent
 *   LOG_FILE_PATH                    write JSON lines to this file
 *   LOG_FILE_OUTPUT                  1/true/yes/on forces file output
 *   NODE_ENV=production              JSON output, no pretty printing
 */

import { LOG_LEVELS, type LogLevel, type LoggerConfig } from "./types.js";

const TRUTHY = new Set(["1", "true", "yes", "on"]);

const REDACTED_PATHS = [
  "req.headers.authorization",
  "req.headers.cookie",
  "apiKey",
  "token",
  "password",
  "secret",
];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = (value ?? "").trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? fallback;
}

export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const production = env.NODE_ENV === "production";
  const filePath = env.LOG_FILE_PATH || undefined;
  const fileOutput =
    production || TRUTHY.has((env.LOG_FILE_OUTPUT ?? "").toLowerCase()) || filePath !== undefined;

  return {
    level: parseLogLevel(env.LOG_LEVEL),
    prettyPrint: !production && filePath === undefined,
    fileOutput,
    filePath,
    redact: [...REDACTED_PATHS],
  };
}

/**
 * `server-api` reads LOG_LEVEL_SERVER_API, then LOG_LEVEL
 */
export function getPackageLogLevel(
  packageName: string,
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  const suffix = packageName.toUpperCase().replace(/[^A-Z0-9]/g, "_");
  return parseLogLevel(env[`LOG_LEVEL_${suffix}`], parseLogLevel(env.LOG_LEVEL));
}
