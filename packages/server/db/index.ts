/**
 * Database client setup
 *
 * Opens a Drizzle ORM database over libsql/SQLite. Supports a local SQLite
 * file (the default, under the app home) or a remote libsql server.
 *
 * The handle is returned to the caller rather than kept as a module
 * singleton: the state store receives it explicitly.
 */

import { createLogger } from "@conductor/shared/logger";
import { resolveAppPaths } from "@conductor/shared/paths";
import { createClient, type Client } from "@libsql/client";
import { drizzle, type LibSQLDatabase } from "drizzle-orm/libsql";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import { ensureSchema } from "./migrate.js";
import * as schema from "./schema.js";

const logger = createLogger("server");

export type ConductorDatabase = LibSQLDatabase<typeof schema>;

export interface DatabaseHandle {
  url: string;
  db: ConductorDatabase;
  client: Client;
  close(): void;
}

export interface OpenDatabaseOptions {
  url?: string;
  authToken?: string;
}

/**
 * Get database URL from environment or use default local file
 */
export function getDatabaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  const envUrl = env.DATABASE_URL;
  if (envUrl) {
    if (envUrl === ":memory:" || envUrl.startsWith("libsql:")) {
      return envUrl;
    }
    if (envUrl.startsWith("file:")) {
      const filePath = envUrl.replace(/^file:(\/\/)?/, "");
      if (path.isAbsolute(filePath)) {
        return pathToFileURL(filePath).href;
      }
      return pathToFileURL(path.resolve(process.cwd(), filePath)).href;
    }
    if (envUrl.startsWith("http://") || envUrl.startsWith("https://")) {
      return envUrl;
    }
    return pathToFileURL(path.resolve(process.cwd(), envUrl)).href;
  }
  return resolveAppPaths(env).conductorDbUrl;
}

/**
 * Get database auth token for remote libsql
 */
export function getDatabaseAuthToken(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.DATABASE_AUTH_TOKEN || undefined;
}

function ensureDbDirectory(url: string): void {
  if (!url.startsWith("file:") || url.includes(":memory:")) {
    return;
  }
  const dir = path.dirname(fileURLToPath(url));
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Open the database, apply connection pragmas and make sure the schema exists
 */
export async function openDatabase(options: OpenDatabaseOptions = {}): Promise<DatabaseHandle> {
  const url = options.url ?? getDatabaseUrl();
  const authToken = options.authToken ?? getDatabaseAuthToken();
  const isLocal = url.startsWith("file:") || url === ":memory:";

  ensureDbDirectory(url);

  const client = createClient({ url, authToken });
  const db = drizzle(client, { schema });

  if (isLocal) {
    // Set busy timeout first so concurrent writers wait instead of failing
    await client.execute("PRAGMA busy_timeout = 10000");
    try {
      await client.execute("PRAGMA journal_mode = WAL");
    } catch (error) {
      logger.debug("WAL journal mode unavailable, keeping default", {
        module: "db",
        error: error instanceof Error ? error.message : String(error),
      });
    }
    await client.execute("PRAGMA foreign_keys = ON");
  }

  await ensureSchema(client);
  logger.debug("Database ready", { module: "db", url: isLocal ? url : "remote" });

  return {
    url,
    db,
    client,
    close() {
      client.close();
    },
  };
}

export * from "./schema.js";
export { ensureSchema, STORE_TABLES } from "./migrate.js";
