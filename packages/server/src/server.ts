/**
 * HTTP server lifecycle
 */

import { createLogger } from "@conductor/shared/logger";
import { serve, type ServerType } from "@hono/node-server";
import { openDatabase, type DatabaseHandle } from "../db/index.js";
import { createApp } from "./app/app.js";
import { loadServerConfig } from "./config/workspace-config.js";
import type { StateStore } from "./modules/state/domain/repositories/state-store.js";
import { DrizzleStateStore } from "./modules/state/infrastructure/repositories/state-store.drizzle.js";

const logger = createLogger("server");

export interface StartServerOptions {
  /** Serve this store instead of opening the configured database */
  store?: StateStore;
  databaseUrl?: string;
  port?: number;
  host?: string;
  /** Close the server on SIGINT/SIGTERM (default true) */
  handleSignals?: boolean;
}

export interface RunningServer {
  server: ServerType;
  port: number;
  host: string;
  close(): Promise<void>;
}

export async function startServer(options: StartServerOptions = {}): Promise<RunningServer> {
  const config = loadServerConfig();
  const host = options.host ?? config.host;
  const requestedPort = options.port ?? config.port;

  let database: DatabaseHandle | null = null;
  let store = options.store;
  if (!store) {
    database = await openDatabase({ url: options.databaseUrl });
    store = new DrizzleStateStore(database.db);
  }

  const app = createApp({ store, logger });

  let server: ServerType | undefined;
  const port = await new Promise<number>(resolve => {
    server = serve({ fetch: app.fetch, port: requestedPort, hostname: host }, info =>
      resolve(info.port)
    );
  });
  if (!server) {
    throw new Error("Server failed to start");
  }
  const instance = server;

  logger.info(`Server started on http://${host}:${port}`, {
    module: "server:lifecycle",
    port,
  });

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    closing ??= new Promise<void>((resolve, reject) => {
      instance.close(error => {
        database?.close();
        if (error) {
          reject(error);
          return;
        }
        logger.info("Server closed", { module: "server:lifecycle" });
        resolve();
      });
    });
    return closing;
  };

  if (options.handleSignals ?? true) {
    const onSignal = (signal: NodeJS.Signals) => {
      logger.info(`Received ${signal}, shutting down`, { module: "server:lifecycle" });
      close().catch(error => {
        logger.error("Shutdown failed", error instanceof Error ? error : undefined, {
          module: "server:lifecycle",
        });
        process.exitCode = 1;
      });
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }

  return { server: instance, port, host, close };
}
