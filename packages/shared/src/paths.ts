/**
 * @conductor/shared
 *
 * App path resolution for conductor.
 * Everything lives under $CONDUCTOR_HOME, defaulting to $HOME/.conductor
 */

import os from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";

export interface ResolvedAppPaths {
  home: string;
  config: string;
  db: string;
  logs: string;
  conductorDbPath: string;
  conductorDbUrl: string;
}

/**
 * Resolve conductor paths.
 * Uses CONDUCTOR_HOME if it is set to an absolute path, otherwise $HOME/.conductor
 */
export function resolveAppPaths(env: NodeJS.ProcessEnv = process.env): ResolvedAppPaths {
  const conductorHome = env.CONDUCTOR_HOME;
  const home =
    conductorHome && path.isAbsolute(conductorHome)
      ? conductorHome
      : path.join(os.homedir(), ".conductor");

  const db = path.join(home, "db");
  const conductorDbPath = path.join(db, "conductor.db");

  return {
    home,
    config: path.join(home, "config"),
    db,
    logs: path.join(home, "logs"),
    conductorDbPath,
    conductorDbUrl: pathToFileURL(conductorDbPath).href,
  };
}
