import type { Context } from "hono";
import type { StateStore } from "../modules/state/domain/repositories/state-store.js";

export type Env = {
  Variables: {
    requestId: string;
    startTime: number;
    store: StateStore;
  };
};

export type AppContext = Context<Env>;

export type AppVariables = Env["Variables"];
