import { NotFoundError } from "../../../../types.js";
import type { StateStore } from "../../../state/domain/repositories/state-store.js";
import type { ListRunsOptions, Run, RunSummary, Task } from "../../../state/domain/types.js";

export async function listRunsUsecase(store: StateStore, options: ListRunsOptions): Promise<Run[]> {
  return store.listRuns(options);
}

export async function getRunUsecase(store: StateStore, runId: string): Promise<Run> {
  const run = await store.getRun(runId);
  if (!run) {
    throw new NotFoundError(`Run '${runId}'`);
  }
  return run;
}

export async function getRunSummaryUsecase(store: StateStore, runId: string): Promise<RunSummary> {
  return store.runSummary(runId);
}

export async function listRunTasksUsecase(store: StateStore, runId: string): Promise<Task[]> {
  await getRunUsecase(store, runId);
  return store.listTasks(runId);
}
