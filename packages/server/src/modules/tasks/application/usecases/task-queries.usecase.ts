import { NotFoundError } from "../../../../types.js";
import type { StateStore } from "../../../state/domain/repositories/state-store.js";
import type { AgentExecution, Task, TaskLog } from "../../../state/domain/types.js";

export async function getTaskUsecase(store: StateStore, taskId: string): Promise<Task> {
  const task = await store.getTask(taskId);
  if (!task) {
    throw new NotFoundError(`Task '${taskId}'`);
  }
  return task;
}

export async function listTaskLogsUsecase(store: StateStore, taskId: string): Promise<TaskLog[]> {
  await getTaskUsecase(store, taskId);
  return store.listLogs(taskId);
}

export async function listTaskExecutionsUsecase(
  store: StateStore,
  taskId: string
): Promise<AgentExecution[]> {
  await getTaskUsecase(store, taskId);
  return store.listExecutions(taskId);
}
