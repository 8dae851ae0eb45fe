import type { StatusCounts, Task } from "./types.js";

/**
 * Order tasks by priority (highest first), then by creation time.
 *
 * `Array.prototype.sort` is stable, so tasks created in the same
 * millisecond keep their insertion order.
 */
export function sortTasks(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) => {
    if (a.priority !== b.priority) return b.priority - a.priority;
    return a.createdAt.getTime() - b.createdAt.getTime();
  });
}

/**
 * Pending tasks whose every dependency is completed in the same run.
 *
 * Input order is preserved.
 */
export function selectReadyTasks(tasks: readonly Task[]): Task[] {
  const completed = new Set(tasks.filter(t => t.status === "completed").map(t => t.id));
  return tasks.filter(
    task => task.status === "pending" && task.dependencies.every(dep => completed.has(dep))
  );
}

/**
 * Pending tasks that can never become ready.
 *
 * A task can still complete when it is completed, queued or running, or when
 * it is pending and every dependency can still complete. Everything pending
 * outside that set is starved: a dependency failed, was skipped, is not a
 * task of this run, or sits on a cycle (a self-dependency included).
 */
export function findStarvedTasks(tasks: readonly Task[]): Task[] {
  const completable = new Set(
    tasks
      .filter(t => t.status === "completed" || t.status === "queued" || t.status === "running")
      .map(t => t.id)
  );
  let changed = true;

  while (changed) {
    changed = false;
    for (const task of tasks) {
      if (task.status !== "pending" || completable.has(task.id)) continue;
      if (task.dependencies.every(dep => completable.has(dep))) {
        completable.add(task.id);
        changed = true;
      }
    }
  }

  return tasks.filter(task => task.status === "pending" && !completable.has(task.id));
}

export function countStatuses(tasks: readonly Task[]): StatusCounts {
  const counts: StatusCounts = {};
  for (const task of tasks) {
    counts[task.status] = (counts[task.status] ?? 0) + 1;
  }
  return counts;
}
