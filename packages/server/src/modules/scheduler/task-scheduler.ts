/**
 * Dependency-aware task scheduler
 *
 * Repeatedly asks the state store which tasks are ready, launches them in
 * batches bounded by a semaphore, and writes every outcome back. Readiness is
 * never cached between iterations.
 */

import { createLogger, type Logger } from "@conductor/shared/logger";
import { setTimeout as sleep } from "node:timers/promises";
import { StoreUnavailableError, TaskExecutionFailure } from "../../types.js";
import type { StateStore } from "../state/domain/repositories/state-store.js";
import type { Task } from "../state/domain/types.js";
import { Semaphore } from "./semaphore.js";
import type { TaskExecutor, TaskOutcome, TaskSchedulerOptions } from "./types.js";

export const DEFAULT_MAX_PARALLEL = 3;
export const DEFAULT_POLL_INTERVAL_MS = 500;

function isRejected<T>(result: PromiseSettledResult<T>): result is PromiseRejectedResult {
  return result.status === "rejected";
}

export class TaskScheduler {
  private readonly store: StateStore;
  private readonly maxParallel: number;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;

  public constructor(store: StateStore, options: TaskSchedulerOptions = {}) {
    const maxParallel = options.maxParallel ?? DEFAULT_MAX_PARALLEL;
    if (!Number.isInteger(maxParallel) || maxParallel < 1) {
      throw new Error(`maxParallel must be a positive integer, got ${maxParallel}`);
    }
    this.store = store;
    this.maxParallel = maxParallel;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = (options.logger ?? createLogger("server")).child({ module: "scheduler" });
  }

  /**
   * Run every reachable task of a run to a terminal state.
   *
   * Returns one outcome per executed task, in completion order. Tasks whose
   * dependencies never complete stay pending and produce no outcome. Store
   * errors, including a StoreUnavailableError thrown by the executor, abort
   * the loop once the current batch has settled.
   */
  public async executeAll(runId: string, executor: TaskExecutor): Promise<TaskOutcome[]> {
    const semaphore = new Semaphore(this.maxParallel);
    const outcomes: TaskOutcome[] = [];
    const log = this.logger.child({ runId });

    for (;;) {
      const ready = await this.store.readyTasks(runId);

      if (ready.length === 0) {
        const tasks = await this.store.listTasks(runId);
        const inFlight = tasks.some(t => t.status === "queued" || t.status === "running");
        if (!inFlight) break;
        await sleep(this.pollIntervalMs);
        continue;
      }

      const batch: Task[] = [];
      for (const task of ready) {
        const queued = await this.store.setTaskStatus(task.id, "queued");
        if (queued.status === "queued") batch.push(queued);
      }
      log.debug(`Launching batch of ${batch.length}`, {
        taskIds: batch.map(t => t.id),
      });

      const settled = await Promise.allSettled(
        batch.map(task => this.runTask(task, executor, semaphore, outcomes, log))
      );
      const fault = settled.find(isRejected);
      if (fault) {
        throw fault.reason;
      }
    }

    const failed = outcomes.filter(o => !o.success).length;
    log.info(`Finished: ${outcomes.length - failed} completed, ${failed} failed`);
    return outcomes;
  }

  private async runTask(
    task: Task,
    executor: TaskExecutor,
    semaphore: Semaphore,
    outcomes: TaskOutcome[],
    log: Logger
  ): Promise<void> {
    const release = await semaphore.acquire();
    try {
      const running = await this.store.setTaskStatus(task.id, "running");
      log.info(`Running task: ${task.title}`, { taskId: task.id });

      let outcome: TaskOutcome;
      try {
        const result = await executor(running);
        outcome = { taskId: task.id, ...result };
      } catch (error) {
        // store faults abort the run; the task keeps its status
        if (error instanceof StoreUnavailableError) throw error;

        const failure = new TaskExecutionFailure(
          task.id,
          error instanceof Error ? error.message : String(error),
          { cause: error }
        );
        log.error(`Executor threw for task: ${task.title}`, failure, { taskId: task.id });
        outcome = { taskId: task.id, success: false, output: "", error: failure.message };
      }

      if (outcome.success) {
        await this.store.setTaskStatus(task.id, "completed", outcome.output);
        log.info(`Completed: ${task.title}`, { taskId: task.id });
      } else {
        await this.store.setTaskStatus(task.id, "failed", outcome.error);
        log.warn(`Failed: ${task.title}: ${outcome.error ?? "no error reported"}`, {
          taskId: task.id,
        });
      }
      outcomes.push(outcome);
    } finally {
      release();
    }
  }
}
