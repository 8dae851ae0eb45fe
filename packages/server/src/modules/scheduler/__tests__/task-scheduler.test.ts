import { setTimeout as sleep } from "node:timers/promises";
import { beforeEach, describe, expect, it } from "vitest";
import type { Logger } from "@conductor/shared/logger";
import { StoreUnavailableError, TaskExecutionFailure } from "../../../types.js";
import type { Task, TaskStatus } from "../../state/domain/types.js";
import { InMemoryStateStore } from "../../state/infrastructure/repositories/state-store.memory.js";
import { TaskScheduler } from "../task-scheduler.js";
import type { ExecutorResult } from "../types.js";

const RUN_ID = "run-1";

async function seed(
  store: InMemoryStateStore,
  tasks: Array<{ id: string; dependencies?: string[]; priority?: number }>
): Promise<void> {
  await store.createRun({ id: RUN_ID, projectName: "demo" });
  for (const task of tasks) {
    await store.createTask({ runId: RUN_ID, title: task.id, ...task });
  }
}

function succeed(output: string): ExecutorResult {
  return { success: true, output };
}

function capturingLogger(errors: Array<{ msg: string; err?: Error }>): Logger {
  const logger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: (msg, err) => {
      errors.push({ msg, err });
    },
    child: () => logger,
  };
  return logger;
}

describe("TaskScheduler", () => {
  let store: InMemoryStateStore;

  beforeEach(() => {
    store = new InMemoryStateStore();
  });

  it("rejects a maxParallel below one", () => {
    expect(() => new TaskScheduler(store, { maxParallel: 0 })).toThrow(
      "maxParallel must be a positive integer"
    );
  });

  it("returns no outcomes for a run without tasks", async () => {
    await store.createRun({ id: RUN_ID, projectName: "demo" });
    const scheduler = new TaskScheduler(store, { pollIntervalMs: 1 });

    expect(await scheduler.executeAll(RUN_ID, async () => succeed("x"))).toEqual([]);
  });

  it("runs independent tasks together and their dependent afterwards", async () => {
    await seed(store, [{ id: "A" }, { id: "B" }, { id: "C", dependencies: ["A", "B"] }]);
    const events: string[] = [];
    const scheduler = new TaskScheduler(store, { maxParallel: 2, pollIntervalMs: 1 });

    const outcomes = await scheduler.executeAll(RUN_ID, async task => {
      events.push(`start:${task.id}`);
      await sleep(5);
      events.push(`end:${task.id}`);
      return succeed(`done ${task.id}`);
    });

    expect(events.slice(0, 2)).toEqual(["start:A", "start:B"]);
    expect(events.indexOf("start:C")).toBeGreaterThan(events.indexOf("end:A"));
    expect(events.indexOf("start:C")).toBeGreaterThan(events.indexOf("end:B"));
    expect(outcomes.map(o => o.taskId).sort()).toEqual(["A", "B", "C"]);
    expect(outcomes[2]).toEqual({ taskId: "C", success: true, output: "done C" });

    const tasks = await store.listTasks(RUN_ID);
    expect(tasks.map(t => [t.id, t.status, t.result])).toEqual([
      ["A", "completed", "done A"],
      ["B", "completed", "done B"],
      ["C", "completed", "done C"],
    ]);
  });

  it("records a thrown fault as failure and starves its dependents", async () => {
    await seed(store, [{ id: "X" }, { id: "Y", dependencies: ["X"] }]);
    const scheduler = new TaskScheduler(store, { pollIntervalMs: 1 });
    const executed: string[] = [];

    const outcomes = await scheduler.executeAll(RUN_ID, async task => {
      executed.push(task.id);
      throw new Error("boom");
    });

    expect(executed).toEqual(["X"]);
    expect(outcomes).toEqual([{ taskId: "X", success: false, output: "", error: "boom" }]);
    expect(await store.getTask("X")).toMatchObject({ status: "failed", result: "boom" });
    expect((await store.getTask("Y"))?.status).toBe("pending");

    const summary = await store.runSummary(RUN_ID);
    expect(summary.statusCounts).toEqual({ failed: 1, pending: 1 });
    expect(summary.starvedTaskIds).toEqual(["Y"]);
  });

  it("never runs more than maxParallel tasks at once", async () => {
    await seed(store, ["t1", "t2", "t3", "t4", "t5", "t6"].map(id => ({ id })));
    const scheduler = new TaskScheduler(store, { maxParallel: 2, pollIntervalMs: 1 });
    let active = 0;
    let peak = 0;
    let peakRunningInStore = 0;

    const outcomes = await scheduler.executeAll(RUN_ID, async () => {
      active++;
      peak = Math.max(peak, active);
      const running = (await store.listTasks(RUN_ID)).filter(t => t.status === "running");
      peakRunningInStore = Math.max(peakRunningInStore, running.length);
      await sleep(3);
      active--;
      return succeed("ok");
    });

    expect(outcomes).toHaveLength(6);
    expect(peak).toBe(2);
    expect(peakRunningInStore).toBeLessThanOrEqual(2);
  });

  it("keeps running siblings when one task fails", async () => {
    await seed(store, [{ id: "good" }, { id: "bad" }, { id: "after", dependencies: ["good"] }]);
    const scheduler = new TaskScheduler(store, { maxParallel: 3, pollIntervalMs: 1 });

    const outcomes = await scheduler.executeAll(RUN_ID, async task =>
      task.id === "bad" ? { success: false, output: "", error: "nope" } : succeed(task.id)
    );

    expect(outcomes).toHaveLength(3);
    expect(await store.getTask("bad")).toMatchObject({ status: "failed", result: "nope" });
    expect((await store.getTask("after"))?.status).toBe("completed");
  });

  it("acquires slots in priority order", async () => {
    await seed(store, [
      { id: "low", priority: 0 },
      { id: "high", priority: 5 },
      { id: "mid", priority: 3 },
    ]);
    const scheduler = new TaskScheduler(store, { maxParallel: 1, pollIntervalMs: 1 });
    const started: string[] = [];

    const outcomes = await scheduler.executeAll(RUN_ID, async task => {
      started.push(task.id);
      return succeed(task.id);
    });

    expect(started).toEqual(["high", "mid", "low"]);
    expect(outcomes.map(o => o.taskId)).toEqual(["high", "mid", "low"]);
  });

  it("waits for work another worker still holds", async () => {
    await seed(store, [{ id: "external" }, { id: "local", dependencies: ["external"] }]);
    await store.setTaskStatus("external", "running");
    const scheduler = new TaskScheduler(store, { pollIntervalMs: 2 });

    const finishExternal = sleep(20).then(() =>
      store.setTaskStatus("external", "completed", "elsewhere")
    );
    const outcomes = await scheduler.executeAll(RUN_ID, async task => succeed(task.id));
    await finishExternal;

    expect(outcomes).toEqual([{ taskId: "local", success: true, output: "local" }]);
  });

  it("aborts on a store fault after the batch settles", async () => {
    const fault = new StoreUnavailableError("setTaskStatus", new Error("disk full"));

    class FlakyStore extends InMemoryStateStore {
      override async setTaskStatus(
        taskId: string,
        status: TaskStatus,
        result?: string
      ): Promise<Task> {
        if (taskId === "t2" && status === "completed") throw fault;
        return super.setTaskStatus(taskId, status, result);
      }
    }

    const flaky = new FlakyStore();
    await seed(flaky, [{ id: "t1" }, { id: "t2" }, { id: "t3", dependencies: ["t1"] }]);
    const scheduler = new TaskScheduler(flaky, { maxParallel: 2, pollIntervalMs: 1 });
    const executed: string[] = [];

    await expect(
      scheduler.executeAll(RUN_ID, async task => {
        executed.push(task.id);
        await sleep(task.id === "t1" ? 5 : 1);
        return succeed(task.id);
      })
    ).rejects.toBe(fault);

    expect(executed).toEqual(["t1", "t2"]);
    expect((await flaky.getTask("t1"))?.status).toBe("completed");
    expect((await flaky.getTask("t3"))?.status).toBe("pending");
  });

  it("logs a thrown fault as a TaskExecutionFailure", async () => {
    await seed(store, [{ id: "X" }]);
    const errors: Array<{ msg: string; err?: Error }> = [];
    const scheduler = new TaskScheduler(store, {
      pollIntervalMs: 1,
      logger: capturingLogger(errors),
    });
    const cause = new Error("boom");

    const outcomes = await scheduler.executeAll(RUN_ID, async () => {
      throw cause;
    });

    expect(outcomes).toEqual([{ taskId: "X", success: false, output: "", error: "boom" }]);
    expect(errors).toHaveLength(1);
    const failure = errors[0]?.err;
    expect(failure).toBeInstanceOf(TaskExecutionFailure);
    expect(failure).toMatchObject({ taskId: "X", message: "boom", cause });
  });

  it("aborts when the executor hits a store fault", async () => {
    await seed(store, [{ id: "t1" }, { id: "t2" }, { id: "t3", dependencies: ["t2"] }]);
    const scheduler = new TaskScheduler(store, { maxParallel: 2, pollIntervalMs: 1 });
    const fault = new StoreUnavailableError("appendLog", new Error("connection lost"));
    const executed: string[] = [];

    await expect(
      scheduler.executeAll(RUN_ID, async task => {
        executed.push(task.id);
        if (task.id === "t1") throw fault;
        await sleep(3);
        return succeed(task.id);
      })
    ).rejects.toBe(fault);

    expect(executed).toEqual(["t1", "t2"]);
    expect(await store.getTask("t1")).toMatchObject({ status: "running", result: null });
    expect((await store.getTask("t2"))?.status).toBe("completed");
    expect((await store.getTask("t3"))?.status).toBe("pending");
  });
});
