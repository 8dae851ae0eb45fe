import { beforeEach, describe, expect, it } from "vitest";
import { InMemoryStateStore } from "../../modules/state/infrastructure/repositories/state-store.memory.js";
import { StoreUnavailableError } from "../../types.js";
import { createApp } from "../app.js";

class BrokenStore extends InMemoryStateStore {
  override async listRuns(): Promise<never> {
    throw new StoreUnavailableError("listRuns", new Error("disk I/O error"));
  }
}

describe("status API", () => {
  let store: InMemoryStateStore;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    store = new InMemoryStateStore();
    app = createApp({ store });

    await store.createRun({ id: "run-a", projectName: "alpha" });
    await store.createRun({ id: "run-b", projectName: "beta" });
    await store.createTask({ id: "task-1", runId: "run-a", title: "Build" });
    await store.createTask({
      id: "task-2",
      runId: "run-a",
      title: "Deploy",
      dependencies: ["task-1"],
    });
  });

  it("GET /api/health reports ok", async () => {
    const res = await app.request("/api/health");
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.status).toBe("ok");
    expect(body.version).toBe("0.1.0");
    expect(typeof body.uptime).toBe("number");
  });

  it("sets a request id header", async () => {
    const res = await app.request("/api/health");
    expect(res.headers.get("X-Request-ID")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("GET /api/runs lists runs newest first", async () => {
    const res = await app.request("/api/runs");
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.runs.map((run: { id: string }) => run.id)).toEqual(["run-b", "run-a"]);
  });

  it("GET /api/runs filters by project and limit", async () => {
    const filtered = await (await app.request("/api/runs?projectName=alpha")).json();
    expect(filtered.runs).toHaveLength(1);
    expect(filtered.runs[0].id).toBe("run-a");

    const limited = await (await app.request("/api/runs?limit=1")).json();
    expect(limited.runs).toHaveLength(1);
  });

  it("GET /api/runs rejects a non-numeric limit", async () => {
    const res = await app.request("/api/runs?limit=abc");
    expect(res.status).toBe(400);

    const body = await res.json();
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.message).toBe("Invalid limit parameter");
    expect(body.error.requestId).toBe(res.headers.get("X-Request-ID"));
  });

  it("GET /api/runs/:runId returns the run", async () => {
    const res = await app.request("/api/runs/run-a");
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.run.id).toBe("run-a");
    expect(body.run.projectName).toBe("alpha");
    expect(body.run.status).toBe("pending");
  });

  it("GET /api/runs/:runId returns 404 for an unknown run", async () => {
    const res = await app.request("/api/runs/run-missing");
    expect(res.status).toBe(404);

    const body = await res.json();
    expect(body.error.code).toBe("NOT_FOUND");
    expect(body.error.message).toBe("Run 'run-missing' not found");
  });

  it("GET /api/runs/:runId/summary counts task statuses", async () => {
    await store.setTaskStatus("task-1", "failed", "boom");

    const res = await app.request("/api/runs/run-a/summary");
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.totalTasks).toBe(2);
    expect(body.statusCounts).toEqual({ failed: 1, pending: 1 });
    expect(body.starvedTaskIds).toEqual(["task-2"]);
  });

  it("GET /api/runs/:runId/tasks lists tasks of the run", async () => {
    const res = await app.request("/api/runs/run-a/tasks");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.tasks.map((task: { id: string }) => task.id).sort()).toEqual(["task-1", "task-2"]);
  });

  it("GET /api/runs/:runId/tasks returns 404 for an unknown run", async () => {
    const res = await app.request("/api/runs/run-missing/tasks");
    expect(res.status).toBe(404);
  });

  it("GET /api/tasks/:taskId returns the task", async () => {
    const res = await app.request("/api/tasks/task-2");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.task.title).toBe("Deploy");
    expect(body.task.dependencies).toEqual(["task-1"]);
  });

  it("GET /api/tasks/:taskId/logs lists logs", async () => {
    await store.appendLog({ taskId: "task-1", message: "started", agentName: "developer" });

    const res = await app.request("/api/tasks/task-1/logs");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.logs).toHaveLength(1);
    expect(body.logs[0].message).toBe("started");
    expect(body.logs[0].level).toBe("info");
  });

  it("GET /api/tasks/:taskId/executions lists executions", async () => {
    const executionId = await store.createExecution({
      taskId: "task-1",
      runId: "run-a",
      agentName: "developer",
      implementer: "claude-code",
    });
    await store.finishExecution({ executionId, status: "completed", output: "done" });

    const res = await app.request("/api/tasks/task-1/executions");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.executions).toHaveLength(1);
    expect(body.executions[0].status).toBe("completed");
    expect(body.executions[0].output).toBe("done");
  });

  it("GET /api/tasks/:taskId/logs returns 404 for an unknown task", async () => {
    const res = await app.request("/api/tasks/task-missing/logs");
    const body = await res.json();

    expect(res.status).toBe(404);
    expect(body.error.message).toBe("Task 'task-missing' not found");
  });

  it("maps store failures to 503", async () => {
    const broken = createApp({ store: new BrokenStore() });

    const res = await broken.request("/api/runs");
    const body = await res.json();

    expect(res.status).toBe(503);
    expect(body.error.code).toBe("STORE_UNAVAILABLE");
  });

  it("returns a JSON 404 for unknown routes", async () => {
    const res = await app.request("/api/nope");
    const body = await res.json();

    expect(res.status).toBe(404);
    expect(body.error.code).toBe("NOT_FOUND");
    expect(body.error.message).toBe("Route GET /api/nope not found");
  });

  it("answers CORS preflight", async () => {
    const res = await app.request("/api/runs", { method: "OPTIONS" });

    expect(res.status).toBe(204);
    expect(res.headers.get("Access-Control-Allow-Methods")).toBe("GET,OPTIONS");
  });
});
