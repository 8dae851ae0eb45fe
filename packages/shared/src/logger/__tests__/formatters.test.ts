import { describe, expect, it } from "vitest";

import { createLogFormatter, createPrefix } from "../formatters.js";

describe("createPrefix", () => {
  it("uses the package alone when no module is given", () => {
    expect(createPrefix({ package: "server" })).toBe("[server]");
  });

  it("appends the module", () => {
    expect(createPrefix({ package: "server", module: "scheduler" })).toBe("[server:scheduler]");
  });

  it("prefers the module over the agent", () => {
    expect(createPrefix({ package: "server", module: "api", agent: "developer" })).toBe(
      "[server:api]"
    );
  });

  it("falls back to the agent, then the implementer", () => {
    expect(createPrefix({ package: "server", agent: "reviewer" })).toBe("[server:agent:reviewer]");
    expect(createPrefix({ package: "server", implementer: "claude_code" })).toBe(
      "[server:implementer:claude_code]"
    );
  });
});

describe("createLogFormatter", () => {
  it("adds the prefix and keeps the original fields", () => {
    const format = createLogFormatter("server");
    const result = format({ module: "store", taskId: "t-1", time: "2026-01-01T00:00:00.000Z" });

    expect(result).toEqual({
      module: "store",
      taskId: "t-1",
      time: "2026-01-01T00:00:00.000Z",
      prefix: "[server:store]",
    });
  });

  it("prefers the package carried on the record", () => {
    const format = createLogFormatter("server");
    const result = format({ package: "shared" });

    expect(result.prefix).toBe("[shared]");
    expect(typeof result.time).toBe("string");
  });
});
