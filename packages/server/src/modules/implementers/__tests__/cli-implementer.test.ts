import { describe, expect, it, vi } from "vitest";
import { ValidationError } from "../../../types.js";
import { createClaudeCodeImplementer } from "../claude-code.js";
import type { CommandOptions, CommandResult, CommandRunner } from "../command-runner.js";
import { createCursorCliImplementer } from "../cursor-cli.js";
import { ImplementerRegistry } from "../registry.js";
import type { Implementer } from "../types.js";

interface Call {
  command: string;
  args: readonly string[];
  options?: CommandOptions;
}

function result(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, signal: null, stdout: "", stderr: "", timedOut: false, ...overrides };
}

/**
 * Fake runner: `--version` answers with `available`, anything else with `run`
 */
function fakeRunner(run: () => Promise<CommandResult>, available = true) {
  const calls: Call[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    if (args[0] === "--version") return result({ exitCode: available ? 0 : 127 });
    return run();
  };
  return { runner, calls };
}

const request = { prompt: "Add a health endpoint", projectPath: "/work/demo" };

describe("claude_code implementer", () => {
  it("runs claude in the project directory", async () => {
    const { runner, calls } = fakeRunner(async () => result({ stdout: "patched 2 files" }));
    const implementer = createClaudeCodeImplementer({ runner, timeoutMs: 1_000 });

    const outcome = await implementer.execute(request);

    expect(outcome).toEqual({ success: true, output: "patched 2 files" });
    expect(calls[1]).toEqual({
      command: "claude",
      args: [
        "-p",
        "Add a health endpoint",
        "--output-format",
        "text",
        "--max-turns",
        "50",
        "--dangerously-skip-permissions",
      ],
      options: { cwd: "/work/demo", timeoutMs: 1_000 },
    });
  });

  it("reports a non-zero exit with stderr", async () => {
    const { runner } = fakeRunner(async () =>
      result({ exitCode: 2, stdout: "partial", stderr: "rate limited" })
    );
    const implementer = createClaudeCodeImplementer({ runner });

    expect(await implementer.execute(request)).toEqual({
      success: false,
      output: "partial",
      error: "Claude Code exited with code 2: rate limited",
    });
  });

  it("reports a timeout in seconds", async () => {
    const { runner } = fakeRunner(async () =>
      result({ exitCode: null, signal: "SIGKILL", timedOut: true })
    );
    const implementer = createClaudeCodeImplementer({ runner, timeoutMs: 90_000 });

    const outcome = await implementer.execute(request);

    expect(outcome.success).toBe(false);
    expect(outcome.error).toBe("Claude Code execution timed out after 90 seconds");
  });

  it("explains how to install a missing CLI", async () => {
    const run = vi.fn(async () => result());
    const { runner } = fakeRunner(run, false);
    const implementer = createClaudeCodeImplementer({ runner });

    const outcome = await implementer.execute(request);

    expect(outcome).toEqual({
      success: false,
      output: "",
      error: "Claude Code CLI not found. Install it: npm install -g @anthropic-ai/claude-code",
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("reports a process that cannot be started", async () => {
    const { runner } = fakeRunner(async () => {
      throw new Error("spawn EACCES");
    });
    const implementer = createClaudeCodeImplementer({ runner });

    expect((await implementer.execute(request)).error).toBe(
      "Failed to run Claude Code: spawn EACCES"
    );
  });

  it("is unavailable when the version check cannot run", async () => {
    const runner: CommandRunner = async () => {
      throw Object.assign(new Error("spawn claude ENOENT"), { code: "ENOENT" });
    };

    expect(await createClaudeCodeImplementer({ runner }).isAvailable()).toBe(false);
  });
});

describe("cursor_cli implementer", () => {
  it("passes the project path and prompt as flags", async () => {
    const { runner, calls } = fakeRunner(async () => result({ stdout: "ok" }));
    const implementer = createCursorCliImplementer({ runner });

    await implementer.execute(request);

    expect(calls[1]?.command).toBe("cursor");
    expect(calls[1]?.args).toEqual([
      "--project-path",
      "/work/demo",
      "--prompt",
      "Add a health endpoint",
    ]);
  });

  it("labels failures with its own name", async () => {
    const { runner } = fakeRunner(async () => result({ exitCode: 1, stderr: "bad flag" }));

    expect((await createCursorCliImplementer({ runner }).execute(request)).error).toBe(
      "Cursor CLI exited with code 1: bad flag"
    );
  });
});

describe("ImplementerRegistry", () => {
  it("creates each implementer once", () => {
    const registry = new ImplementerRegistry();

    const first = registry.get("claude_code");
    expect(registry.get("claude_code")).toBe(first);
    expect(registry.get("cursor_cli").name).toBe("cursor_cli");
  });

  it("rejects unknown names and lists the available ones", () => {
    const registry = new ImplementerRegistry();

    expect(() => registry.get("copilot")).toThrow(
      new ValidationError("Unknown implementer: copilot. Available: claude_code, cursor_cli")
    );
  });

  it("accepts custom factories", async () => {
    const registry = new ImplementerRegistry();
    const echo: Implementer = {
      name: "echo",
      execute: async req => ({ success: true, output: req.prompt }),
      isAvailable: async () => true,
    };
    registry.register("echo", () => echo);

    expect(await registry.get("echo").execute(request)).toEqual({
      success: true,
      output: "Add a health endpoint",
    });
    expect(registry.names()).toEqual(["claude_code", "cursor_cli", "echo"]);
  });
});
