import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NotFoundError, ValidationError } from "../../../types.js";
import { parseAgentDefinition, titleCase } from "../agent-definition.js";
import { AgentRegistry } from "../agent-registry.js";

const DEVELOPER = `---
name: developer
role: "Software Developer"
implementer: cursor_cli
capabilities:
  - write_code
  - write_tests
---
# Developer

Write clean, tested code.
`;

describe("parseAgentDefinition", () => {
  it("reads frontmatter and the prompt body", () => {
    const agent = parseAgentDefinition(DEVELOPER, "/agents/developer.md");

    expect(agent).toEqual({
      name: "developer",
      role: "Software Developer",
      llmProvider: "anthropic",
      llmModel: undefined,
      implementer: "cursor_cli",
      capabilities: ["write_code", "write_tests"],
      systemPrompt: "# Developer\n\nWrite clean, tested code.",
      sourcePath: "/agents/developer.md",
    });
  });

  it("derives name and role from the file name", () => {
    const agent = parseAgentDefinition(
      "---\nllmModel: test-model\n---\nPlan.",
      "/a/product-manager.md"
    );

    expect(agent.name).toBe("product-manager");
    expect(agent.role).toBe("Product Manager");
    expect(agent.llmModel).toBe("test-model");
    expect(agent.systemPrompt).toBe("Plan.");
  });

  it("treats a file without frontmatter as a bare prompt", () => {
    const agent = parseAgentDefinition("Just review things.\n", "/a/reviewer.md");

    expect(agent.name).toBe("reviewer");
    expect(agent.capabilities).toEqual([]);
    expect(agent.systemPrompt).toBe("Just review things.");
  });

  it("rejects frontmatter of the wrong shape", () => {
    expect(() =>
      parseAgentDefinition("---\ncapabilities: lots\n---\nbody", "/a/bad.md")
    ).toThrow(ValidationError);
  });

  it("title-cases separated words", () => {
    expect(titleCase("qa_lead")).toBe("Qa Lead");
  });
});

describe("AgentRegistry", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "conductor-agents-"));
    fs.writeFileSync(path.join(dir, "developer.md"), DEVELOPER);
    fs.writeFileSync(path.join(dir, "architect.md"), "---\nrole: Architect\n---\nDesign.");
    fs.writeFileSync(path.join(dir, "notes.txt"), "ignored");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads every markdown file in name order", () => {
    const registry = new AgentRegistry(dir);

    expect(registry.list().map(a => a.name)).toEqual(["architect", "developer"]);
    expect(registry.get("developer").implementer).toBe("cursor_cli");
    expect(registry.has("architect")).toBe(true);
  });

  it("names the available agents when one is missing", () => {
    const registry = new AgentRegistry(dir);

    expect(() => registry.get("tester")).toThrow(
      new NotFoundError("Agent 'tester'", "Available: architect, developer")
    );
  });

  it("raises NotFoundError for a missing directory", () => {
    const registry = new AgentRegistry(path.join(dir, "nope"));

    expect(() => registry.loadAll()).toThrow(NotFoundError);
  });
});
