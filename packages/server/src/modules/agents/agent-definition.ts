import path from "node:path";
import { z } from "zod";
import { formatIssues, parseYaml } from "../../config/yaml.js";
import { ValidationError } from "../../types.js";

export const AgentFrontmatterSchema = z.object({
  name: z.string().min(1).optional(),
  role: z.string().min(1).optional(),
  llmProvider: z.string().min(1).default("anthropic"),
  llmModel: z.string().min(1).optional(),
  implementer: z.string().min(1).optional(),
  capabilities: z.array(z.string()).default([]),
});

export interface AgentDefinition {
  name: string;
  role: string;
  llmProvider: string;
  llmModel?: string;
  implementer?: string;
  capabilities: string[];
  /** Markdown body of the definition file */
  systemPrompt: string;
  sourcePath: string;
}

const FRONTMATTER_REGEX = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n([\s\S]*))?$/;

/**
 * "product-manager" -> "Product Manager"
 */
export function titleCase(name: string): string {
  return name
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

/**
 * Parse an agent definition: optional YAML frontmatter followed by the
 * system prompt. Without frontmatter the whole file is the prompt.
 */
export function parseAgentDefinition(markdown: string, sourcePath: string): AgentDefinition {
  const match = markdown.match(FRONTMATTER_REGEX);
  const rawMeta = match ? (parseYaml(match[1] ?? "", sourcePath) ?? {}) : {};
  const body = match ? (match[2] ?? "") : markdown;

  const parsed = AgentFrontmatterSchema.safeParse(rawMeta);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid agent definition in ${sourcePath}`,
      formatIssues(parsed.error)
    );
  }

  const meta = parsed.data;
  const name = meta.name ?? path.basename(sourcePath, path.extname(sourcePath));
  return {
    name,
    role: meta.role ?? titleCase(name),
    llmProvider: meta.llmProvider,
    llmModel: meta.llmModel,
    implementer: meta.implementer,
    capabilities: meta.capabilities,
    systemPrompt: body.trim(),
    sourcePath,
  };
}
