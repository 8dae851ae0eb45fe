import { CliImplementer, type CliImplementerOptions } from "./cli-implementer.js";

export const CLAUDE_CODE = "claude_code";

export function createClaudeCodeImplementer(options: CliImplementerOptions = {}): CliImplementer {
  return new CliImplementer(
    {
      name: CLAUDE_CODE,
      label: "Claude Code",
      command: "claude",
      missingMessage:
        "Claude Code CLI not found. Install it: npm install -g @anthropic-ai/claude-code",
      buildArgs: ({ prompt }) => [
        "-p",
        prompt,
        "--output-format",
        "text",
        "--max-turns",
        "50",
        "--dangerously-skip-permissions",
      ],
    },
    options
  );
}
