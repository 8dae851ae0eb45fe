import { CliImplementer, type CliImplementerOptions } from "./cli-implementer.js";

export const CURSOR_CLI = "cursor_cli";

export function createCursorCliImplementer(options: CliImplementerOptions = {}): CliImplementer {
  return new CliImplementer(
    {
      name: CURSOR_CLI,
      label: "Cursor CLI",
      command: "cursor",
      missingMessage: "Cursor CLI not found. Install it from https://cursor.com",
      buildArgs: ({ prompt, projectPath }) => ["--project-path", projectPath, "--prompt", prompt],
    },
    options
  );
}
