import { createLogger, type Logger } from "@conductor/shared/logger";
import { spawnCommand, type CommandRunner } from "./command-runner.js";
import type { Implementer, ImplementerRequest, ImplementerResult } from "./types.js";

export const DEFAULT_EXECUTION_TIMEOUT_MS = 600_000;
const VERSION_CHECK_TIMEOUT_MS = 10_000;

export interface CliTool {
  /** Registry key, e.g. "claude_code" */
  name: string;
  /** Human-readable tool name used in messages */
  label: string;
  command: string;
  /** Returned when the CLI cannot be found */
  missingMessage: string;
  buildArgs(request: ImplementerRequest): string[];
}

export interface CliImplementerOptions {
  runner?: CommandRunner;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Implementer backed by a command-line tool run in the project directory
 */
export class CliImplementer implements Implementer {
  public readonly name: string;
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  public constructor(
    private readonly tool: CliTool,
    options: CliImplementerOptions = {}
  ) {
    this.name = tool.name;
    this.runner = options.runner ?? spawnCommand;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;
    this.logger = (options.logger ?? createLogger("server")).child({
      module: "implementer",
      implementer: tool.name,
    });
  }

  public async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner(this.tool.command, ["--version"], {
        timeoutMs: VERSION_CHECK_TIMEOUT_MS,
      });
      return result.exitCode === 0;
    } catch (error) {
      this.logger.debug(`${this.tool.command} --version could not be run`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  public async execute(request: ImplementerRequest): Promise<ImplementerResult> {
    const { label } = this.tool;

    if (!(await this.isAvailable())) {
      return { success: false, output: "", error: this.tool.missingMessage };
    }

    try {
      const result = await this.runner(this.tool.command, this.tool.buildArgs(request), {
        cwd: request.projectPath,
        timeoutMs: this.timeoutMs,
      });

      if (result.timedOut) {
        return {
          success: false,
          output: result.stdout,
          error: `${label} execution timed out after ${Math.round(this.timeoutMs / 1000)} seconds`,
        };
      }

      if (result.exitCode === 0) {
        return { success: true, output: result.stdout };
      }

      const code = result.exitCode ?? result.signal;
      return {
        success: false,
        output: result.stdout,
        error: `${label} exited with code ${code}: ${result.stderr}`,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to run ${label}`, error instanceof Error ? error : undefined);
      return { success: false, output: "", error: `Failed to run ${label}: ${message}` };
    }
  }
}
