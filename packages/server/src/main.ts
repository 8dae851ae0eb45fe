import { createLogger } from "@conductor/shared/logger";
import { createProgram } from "./cli/program.js";
import { AppError } from "./types.js";

const logger = createLogger("server");

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof AppError) {
      console.error(`Error: ${error.message}`);
    } else {
      logger.error("Command failed", error instanceof Error ? error : undefined, {
        module: "cli",
        error: String(error),
      });
    }
    process.exitCode = 1;
  });
