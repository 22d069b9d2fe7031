import { isStylepackError } from "@stylepack/types";
import chalk from "chalk";
import type { Ora } from "ora";
import { logger } from "./logger";

/**
 * Reports a failed command: fails the spinner, logs the error with its
 * help text and marks the process as failed.
 */
export function reportFailure(summary: string, error: unknown, spinner?: Ora): void {
  if (spinner) {
    spinner.fail(chalk.red(summary));
  } else {
    logger.error(chalk.red(summary));
  }

  if (isStylepackError(error)) {
    logger.error(error.message, { code: error.code });
    if (error.help) {
      logger.error(chalk.dim(error.help));
    }
  } else {
    logger.error(error instanceof Error ? error : String(error));
  }
  process.exitCode = 1;
}
