import {
  type CheckResult,
  type CheckSeverity,
  checkProject,
  type DriftEntry,
} from "@stylepack/core";
import chalk from "chalk";
import { Command } from "commander";
import { reportFailure } from "../utils/errors";
import { logger } from "../utils/logger";
import { loadCommandBundle } from "../utils/project";

type CheckCommandOptions = {
  project?: boolean;
  config?: string;
};

const SEVERITY_LABELS: Record<CheckSeverity, string> = {
  error: chalk.red("error"),
  warning: chalk.yellow("warning"),
  info: chalk.cyan("info"),
};

function printResult(result: CheckResult): void {
  const message = `${SEVERITY_LABELS[result.severity]} ${result.destination}: ${result.message}`;
  if (result.severity === "error") {
    logger.error(message);
  } else if (result.severity === "warning") {
    logger.warn(message);
  } else {
    logger.info(message);
  }
}

function printDrift(entry: DriftEntry): void {
  if (entry.state === "in-sync") {
    return;
  }
  const edited = entry.editedSinceApply ? chalk.dim(" (edited since last apply)") : "";
  logger.warn(`${chalk.yellow(entry.state)} ${entry.relativePath}${edited}`, {
    destination: entry.destination,
  });
}

async function runCheck(options: CheckCommandOptions, command: Command): Promise<void> {
  try {
    const loaded = await loadCommandBundle(command, { config: options.config });
    const outcome = await checkProject(loaded, { project: options.project, logger });

    for (const result of outcome.results) {
      printResult(result);
    }
    for (const entry of outcome.drift) {
      printDrift(entry);
    }

    if (outcome.ok) {
      logger.info(chalk.green(`Preset "${loaded.bundle.preset}" passed all checks`));
      return;
    }
    logger.error(chalk.red("Check failed"));
    process.exitCode = 1;
  } catch (error) {
    reportFailure("Failed to check project", error);
  }
}

export function checkCommand(): Command {
  return new Command("check")
    .description("Check the composed config for inconsistencies")
    .option("--project", "Also compare files on disk with what apply would write")
    .option("-c, --config <path>", "Path to the project config file")
    .action(async (options: CheckCommandOptions, command: Command) => {
      await runCheck(options, command);
    });
}
