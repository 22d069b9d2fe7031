import {
  createApplyManager,
  type DestinationId,
  DESTINATION_IDS,
  type FileChange,
  isDestinationId,
} from "@stylepack/core";
import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import type { Ora } from "ora";
import { reportFailure } from "../utils/errors";
import { logger } from "../utils/logger";
import { loadCommandBundle } from "../utils/project";
import { createSpinner } from "../utils/spinner";

type ApplyCommandOptions = {
  only?: DestinationId[];
  dryRun?: boolean;
  force?: boolean;
  config?: string;
};

function collectDestination(value: string, previous: DestinationId[] = []): DestinationId[] {
  if (!isDestinationId(value)) {
    throw new InvalidArgumentError(
      `Unknown destination "${value}". Expected one of: ${DESTINATION_IDS.join(", ")}`
    );
  }
  return [...previous, value];
}

const ACTION_LABELS: Record<FileChange["action"], string> = {
  create: chalk.green("create"),
  update: chalk.yellow("update"),
  unchanged: chalk.dim("unchanged"),
};

async function runApply(options: ApplyCommandOptions, command: Command): Promise<void> {
  let spinner: Ora | undefined;

  try {
    const loaded = await loadCommandBundle(command, { config: options.config });
    // Started after loading so the config's log settings reach it.
    spinner = createSpinner(
      options.dryRun ? "Planning config files..." : "Writing config files..."
    );
    const report = await createApplyManager(loaded, logger).apply(loaded.bundle, {
      only: options.only,
      force: options.force,
      dryRun: options.dryRun,
    });

    const changed = report.changes.filter((change) => change.action !== "unchanged");
    spinner.succeed(
      report.dryRun
        ? chalk.green(`${changed.length} file(s) would change`)
        : chalk.green(`Wrote ${report.written.length} file(s)`)
    );

    // A real run is logged by the apply manager as it writes.
    if (report.dryRun) {
      for (const change of report.changes) {
        logger.info(`  ${ACTION_LABELS[change.action]} ${change.relativePath}`, {
          destination: change.destination,
          action: change.action,
        });
      }
    }
  } catch (error) {
    reportFailure("Failed to apply config files", error, spinner);
  }
}

export function applyCommand(): Command {
  return new Command("apply")
    .description("Write the composed config files into the project")
    .option(
      "--only <destinations...>",
      "Only write these destinations",
      collectDestination
    )
    .option("--dry-run", "Show what would change without writing")
    .option("-f, --force", "Overwrite values the project set differently")
    .option("-c, --config <path>", "Path to the project config file")
    .action(async (options: ApplyCommandOptions, command: Command) => {
      await runApply(options, command);
    });
}
