import {
  isPackageManager,
  planInstall,
  runInstall,
} from "@stylepack/core";
import { PACKAGE_MANAGERS, type PackageManager } from "@stylepack/types";
import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import { reportFailure } from "../utils/errors";
import { logger } from "../utils/logger";
import { loadCommandBundle } from "../utils/project";

type InstallOptions = {
  run?: boolean;
  packageManager?: PackageManager;
  config?: string;
};

function parsePackageManager(value: string): PackageManager {
  if (!isPackageManager(value)) {
    throw new InvalidArgumentError(`Expected one of: ${PACKAGE_MANAGERS.join(", ")}`);
  }
  return value;
}

async function runInstallCommand(options: InstallOptions, command: Command): Promise<void> {
  try {
    const loaded = await loadCommandBundle(command, { config: options.config });
    const plan = await planInstall(
      loaded.bundle,
      loaded.projectDir,
      options.packageManager ?? loaded.projectConfig.packageManager
    );

    if (plan.alreadyInstalled.length > 0) {
      logger.info(chalk.dim(`Already installed: ${plan.alreadyInstalled.join(", ")}`));
    }
    if (plan.command.length === 0) {
      logger.info(chalk.green("All devDependencies are installed"));
      return;
    }

    const commandLine = plan.command.join(" ");
    if (!options.run) {
      logger.info(commandLine, { manager: plan.manager, packages: plan.packages });
      return;
    }

    logger.info(chalk.cyan(`Running ${commandLine}`));
    const code = await runInstall(plan, { cwd: loaded.projectDir });
    if (code !== 0) {
      logger.error(chalk.red(`${plan.manager} exited with code ${code}`));
      process.exitCode = 1;
    }
  } catch (error) {
    reportFailure("Failed to install devDependencies", error);
  }
}

export function installCommand(): Command {
  return new Command("install")
    .description("Print (or run) the command that installs the bundle's devDependencies")
    .option("--run", "Run the install command instead of printing it")
    .option(
      "--package-manager <name>",
      "Package manager to use (npm|yarn|pnpm|bun)",
      parsePackageManager
    )
    .option("-c, --config <path>", "Path to the project config file")
    .action(async (options: InstallOptions, command: Command) => {
      await runInstallCommand(options, command);
    });
}
