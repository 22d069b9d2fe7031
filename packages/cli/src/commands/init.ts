import { relative } from "node:path";
import {
  initializeProject,
  PresetManager,
  type ProjectConfigFormat,
} from "@stylepack/core";
import chalk from "chalk";
import { Command, Option } from "commander";
import { reportFailure } from "../utils/errors";
import { logger } from "../utils/logger";
import { projectDirectory } from "../utils/options";
import { createSpinner } from "../utils/spinner";

type InitOptions = {
  preset: string;
  force?: boolean;
  typescript?: boolean;
  configFormat?: ProjectConfigFormat;
};

async function runInit(options: InitOptions, command: Command): Promise<void> {
  const projectDir = projectDirectory(command);
  const spinner = createSpinner("Initializing stylepack...");

  try {
    // Unknown presets fail here rather than on the first apply.
    await new PresetManager(projectDir, logger).resolveChain(options.preset);

    const result = await initializeProject(projectDir, {
      preset: options.preset,
      typescript: options.typescript,
      format: options.configFormat,
      force: options.force,
    });

    spinner.succeed(chalk.green(`Initialized stylepack with preset "${options.preset}"`));
    logger.info(chalk.dim(`Config: ${relative(projectDir, result.path)}`));
    logger.info(chalk.dim('Run "stylepack apply" to write the config files.'));
  } catch (error) {
    reportFailure("Failed to initialize stylepack", error, spinner);
  }
}

export function initCommand(): Command {
  return new Command("init")
    .description("Create .stylepack/config for this project")
    .option("-p, --preset <name>", "Preset to start from", "base")
    .option("-f, --force", "Overwrite an existing project config")
    .option("--typescript", "Compose the TypeScript variant of the preset")
    .option("--no-typescript", "Compose the JavaScript variant of the preset")
    .addOption(
      new Option("--config-format <format>", "Config file format")
        .choices(["yaml", "json", "jsonc", "toml"])
        .default("yaml")
    )
    .action(async (options: InitOptions, command: Command) => {
      await runInit(options, command);
    });
}
