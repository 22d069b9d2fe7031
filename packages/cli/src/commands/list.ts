import { relative } from "node:path";
import {
  type AvailablePreset,
  destinations,
  PresetManager,
} from "@stylepack/core";
import chalk from "chalk";
import { Command } from "commander";
import { reportFailure } from "../utils/errors";
import { isJsonMode, logger } from "../utils/logger";
import { projectDirectory } from "../utils/options";

type ListOptions = {
  presets?: boolean;
  destinations?: boolean;
};

function printPresets(presets: AvailablePreset[], projectDir: string): void {
  logger.info(chalk.cyan("Presets:"));
  for (const preset of presets) {
    const { definition } = preset;
    const parent = definition.extends ? chalk.dim(` extends ${definition.extends}`) : "";
    logger.info(`  ${chalk.green("•")} ${chalk.bold(definition.name)}${parent}`);
    if (definition.description) {
      logger.info(`    ${chalk.dim(definition.description)}`);
    }
    if (preset.path) {
      logger.info(`    ${chalk.dim("Path:")} ${relative(projectDir, preset.path)}`);
    }
  }
  logger.info("");
}

function printDestinations(): void {
  logger.info(chalk.cyan("Destinations:"));
  for (const provider of destinations.values()) {
    logger.info(`  ${chalk.green("•")} ${chalk.bold(provider.name)}`);
    logger.info(`    ${chalk.dim(provider.description)}`);
  }
  logger.info("");
}

async function runList(options: ListOptions, command: Command): Promise<void> {
  const projectDir = projectDirectory(command);
  const showAll = !options.presets && !options.destinations;

  try {
    const presets =
      showAll || options.presets
        ? await new PresetManager(projectDir, logger).listAvailablePresets()
        : [];

    if (isJsonMode()) {
      process.stdout.write(
        `${JSON.stringify({
          presets: presets.map((preset) => ({
            name: preset.definition.name,
            extends: preset.definition.extends ?? null,
            source: preset.source,
          })),
          destinations:
            showAll || options.destinations ? Array.from(destinations.keys()) : [],
        })}\n`
      );
      return;
    }

    if (showAll || options.presets) {
      printPresets(presets, projectDir);
    }
    if (showAll || options.destinations) {
      printDestinations();
    }
  } catch (error) {
    reportFailure("Failed to list presets", error);
  }
}

export function listCommand(): Command {
  return new Command("list")
    .description("List available presets and destinations")
    .option("--presets", "Only list presets")
    .option("--destinations", "Only list destinations")
    .action(async (options: ListOptions, command: Command) => {
      await runList(options, command);
    });
}
