import { DESTINATION_IDS, isDestinationId, renderDestination } from "@stylepack/core";
import { Command, InvalidArgumentError } from "commander";
import { reportFailure } from "../utils/errors";
import { logger } from "../utils/logger";
import { loadCommandBundle } from "../utils/project";

type PrintOptions = {
  config?: string;
  preset?: string;
};

function parseDestination(value: string): string {
  if (!isDestinationId(value)) {
    throw new InvalidArgumentError(`Expected one of: ${DESTINATION_IDS.join(", ")}`);
  }
  return value;
}

export function printCommand(): Command {
  return new Command("print")
    .description("Render one destination to stdout as a fresh file")
    .argument("<destination>", "Destination id", parseDestination)
    .option("-c, --config <path>", "Path to the project config file")
    .option("-p, --preset <name>", "Render this preset instead of the configured one")
    .action(async (destination: string, options: PrintOptions, command: Command) => {
      try {
        const loaded = await loadCommandBundle(command, options);
        const content = renderDestination(loaded.bundle, destination, logger);
        process.stdout.write(content.endsWith("\n") ? content : `${content}\n`);
      } catch (error) {
        reportFailure(`Failed to render ${destination}`, error);
      }
    });
}
