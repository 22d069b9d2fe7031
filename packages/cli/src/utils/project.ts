import { type LoadedBundle, loadBundle } from "@stylepack/core";
import type { Command } from "commander";
import { logger } from "./logger";
import { projectDirectory } from "./options";

type BundleOptions = {
  config?: string;
  preset?: string;
};

/**
 * Loads the project's bundle for a command. The config's `log` section
 * applies only where neither a flag nor the environment set a value.
 */
export async function loadCommandBundle(
  command: Command,
  options: BundleOptions = {}
): Promise<LoadedBundle> {
  const loaded = await loadBundle({
    startPath: projectDirectory(command),
    configPath: options.config,
    preset: options.preset,
    logger,
  });

  const log = loaded.projectConfig.log;
  if (log?.level && !process.env.STYLEPACK_LOG_LEVEL) {
    process.env.STYLEPACK_LOG_LEVEL = log.level;
  }
  if (log?.format && !process.env.STYLEPACK_LOG_FORMAT) {
    process.env.STYLEPACK_LOG_FORMAT = log.format;
  }
  return loaded;
}
