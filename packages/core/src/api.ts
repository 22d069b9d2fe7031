import { promises as fs } from "node:fs";
import path from "node:path";
import type { ConfigBundle, PresetDefinition } from "@stylepack/types";
import { composeBundle } from "./bundle/compose";
import { type CheckerConfig, type CheckResult, checkBundle, hasErrors } from "./checker";
import { loadProjectConfig, type ProjectConfig } from "./config/project-config";
import { getDestination } from "./destinations";
import { ApplyManager, type DriftEntry } from "./installation/apply-manager";
import { createDefaultLogger, type Logger } from "./interfaces/logger";
import { PresetManager } from "./presets/preset-manager";

/**
 * Options for building a bundle from a project.
 */
export type LoadBundleOptions = {
  /** Directory to start `.stylepack/` discovery from. Defaults to `process.cwd()`. */
  startPath?: string;
  /** Explicit project config file. */
  configPath?: string;
  /** Overrides the configured preset. */
  preset?: string;
  /** Overrides the configured or detected TypeScript flag. */
  typescript?: boolean;
  logger?: Logger;
};

export type LoadedBundle = {
  bundle: ConfigBundle;
  projectDir: string;
  configPath?: string;
  projectConfig: ProjectConfig;
  /** Resolved preset chain, root first. */
  presets: PresetDefinition[];
};

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Loads the project config, resolves its preset chain and composes the
 * bundle. A project without config gets the `base` preset, with
 * TypeScript switched on when a tsconfig.json is present.
 */
export async function loadBundle(options: LoadBundleOptions = {}): Promise<LoadedBundle> {
  const logger = options.logger ?? createDefaultLogger();
  const loaded = await loadProjectConfig({
    startPath: options.startPath,
    configPath: options.configPath,
  });
  const { config, projectDir } = loaded;

  const typescript =
    options.typescript ??
    config.typescript ??
    (await fileExists(path.join(projectDir, "tsconfig.json")));
  const presetName = options.preset ?? config.preset ?? "base";

  logger.debug(`Composing preset ${presetName}`, {
    path: loaded.path,
    typescript,
  });

  const presets = await new PresetManager(projectDir, logger).resolveChain(presetName);
  const bundle = composeBundle({ presets, projectConfig: config, typescript });

  return {
    bundle,
    projectDir,
    ...(loaded.path === undefined ? {} : { configPath: loaded.path }),
    projectConfig: config,
    presets,
  };
}

export function createApplyManager(loaded: LoadedBundle, logger?: Logger): ApplyManager {
  return new ApplyManager(loaded.projectDir, {
    logger,
    destinations: loaded.projectConfig.destinations,
  });
}

/**
 * Renders a single destination without touching the disk, as if the file
 * did not exist yet.
 */
export function renderDestination(
  bundle: ConfigBundle,
  id: string,
  logger: Logger = createDefaultLogger()
): string {
  return getDestination(id).render({ bundle, logger }).content;
}

export type CheckProjectOptions = CheckerConfig & {
  /** Also compare the files on disk with what `apply` would write. */
  project?: boolean;
  logger?: Logger;
};

export type CheckProjectResult = {
  results: CheckResult[];
  drift: DriftEntry[];
  /** No error results and, when drift was checked, every file in sync. */
  ok: boolean;
};

export async function checkProject(
  loaded: LoadedBundle,
  options: CheckProjectOptions = {}
): Promise<CheckProjectResult> {
  const results = checkBundle(loaded.bundle, options);
  const drift = options.project
    ? await createApplyManager(loaded, options.logger).status(loaded.bundle)
    : [];

  return {
    results,
    drift,
    ok: !hasErrors(results) && drift.every((entry) => entry.state === "in-sync"),
  };
}
