import { promises as fs } from "node:fs";
import path from "node:path";
import TOML, { type JsonMap } from "@iarna/toml";
import { dump as yamlDump, load as yamlLoad } from "js-yaml";
import JSON5 from "json5";
import {
  createResultErr,
  createResultOk,
  createStylepackError,
  isResultErr,
  type Result,
  STYLEPACK_SCHEMA_IDS,
  STYLEPACK_VERSION_TAG,
  stylepackProjectConfigSchema,
  type StylepackProjectConfig,
} from "@stylepack/types";
import type { ZodIssue } from "zod";
import { FILE_EXTENSIONS, STYLEPACK_DIR } from "./limits";

export type ProjectConfigFormat = keyof typeof FILE_EXTENSIONS;

const CONFIG_FORMATS: readonly ProjectConfigFormat[] = ["yaml", "json", "jsonc", "toml"];

type RawProjectConfig = Record<string, unknown>;

export type ProjectConfig = StylepackProjectConfig;

export type ProjectConfigResult = {
  /** Absolute path to the resolved configuration file (if found). */
  path?: string;
  /** The format derived from the file extension. */
  format?: ProjectConfigFormat;
  /** Directory that holds `.stylepack/`, or the start path when none was found. */
  projectDir: string;
  /** Parsed configuration object (empty when no file exists). */
  config: ProjectConfig;
};

export type LoadProjectConfigOptions = {
  /** Starting directory or file from which to locate `.stylepack/`. Defaults to `process.cwd()`. */
  startPath?: string;
  /** Explicit path to a configuration file. Bypasses discovery when provided. */
  configPath?: string;
};

type Candidate = {
  filename: string;
  format: ProjectConfigFormat;
};

const DEFAULT_CANDIDATES: readonly Candidate[] = [
  { filename: "config.yaml", format: "yaml" },
  { filename: "config.yml", format: "yaml" },
  { filename: "config.json", format: "json" },
  { filename: "config.jsonc", format: "jsonc" },
  { filename: "config.toml", format: "toml" },
];

async function pathExists(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}

/** Walks up from `startPath` to the nearest directory containing `.stylepack/`. */
export async function findProjectRoot(
  startPath: string
): Promise<string | undefined> {
  let current = path.resolve(startPath);
  const stats = await fs.stat(current).catch(() => undefined);
  if (stats?.isFile()) {
    current = path.dirname(current);
  }

  const root = path.parse(current).root;

  while (true) {
    if (await isDirectory(path.join(current, STYLEPACK_DIR))) {
      return current;
    }
    if (current === root) {
      return;
    }
    current = path.dirname(current);
  }
}

function isPlainObject(value: unknown): value is RawProjectConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function formatFromExtension(
  filePath: string
): ProjectConfigFormat | undefined {
  const ext = path.extname(filePath).toLowerCase();
  return CONFIG_FORMATS.find((format) => {
    const extensions: readonly string[] = FILE_EXTENSIONS[format];
    return extensions.includes(ext);
  });
}

function parseConfigContents(
  contents: string,
  format: ProjectConfigFormat
): unknown {
  switch (format) {
    case "yaml":
      return yamlLoad(contents);
    case "json":
      return JSON.parse(contents);
    case "jsonc":
      return JSON5.parse(contents);
    case "toml":
      return TOML.parse(contents);
    default: {
      const exhaustive: never = format;
      throw new Error(`Unsupported project config format: ${exhaustive}`);
    }
  }
}

function formatIssuePath(issue: ZodIssue): string {
  const pathSegments = issue.path.length > 0 ? issue.path : ["projectConfig"];
  return pathSegments
    .map((segment, index) =>
      typeof segment === "number"
        ? `[${segment}]`
        : index === 0
          ? segment
          : `.${segment}`
    )
    .join("");
}

/** Parses and validates raw config contents; `filePath` only labels errors. */
export function parseProjectConfig(
  contents: string,
  format: ProjectConfigFormat,
  filePath: string
): ProjectConfig {
  let raw: unknown;
  try {
    raw = parseConfigContents(contents, format);
  } catch (error) {
    throw createStylepackError({
      code: "PROJECT_CONFIG_INVALID",
      message: `Could not parse project config (${filePath}): ${error instanceof Error ? error.message : String(error)}`,
      details: { path: filePath },
      cause: error,
    });
  }

  // An empty YAML document loads as undefined.
  const validated = validateProjectConfig(raw === undefined || raw === null ? {} : raw);
  if (isResultErr(validated)) {
    throw createStylepackError({
      code: "PROJECT_CONFIG_INVALID",
      message: `Invalid project config (${filePath}):\n  • ${validated.error.join("\n  • ")}`,
      details: { path: filePath },
      help: `See ${STYLEPACK_SCHEMA_IDS.projectConfig} for the schema reference.`,
    });
  }
  return validated.value;
}

/**
 * Validates a raw config value. Errors are `path message` lines, one per
 * schema issue.
 */
export function validateProjectConfig(raw: unknown): Result<ProjectConfig, string[]> {
  const parsed = stylepackProjectConfigSchema.safeParse(raw);
  if (parsed.success) {
    return createResultOk(parsed.data);
  }
  return createResultErr(
    parsed.error.issues.map((issue) => `${formatIssuePath(issue)} ${issue.message}`)
  );
}

async function resolveConfigPath(
  options: LoadProjectConfigOptions
): Promise<{ path: string; format: ProjectConfigFormat } | undefined> {
  if (options.configPath) {
    const explicit = path.resolve(options.configPath);
    if (!(await pathExists(explicit))) {
      throw createStylepackError({
        code: "PROJECT_CONFIG_NOT_FOUND",
        message: `Specified project config not found: ${options.configPath}`,
        details: { path: explicit },
      });
    }
    const format = formatFromExtension(explicit);
    if (!format) {
      throw createStylepackError({
        code: "PROJECT_CONFIG_INVALID",
        message: `Unsupported project config extension: ${path.basename(explicit)}`,
        details: { path: explicit },
        help: "Use .yaml, .yml, .json, .jsonc or .toml.",
      });
    }
    return { path: explicit, format };
  }

  const start = options.startPath
    ? path.resolve(options.startPath)
    : process.cwd();
  const projectRoot = await findProjectRoot(start);
  if (!projectRoot) {
    return;
  }

  const configDir = path.join(projectRoot, STYLEPACK_DIR);
  for (const candidate of DEFAULT_CANDIDATES) {
    const candidatePath = path.join(configDir, candidate.filename);
    if (await pathExists(candidatePath)) {
      return { path: candidatePath, format: candidate.format };
    }
  }

  return;
}

/**
 * Loads the project configuration, searching `.stylepack/` in the start
 * directory and its ancestors. Returns an empty configuration when no file
 * is present.
 */
export async function loadProjectConfig(
  options: LoadProjectConfigOptions = {}
): Promise<ProjectConfigResult> {
  const start = path.resolve(options.startPath ?? process.cwd());
  const resolved = await resolveConfigPath(options);
  if (!resolved) {
    return {
      projectDir: (await findProjectRoot(start)) ?? start,
      config: {},
    };
  }

  const contents = await fs.readFile(resolved.path, "utf8");
  const config = parseProjectConfig(contents, resolved.format, resolved.path);

  // `.stylepack/config.yaml` → the directory above `.stylepack/`
  const configDir = path.dirname(resolved.path);
  const projectDir =
    path.basename(configDir) === STYLEPACK_DIR
      ? path.dirname(configDir)
      : configDir;

  return {
    path: resolved.path,
    format: resolved.format,
    projectDir,
    config,
  };
}

/**
 * Options for saving project configuration.
 */
export type SaveProjectConfigOptions = {
  /** Path to the configuration file. If not provided, will use discovery to find existing config. */
  configPath?: string;
  /** Starting directory for config discovery if configPath not provided. Defaults to process.cwd() */
  startPath?: string;
  /** Format to use when creating a new config file. Defaults to 'yaml' */
  format?: ProjectConfigFormat;
};

type TomlValue = JsonMap[string];

function toTomlValue(value: unknown, label: string): TomlValue | undefined {
  if (value === null || value === undefined) {
    return;
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    if (value.every((item): item is string => typeof item === "string")) {
      return value;
    }
    if (value.every((item): item is number => typeof item === "number")) {
      return value;
    }
    if (value.every((item): item is boolean => typeof item === "boolean")) {
      return value;
    }
    if (value.every(isPlainObject)) {
      return value.map((item, index) => toTomlMap(item, `${label}[${index}]`));
    }
    throw createStylepackError({
      code: "PROJECT_CONFIG_INVALID",
      message: `${label} mixes value types, which TOML arrays cannot hold`,
      help: "Save the configuration as YAML or JSON instead.",
    });
  }
  if (isPlainObject(value)) {
    return toTomlMap(value, label);
  }
  throw createStylepackError({
    code: "PROJECT_CONFIG_INVALID",
    message: `${label} cannot be written as TOML`,
  });
}

function toTomlMap(value: RawProjectConfig, label: string): JsonMap {
  const map: JsonMap = {};
  for (const [key, item] of Object.entries(value)) {
    const converted = toTomlValue(item, label ? `${label}.${key}` : key);
    if (converted !== undefined) {
      map[key] = converted;
    }
  }
  return map;
}

/**
 * Serializes config to the appropriate format string.
 */
export function serializeProjectConfig(
  config: ProjectConfig,
  format: ProjectConfigFormat
): string {
  switch (format) {
    case "yaml":
      return yamlDump(config, {
        indent: 2,
        lineWidth: 120,
        noRefs: true,
        sortKeys: false,
      });
    case "json":
    case "jsonc":
      return `${JSON.stringify(config, null, 2)}\n`;
    case "toml":
      return TOML.stringify(toTomlMap(config, ""));
    default: {
      const exhaustive: never = format;
      throw new Error(`Unsupported config format: ${exhaustive}`);
    }
  }
}

/**
 * Saves project configuration to disk, updating the discovered file when
 * one exists and creating `.stylepack/config.<format>` otherwise.
 */
export async function saveProjectConfig(
  config: ProjectConfig,
  options: SaveProjectConfigOptions = {}
): Promise<{ path: string; format: ProjectConfigFormat }> {
  const {
    configPath,
    startPath = process.cwd(),
    format: preferredFormat = "yaml",
  } = options;

  let targetPath: string;
  let targetFormat: ProjectConfigFormat;

  if (configPath) {
    targetPath = path.resolve(configPath);
    targetFormat = formatFromExtension(targetPath) ?? preferredFormat;
  } else {
    const existing = await resolveConfigPath({ startPath });
    if (existing) {
      targetPath = existing.path;
      targetFormat = existing.format;
    } else {
      const projectRoot = (await findProjectRoot(startPath)) ?? startPath;
      targetPath = path.join(
        projectRoot,
        STYLEPACK_DIR,
        `config.${preferredFormat}`
      );
      targetFormat = preferredFormat;
    }
  }

  const validated = validateProjectConfig(config);
  if (isResultErr(validated)) {
    throw createStylepackError({
      code: "PROJECT_CONFIG_INVALID",
      message: `Invalid configuration: ${validated.error.join(", ")}`,
      details: { path: targetPath },
    });
  }

  const serialized = serializeProjectConfig(validated.value, targetFormat);
  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  await fs.writeFile(targetPath, serialized, "utf8");

  return {
    path: targetPath,
    format: targetFormat,
  };
}

export type InitializeProjectOptions = {
  preset?: string;
  typescript?: boolean;
  format?: ProjectConfigFormat;
  force?: boolean;
};

/**
 * Creates `.stylepack/config.<format>` in `projectDir`. Refuses to replace
 * an existing config file unless `force` is set.
 */
export async function initializeProject(
  projectDir: string,
  options: InitializeProjectOptions = {}
): Promise<{ path: string; format: ProjectConfigFormat; config: ProjectConfig }> {
  const format = options.format ?? "yaml";
  const configDir = path.join(path.resolve(projectDir), STYLEPACK_DIR);

  const targetPath = path.join(configDir, `config.${format}`);

  for (const candidate of DEFAULT_CANDIDATES) {
    const candidatePath = path.join(configDir, candidate.filename);
    if (!(await pathExists(candidatePath))) {
      continue;
    }
    if (!options.force) {
      throw createStylepackError({
        code: "PROJECT_CONFIG_EXISTS",
        message: `Project config already exists: ${candidatePath}`,
        details: { path: candidatePath },
        help: "Pass --force to overwrite it.",
      });
    }
    // Discovery would pick a leftover config of another format first.
    if (candidatePath !== targetPath) {
      await fs.rm(candidatePath);
    }
  }

  const config: ProjectConfig = {
    version: STYLEPACK_VERSION_TAG,
    preset: options.preset ?? "base",
  };
  if (options.typescript !== undefined) {
    config.typescript = options.typescript;
  }

  const saved = await saveProjectConfig(config, {
    configPath: targetPath,
    format,
  });
  return { ...saved, config };
}
