import { type SpawnOptions, spawn } from "node:child_process";
import { promises as fs } from "node:fs";
import { join } from "node:path";
import {
  type ConfigBundle,
  createStylepackError,
  PACKAGE_MANAGERS,
  type PackageManager,
} from "@stylepack/types";
import { parseJsonDocument, type JsonRecord, isJsonRecord } from "../utils/json";
import { isValidPackageName } from "../utils/security";

/** Lock file → the package manager that writes it, checked in this order. */
const LOCK_FILE_MANAGERS: ReadonlyArray<[file: string, manager: PackageManager]> = [
  ["pnpm-lock.yaml", "pnpm"],
  ["yarn.lock", "yarn"],
  ["bun.lockb", "bun"],
  ["bun.lock", "bun"],
  ["package-lock.json", "npm"],
];

const ADD_DEV_ARGS: Readonly<Record<PackageManager, readonly string[]>> = {
  npm: ["install", "--save-dev"],
  yarn: ["add", "--dev"],
  pnpm: ["add", "--save-dev"],
  bun: ["add", "--dev"],
};

export type InstallPlan = {
  manager: PackageManager;
  /** Packages to add, sorted. */
  packages: string[];
  alreadyInstalled: string[];
  /** Program and arguments; empty when there is nothing to install. */
  command: string[];
};

export function isPackageManager(value: string): value is PackageManager {
  return PACKAGE_MANAGERS.some((manager) => manager === value);
}

async function readPackageJson(projectDir: string): Promise<JsonRecord | undefined> {
  const filePath = join(projectDir, "package.json");
  let contents: string;
  try {
    contents = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return;
    }
    throw error;
  }
  return parseJsonDocument(contents, filePath);
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Picks the package manager for a project: an explicit preference, then
 * the `packageManager` field of package.json (`pnpm@9.1.0`), then the
 * lock file present, then npm.
 */
export async function detectPackageManager(
  projectDir: string,
  preferred?: PackageManager
): Promise<PackageManager> {
  if (preferred) {
    return preferred;
  }

  const manifest = await readPackageJson(projectDir);
  const field = manifest?.packageManager;
  if (typeof field === "string") {
    const name = field.split("@")[0] ?? "";
    if (isPackageManager(name)) {
      return name;
    }
  }

  for (const [file, manager] of LOCK_FILE_MANAGERS) {
    if (await exists(join(projectDir, file))) {
      return manager;
    }
  }
  return "npm";
}

function declaredDependencies(manifest: JsonRecord | undefined): Set<string> {
  const names = new Set<string>();
  for (const key of ["dependencies", "devDependencies"]) {
    const section = manifest?.[key];
    if (isJsonRecord(section)) {
      for (const name of Object.keys(section)) {
        names.add(name);
      }
    }
  }
  return names;
}

export async function planInstall(
  bundle: ConfigBundle,
  projectDir: string,
  preferred?: PackageManager
): Promise<InstallPlan> {
  const invalid = bundle.devDependencies.filter((name) => !isValidPackageName(name));
  if (invalid.length > 0) {
    throw createStylepackError({
      code: "PROJECT_CONFIG_INVALID",
      message: `Invalid package name(s): ${invalid.join(", ")}`,
      details: { packages: invalid },
      help: "devDependencies must be npm package names without versions or paths.",
    });
  }

  const [manager, manifest] = await Promise.all([
    detectPackageManager(projectDir, preferred),
    readPackageJson(projectDir),
  ]);
  const declared = declaredDependencies(manifest);

  const wanted = [...new Set(bundle.devDependencies)].sort();
  const packages = wanted.filter((name) => !declared.has(name));
  const alreadyInstalled = wanted.filter((name) => declared.has(name));

  return {
    manager,
    packages,
    alreadyInstalled,
    command: packages.length > 0 ? [manager, ...ADD_DEV_ARGS[manager], ...packages] : [],
  };
}

/** The part of a child process `runInstall` listens to. */
export type SpawnedProcess = {
  on(event: "close", listener: (code: number | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
};

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => SpawnedProcess;

export type RunInstallOptions = {
  cwd: string;
  spawn?: SpawnFn;
};

/**
 * Runs the plan's command with inherited stdio and resolves with its exit
 * code. A plan with nothing to install resolves with 0 immediately.
 */
export function runInstall(plan: InstallPlan, options: RunInstallOptions): Promise<number> {
  const [program, ...args] = plan.command;
  if (program === undefined) {
    return Promise.resolve(0);
  }
  const spawnProcess: SpawnFn = options.spawn ?? spawn;

  return new Promise((resolvePromise, rejectPromise) => {
    const child = spawnProcess(program, args, {
      cwd: options.cwd,
      stdio: "inherit",
      // npm, yarn and pnpm are .cmd shims on Windows
      shell: process.platform === "win32",
    });
    child.on("error", rejectPromise);
    child.on("close", (code) => resolvePromise(code ?? 1));
  });
}
