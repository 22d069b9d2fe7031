/** Milliseconds in one second. */
const SECOND = 1000;

const FILE_LOCK_TIMEOUT_SECONDS = 5;
const FILE_LOCK_RETRY_DELAY_MS = 100;
const FILE_LOCK_STALE_SECONDS = 10;

/** Resource guardrails used by the apply flow. */
export const RESOURCE_LIMITS = {
  // File locking
  fileLock: {
    timeout: FILE_LOCK_TIMEOUT_SECONDS * SECOND,
    retryDelay: FILE_LOCK_RETRY_DELAY_MS,
    staleThreshold: FILE_LOCK_STALE_SECONDS * SECOND,
  },
} as const;

/** Recognised file extensions for project configuration formats. */
export const FILE_EXTENSIONS = {
  yaml: [".yaml", ".yml"],
  json: [".json"],
  jsonc: [".jsonc"],
  toml: [".toml"],
} as const;

/** Directory, relative to the project root, that holds stylepack's own files. */
export const STYLEPACK_DIR = ".stylepack";

/** Canonical list of destination identifiers, in write order. */
export const DESTINATION_IDS = [
  "eslint",
  "prettier",
  "prettier-ignore",
  "path-aliases",
  "editor-settings",
  "editor-extensions",
  "package-scripts",
] as const;

export type DestinationId = (typeof DESTINATION_IDS)[number];

/** Files a lint run is expected to reach; an ignore glob hitting one is suspicious. */
export const LINT_TARGET_SAMPLES = [
  "src/index.ts",
  "src/main.ts",
  "src/main.js",
  "src/App.tsx",
  "src/App.vue",
  "src/routes/+page.svelte",
  "eslint.config.mjs",
] as const;

/** Lock files Prettier should never touch. */
export const LOCK_FILES = [
  "package-lock.json",
  "pnpm-lock.yaml",
  "yarn.lock",
  "bun.lockb",
  "bun.lock",
] as const;
