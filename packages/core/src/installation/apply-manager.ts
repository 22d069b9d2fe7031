import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import { dirname, join, relative, resolve, sep } from "node:path";
import {
  type ConfigBundle,
  createStylepackError,
  STYLEPACK_VERSION_TAG,
  type StylepackDestinationSettings,
} from "@stylepack/types";
import { z } from "zod";
import { DESTINATION_IDS, type DestinationId, STYLEPACK_DIR } from "../config/limits";
import { destinations } from "../destinations";
import { createDefaultLogger, type Logger } from "../interfaces/logger";
import { withFileLock } from "../utils/file-lock";
import { stringifyJson } from "../utils/json";
import { isPathWithinBoundaryReal, sanitizePath } from "../utils/security";

export type FileAction = "create" | "update" | "unchanged";

export type FileChange = {
  destination: DestinationId;
  /** Absolute path of the target file. */
  path: string;
  /** Path relative to the project root, with forward slashes. */
  relativePath: string;
  action: FileAction;
  content: string;
  previous?: string;
  conflicts: string[];
};

export type PlanOptions = {
  /** Restrict the run to these destinations; listed ids run even when disabled in config. */
  only?: readonly DestinationId[];
  force?: boolean;
};

export type ApplyOptions = PlanOptions & {
  dryRun?: boolean;
};

export type ApplyReport = {
  changes: FileChange[];
  /** Relative paths actually written (empty on a dry run). */
  written: string[];
  dryRun: boolean;
};

export type DriftState = "in-sync" | "modified" | "missing";

export type DriftEntry = {
  destination: DestinationId;
  relativePath: string;
  state: DriftState;
  /** The file no longer matches what the last apply wrote. */
  editedSinceApply: boolean;
  conflicts: string[];
};

export type ApplyManagerOptions = {
  logger?: Logger;
  /** Per-destination `enabled` / `path` settings from the project config. */
  destinations?: Readonly<Record<string, StylepackDestinationSettings>>;
};

const appliedRecordSchema = z.object({
  version: z.string(),
  preset: z.string(),
  appliedAt: z.string(),
  files: z.record(
    z.object({
      destination: z.enum(DESTINATION_IDS),
      hash: z.string(),
    })
  ),
});

export type AppliedRecord = z.infer<typeof appliedRecordSchema>;

export const APPLIED_RECORD_FILE = "applied.json";

export function hashContent(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return;
    }
    throw error;
  }
}

/**
 * Renders bundle destinations against the files already in a project and
 * writes the ones that changed.
 */
export class ApplyManager {
  private readonly projectDir: string;
  private readonly recordFile: string;
  private readonly logger: Logger;
  private readonly settings: Readonly<Record<string, StylepackDestinationSettings>>;

  constructor(projectDir: string = process.cwd(), options: ApplyManagerOptions = {}) {
    this.projectDir = resolve(projectDir);
    this.recordFile = join(this.projectDir, STYLEPACK_DIR, APPLIED_RECORD_FILE);
    this.logger = options.logger ?? createDefaultLogger();
    this.settings = options.destinations ?? {};
  }

  /** Destinations a run touches, in write order. */
  selectDestinations(only?: readonly DestinationId[]): DestinationId[] {
    if (only && only.length > 0) {
      return DESTINATION_IDS.filter((id) => only.includes(id));
    }
    return DESTINATION_IDS.filter((id) => this.settings[id]?.enabled !== false);
  }

  private async resolveTarget(
    id: DestinationId,
    bundle: ConfigBundle
  ): Promise<{ path: string; relativePath: string }> {
    const provider = destinations.get(id);
    const configured = this.settings[id]?.path;
    const relativeTarget = configured
      ? sanitizePath(configured)
      : (provider?.defaultPath(bundle) ?? id);
    const target = resolve(this.projectDir, relativeTarget);

    if (!(await isPathWithinBoundaryReal(target, this.projectDir))) {
      throw createStylepackError({
        code: "PATH_OUTSIDE_PROJECT",
        message: `Destination "${id}" resolves outside the project: ${relativeTarget}`,
        details: { destination: id, path: target },
        help: `Change destinations.${id}.path to a path inside ${this.projectDir}.`,
      });
    }
    return {
      path: target,
      relativePath: relative(this.projectDir, target).split(sep).join("/"),
    };
  }

  async plan(bundle: ConfigBundle, options: PlanOptions = {}): Promise<FileChange[]> {
    const changes: FileChange[] = [];

    for (const id of this.selectDestinations(options.only)) {
      const provider = destinations.get(id);
      if (!provider) {
        continue;
      }
      const target = await this.resolveTarget(id, bundle);
      const previous = await readIfExists(target.path);
      const rendered = provider.render({
        bundle,
        existing: previous,
        force: options.force,
        logger: this.logger,
      });

      const action: FileAction =
        previous === undefined
          ? "create"
          : previous === rendered.content
            ? "unchanged"
            : "update";

      this.logger.debug(`Planned ${action}`, {
        destination: id,
        path: target.relativePath,
      });
      for (const conflict of rendered.conflicts) {
        this.logger.warn(conflict, { destination: id, path: target.relativePath });
      }

      changes.push({
        destination: id,
        ...target,
        action,
        content: rendered.content,
        ...(previous === undefined ? {} : { previous }),
        conflicts: rendered.conflicts,
      });
    }
    return changes;
  }

  async apply(bundle: ConfigBundle, options: ApplyOptions = {}): Promise<ApplyReport> {
    const dryRun = options.dryRun ?? false;
    const changes = await this.plan(bundle, options);
    const written: string[] = [];

    if (dryRun) {
      return { changes, written, dryRun };
    }

    for (const change of changes) {
      if (change.action === "unchanged") {
        continue;
      }
      // The lock file sits beside the target, so the directory comes first.
      await fs.mkdir(dirname(change.path), { recursive: true });
      await withFileLock(change.path, async () => {
        await fs.writeFile(change.path, change.content, "utf8");
      });
      written.push(change.relativePath);
      this.logger.info(`${change.action === "create" ? "Created" : "Updated"} ${change.relativePath}`, {
        destination: change.destination,
      });
    }

    await this.recordApplied(bundle, changes);
    return { changes, written, dryRun };
  }

  /**
   * Compares the project against what `apply` would write, and against
   * the hashes recorded by the last apply.
   */
  async status(bundle: ConfigBundle, options: PlanOptions = {}): Promise<DriftEntry[]> {
    const [changes, record] = await Promise.all([
      this.plan(bundle, { only: options.only }),
      this.loadRecord(),
    ]);

    return changes.map((change) => {
      const recorded = record?.files[change.relativePath];
      const state: DriftState =
        change.action === "create"
          ? "missing"
          : change.action === "unchanged"
            ? "in-sync"
            : "modified";
      return {
        destination: change.destination,
        relativePath: change.relativePath,
        state,
        editedSinceApply:
          recorded !== undefined &&
          change.previous !== undefined &&
          hashContent(change.previous) !== recorded.hash,
        conflicts: change.conflicts,
      };
    });
  }

  async loadRecord(): Promise<AppliedRecord | undefined> {
    const contents = await readIfExists(this.recordFile);
    if (contents === undefined) {
      return;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      this.logger.warn(`Ignoring unreadable ${APPLIED_RECORD_FILE}`, {
        path: this.recordFile,
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    const parsed = appliedRecordSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed ${APPLIED_RECORD_FILE}`, {
        path: this.recordFile,
      });
      return;
    }
    return parsed.data;
  }

  private async recordApplied(bundle: ConfigBundle, changes: FileChange[]): Promise<void> {
    await fs.mkdir(dirname(this.recordFile), { recursive: true });
    await withFileLock(this.recordFile, async () => {
      const previous = await this.loadRecord();
      const files: AppliedRecord["files"] = { ...previous?.files };
      for (const change of changes) {
        files[change.relativePath] = {
          destination: change.destination,
          hash: hashContent(change.content),
        };
      }
      const record: AppliedRecord = {
        version: STYLEPACK_VERSION_TAG,
        preset: bundle.preset,
        appliedAt: new Date().toISOString(),
        files,
      };
      await fs.writeFile(this.recordFile, stringifyJson(record), "utf8");
    });
  }
}
