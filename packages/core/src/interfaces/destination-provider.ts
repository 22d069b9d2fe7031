import type { ConfigBundle } from "@stylepack/types";
import type { DestinationId } from "../config/limits";
import type { Logger } from "./logger";

/**
 * `whole-file` destinations own every byte of their file; `merge`
 * destinations own a few keys inside a file the project also edits
 * (package.json, tsconfig.json, .vscode/*.json).
 */
export type DestinationOwnership = "whole-file" | "merge";

export type DestinationRenderContext = {
  bundle: ConfigBundle;
  /** Current contents of the destination file, when it exists. */
  existing?: string;
  /** Overwrite values the project set differently instead of keeping them. */
  force?: boolean;
  logger: Logger;
};

export type DestinationRenderResult = {
  content: string;
  /** Human-readable notes about values kept because `force` was off. */
  conflicts: string[];
};

export type DestinationProvider = {
  /**
   * Canonical ID for the destination, kebab-case, e.g. "eslint".
   */
  get name(): DestinationId;

  /** One-line summary shown by `stylepack list`. */
  get description(): string;

  get ownership(): DestinationOwnership;

  /** Path of the file relative to the project root. */
  defaultPath(bundle: ConfigBundle): string;

  /**
   * Produces the full file contents to write. Merge destinations read
   * `existing` and keep the keys they do not own.
   */
  render(ctx: DestinationRenderContext): DestinationRenderResult;
};
