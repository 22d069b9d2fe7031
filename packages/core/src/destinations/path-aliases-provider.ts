import type { ConfigBundle } from "@stylepack/types";
import type { DestinationId } from "../config/limits";
import type {
  DestinationOwnership,
  DestinationProvider,
  DestinationRenderContext,
  DestinationRenderResult,
} from "../interfaces";
import {
  isJsonRecord,
  isStringArray,
  type JsonEdit,
  type JsonRecord,
  parseJsonDocument,
  writeJsonEdits,
} from "../utils/json";

/**
 * Writes the alias map into `compilerOptions.paths` of tsconfig.json
 * (jsconfig.json for JavaScript projects). The file is edited in place, so
 * its other keys and comments are kept; an alias the project already maps
 * elsewhere is kept unless forced.
 */
export class PathAliasesProvider implements DestinationProvider {
  get name(): DestinationId {
    return "path-aliases";
  }

  get description(): string {
    return "Import path aliases (compilerOptions.paths)";
  }

  get ownership(): DestinationOwnership {
    return "merge";
  }

  defaultPath(bundle: ConfigBundle): string {
    return bundle.typescript ? "tsconfig.json" : "jsconfig.json";
  }

  render({
    bundle,
    existing,
    force,
    logger,
  }: DestinationRenderContext): DestinationRenderResult {
    const file = this.defaultPath(bundle);
    const document: JsonRecord =
      existing === undefined ? {} : parseJsonDocument(existing, file);
    const compilerOptions: JsonRecord = isJsonRecord(document.compilerOptions)
      ? document.compilerOptions
      : {};
    const paths: JsonRecord = isJsonRecord(compilerOptions.paths)
      ? compilerOptions.paths
      : {};
    const edits: JsonEdit[] = [];
    const conflicts: string[] = [];

    for (const [alias, target] of Object.entries(bundle.aliases)) {
      const current = paths[alias];
      const matches =
        isStringArray(current) && current.length === 1 && current[0] === target;
      if (matches) {
        continue;
      }
      if (current !== undefined && !force) {
        conflicts.push(
          `Alias "${alias}" is mapped to ${JSON.stringify(current)} in ${file}; kept (use --force to map it to "${target}")`
        );
        continue;
      }
      edits.push({ path: ["compilerOptions", "paths", alias], value: [target] });
    }

    const baseUrl = compilerOptions.baseUrl;
    if (typeof baseUrl === "string" && baseUrl !== "." && baseUrl !== "./") {
      conflicts.push(
        `compilerOptions.baseUrl is "${baseUrl}" in ${file}; alias targets resolve relative to it`
      );
    }

    return {
      content: writeJsonEdits(existing, edits, {
        logger,
        metadata: { destination: this.name, path: file },
      }),
      conflicts,
    };
  }
}
