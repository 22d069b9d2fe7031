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
  type JsonEdit,
  type JsonRecord,
  parseJsonDocument,
  writeJsonEdits,
} from "../utils/json";

/**
 * Adds the lint and format scripts to package.json. A script the project
 * already defines differently is kept unless forced.
 */
export class PackageScriptsProvider implements DestinationProvider {
  get name(): DestinationId {
    return "package-scripts";
  }

  get description(): string {
    return "lint, lint:fix, format and format:check scripts (package.json)";
  }

  get ownership(): DestinationOwnership {
    return "merge";
  }

  defaultPath(_bundle: ConfigBundle): string {
    return "package.json";
  }

  render({
    bundle,
    existing,
    force,
    logger,
  }: DestinationRenderContext): DestinationRenderResult {
    const file = this.defaultPath(bundle);
    const manifest: JsonRecord =
      existing === undefined ? {} : parseJsonDocument(existing, file);
    const scripts: JsonRecord = isJsonRecord(manifest.scripts) ? manifest.scripts : {};
    const edits: JsonEdit[] = [];
    const conflicts: string[] = [];

    for (const [name, command] of Object.entries(bundle.scripts)) {
      const current = scripts[name];
      if (current === command) {
        continue;
      }
      if (current !== undefined && !force) {
        conflicts.push(
          `Script "${name}" is ${JSON.stringify(current)}; kept (use --force to replace it with "${command}")`
        );
        continue;
      }
      edits.push({ path: ["scripts", name], value: command });
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
