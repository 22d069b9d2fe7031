import type { ConfigBundle, JsonValue } from "@stylepack/types";
import type { DestinationId } from "../config/limits";
import type {
  DestinationOwnership,
  DestinationProvider,
  DestinationRenderContext,
  DestinationRenderResult,
} from "../interfaces";
import { type JsonRecord, stringifyJson } from "../utils/json";

const PRETTIERRC_SCHEMA = "https://json.schemastore.org/prettierrc";

export class PrettierProvider implements DestinationProvider {
  get name(): DestinationId {
    return "prettier";
  }

  get description(): string {
    return "Prettier options with per-file overrides (.prettierrc.json)";
  }

  get ownership(): DestinationOwnership {
    return "whole-file";
  }

  defaultPath(_bundle: ConfigBundle): string {
    return ".prettierrc.json";
  }

  render({ bundle }: DestinationRenderContext): DestinationRenderResult {
    const { options, overrides } = bundle.formatter;
    const document: JsonRecord = { $schema: PRETTIERRC_SCHEMA, ...options };

    if (overrides.length > 0) {
      document.overrides = overrides.map((override) => {
        const rendered: Record<string, JsonValue> = { files: override.files };
        if (override.excludeFiles !== undefined) {
          rendered.excludeFiles = override.excludeFiles;
        }
        rendered.options = override.options;
        return rendered;
      });
    }

    return { content: stringifyJson(document), conflicts: [] };
  }
}
