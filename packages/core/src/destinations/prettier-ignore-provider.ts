import type { ConfigBundle } from "@stylepack/types";
import { type DestinationId, LOCK_FILES } from "../config/limits";
import type {
  DestinationOwnership,
  DestinationProvider,
  DestinationRenderContext,
  DestinationRenderResult,
} from "../interfaces";
import { unionInOrder } from "../utils/json";

export class PrettierIgnoreProvider implements DestinationProvider {
  get name(): DestinationId {
    return "prettier-ignore";
  }

  get description(): string {
    return "Paths Prettier skips (.prettierignore)";
  }

  get ownership(): DestinationOwnership {
    return "whole-file";
  }

  defaultPath(_bundle: ConfigBundle): string {
    return ".prettierignore";
  }

  render({ bundle }: DestinationRenderContext): DestinationRenderResult {
    const lines = [
      "# Generated by stylepack",
      ...unionInOrder(bundle.formatterIgnores, LOCK_FILES),
    ];
    return { content: `${lines.join("\n")}\n`, conflicts: [] };
  }
}
