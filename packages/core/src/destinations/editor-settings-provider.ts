import type { ConfigBundle } from "@stylepack/types";
import { mergeEditorSettings } from "../bundle/compose";
import type { DestinationId } from "../config/limits";
import type {
  DestinationOwnership,
  DestinationProvider,
  DestinationRenderContext,
  DestinationRenderResult,
} from "../interfaces";
import {
  diffJsonRecords,
  type JsonRecord,
  parseJsonDocument,
  writeJsonEdits,
} from "../utils/json";

export class EditorSettingsProvider implements DestinationProvider {
  get name(): DestinationId {
    return "editor-settings";
  }

  get description(): string {
    return "VS Code workspace settings (.vscode/settings.json)";
  }

  get ownership(): DestinationOwnership {
    return "merge";
  }

  defaultPath(_bundle: ConfigBundle): string {
    return ".vscode/settings.json";
  }

  render({ bundle, existing, logger }: DestinationRenderContext): DestinationRenderResult {
    const file = this.defaultPath(bundle);
    const current: JsonRecord =
      existing === undefined ? {} : parseJsonDocument(existing, file);
    const edits = diffJsonRecords(
      current,
      mergeEditorSettings(current, bundle.editor.settings)
    );

    return {
      content: writeJsonEdits(existing, edits, {
        logger,
        metadata: { destination: this.name, path: file },
      }),
      conflicts: [],
    };
  }
}
