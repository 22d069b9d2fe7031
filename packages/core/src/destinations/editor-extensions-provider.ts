import type { ConfigBundle } from "@stylepack/types";
import type { DestinationId } from "../config/limits";
import type {
  DestinationOwnership,
  DestinationProvider,
  DestinationRenderContext,
  DestinationRenderResult,
} from "../interfaces";
import {
  diffJsonRecords,
  isStringArray,
  type JsonRecord,
  parseJsonDocument,
  unionInOrder,
  writeJsonEdits,
} from "../utils/json";

export class EditorExtensionsProvider implements DestinationProvider {
  get name(): DestinationId {
    return "editor-extensions";
  }

  get description(): string {
    return "Recommended and unwanted VS Code extensions (.vscode/extensions.json)";
  }

  get ownership(): DestinationOwnership {
    return "merge";
  }

  defaultPath(_bundle: ConfigBundle): string {
    return ".vscode/extensions.json";
  }

  render({ bundle, existing, logger }: DestinationRenderContext): DestinationRenderResult {
    const file = this.defaultPath(bundle);
    const document: JsonRecord =
      existing === undefined ? {} : parseJsonDocument(existing, file);
    const existingRecommended = isStringArray(document.recommendations)
      ? document.recommendations
      : [];
    const existingUnwanted = isStringArray(document.unwantedRecommendations)
      ? document.unwantedRecommendations
      : [];
    const { recommendations, unwantedRecommendations } = bundle.editor.extensions;

    const conflicts = existingRecommended
      .filter((id) => unwantedRecommendations.includes(id))
      .map((id) => `Moved "${id}" from recommendations to unwantedRecommendations`);

    const edits = diffJsonRecords(document, {
      recommendations: unionInOrder(existingRecommended, recommendations).filter(
        (id) => !unwantedRecommendations.includes(id)
      ),
      unwantedRecommendations: unionInOrder(
        existingUnwanted,
        unwantedRecommendations
      ).filter((id) => !recommendations.includes(id)),
    });

    return {
      content: writeJsonEdits(existing, edits, {
        logger,
        metadata: { destination: this.name, path: file },
      }),
      conflicts,
    };
  }
}
