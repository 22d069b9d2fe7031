import { createStylepackError } from "@stylepack/types";
import { DESTINATION_IDS, type DestinationId } from "../config/limits";
import type { DestinationProvider } from "../interfaces";
import { EditorExtensionsProvider } from "./editor-extensions-provider";
import { EditorSettingsProvider } from "./editor-settings-provider";
import { EslintProvider } from "./eslint-provider";
import { PackageScriptsProvider } from "./package-scripts-provider";
import { PathAliasesProvider } from "./path-aliases-provider";
import { PrettierIgnoreProvider } from "./prettier-ignore-provider";
import { PrettierProvider } from "./prettier-provider";

// Create singleton instances
export const eslintProvider = new EslintProvider();
export const prettierProvider = new PrettierProvider();
export const prettierIgnoreProvider = new PrettierIgnoreProvider();
export const pathAliasesProvider = new PathAliasesProvider();
export const editorSettingsProvider = new EditorSettingsProvider();
export const editorExtensionsProvider = new EditorExtensionsProvider();
export const packageScriptsProvider = new PackageScriptsProvider();

// Export as a map for easy lookup, in write order
export const destinations: ReadonlyMap<DestinationId, DestinationProvider> =
  new Map<DestinationId, DestinationProvider>([
    ["eslint", eslintProvider],
    ["prettier", prettierProvider],
    ["prettier-ignore", prettierIgnoreProvider],
    ["path-aliases", pathAliasesProvider],
    ["editor-settings", editorSettingsProvider],
    ["editor-extensions", editorExtensionsProvider],
    ["package-scripts", packageScriptsProvider],
  ]);

export function isDestinationId(value: string): value is DestinationId {
  return DESTINATION_IDS.some((id) => id === value);
}

export function getDestination(id: string): DestinationProvider {
  const provider = isDestinationId(id) ? destinations.get(id) : undefined;
  if (!provider) {
    throw createStylepackError({
      code: "DESTINATION_UNKNOWN",
      message: `Unknown destination: ${id}`,
      details: { destination: id, available: [...DESTINATION_IDS] },
      help: `Choose one of: ${DESTINATION_IDS.join(", ")}`,
    });
  }
  return provider;
}
