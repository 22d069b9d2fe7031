import type { ConfigBundle, PresetDefinition, StylepackProjectConfig } from "@stylepack/types";
import { vi } from "vitest";
import { composeBundle } from "../bundle/compose";
import type { Logger } from "../interfaces";
import { BUILTIN_PRESETS } from "../presets/builtin";

export function builtinPreset(name: string): PresetDefinition {
  const preset = BUILTIN_PRESETS.get(name);
  if (!preset) {
    throw new Error(`No built-in preset named ${name}`);
  }
  return preset;
}

/** Built-in chain ending in `name`, root first. */
export function builtinChain(name: string): PresetDefinition[] {
  const leaf = builtinPreset(name);
  return leaf.extends ? [...builtinChain(leaf.extends), leaf] : [leaf];
}

export function bundleFor(
  name: string,
  options: { typescript?: boolean; projectConfig?: StylepackProjectConfig } = {}
): ConfigBundle {
  return composeBundle({
    presets: builtinChain(name),
    projectConfig: options.projectConfig,
    typescript: options.typescript ?? false,
  });
}

export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
