import {
  type ConfigBundle,
  createStylepackError,
  type EditorSettings,
  type ExtensionRecommendations,
  type FormatterConfig,
  type FormatterOverride,
  type JsonValue,
  type LintEntry,
  type PathAliasMap,
  type PresetDefinition,
  type RuleEntry,
  type StylepackProjectConfig,
} from "@stylepack/types";
import { isJsonRecord, isStringArray, unionInOrder } from "../utils/json";

/** Name of the rule set that collects preset and project rule overrides. */
export const PROJECT_RULE_SET = "project";

/** Editor settings whose array values accumulate instead of being replaced. */
const UNIONED_EDITOR_SETTINGS = new Set(["eslint.validate"]);

/** Formatter options whose array values accumulate instead of being replaced. */
const UNIONED_FORMATTER_OPTIONS = new Set(["plugins"]);

export type ComposeBundleOptions = {
  /** Resolved preset chain, root first. */
  presets: readonly PresetDefinition[];
  projectConfig?: StylepackProjectConfig;
  typescript: boolean;
};

type FormatterFragment = {
  options?: Record<string, JsonValue>;
  overrides?: FormatterOverride[];
};

type EditorFragment = {
  settings?: Record<string, JsonValue>;
  recommend?: string[];
  unwanted?: string[];
};

const overrideKey = (override: FormatterOverride): string =>
  JSON.stringify([override.files, override.excludeFiles ?? null]);

function mergeOptions(
  base: Record<string, JsonValue>,
  next: Record<string, JsonValue>,
  unioned: ReadonlySet<string>
): Record<string, JsonValue> {
  const merged: Record<string, JsonValue> = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const previous = merged[key];
    if (unioned.has(key) && isStringArray(previous) && isStringArray(value)) {
      merged[key] = unionInOrder(previous, value);
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

export function mergeFormatter(
  current: FormatterConfig,
  fragment: FormatterFragment | undefined
): FormatterConfig {
  if (!fragment) {
    return current;
  }
  const options = mergeOptions(
    current.options,
    fragment.options ?? {},
    UNIONED_FORMATTER_OPTIONS
  );

  const overrides = [...current.overrides];
  for (const override of fragment.overrides ?? []) {
    const index = overrides.findIndex(
      (existing) => overrideKey(existing) === overrideKey(override)
    );
    const existing = index === -1 ? undefined : overrides[index];
    if (existing) {
      overrides[index] = {
        ...existing,
        options: { ...existing.options, ...override.options },
      };
    } else {
      overrides.push(override);
    }
  }

  return { options, overrides };
}

/**
 * Deep-merges editor settings. Nested objects merge key by key, arrays are
 * replaced except for the settings in {@link UNIONED_EDITOR_SETTINGS}.
 */
export function mergeEditorSettings(
  base: EditorSettings,
  next: EditorSettings,
  unioned: ReadonlySet<string> = UNIONED_EDITOR_SETTINGS
): EditorSettings {
  const merged: EditorSettings = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const previous = merged[key];
    if (isJsonRecord(previous) && isJsonRecord(value)) {
      merged[key] = mergeEditorSettings(previous, value, new Set());
    } else if (
      unioned.has(key) &&
      isStringArray(previous) &&
      isStringArray(value)
    ) {
      merged[key] = unionInOrder(previous, value);
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

export function mergeExtensions(
  current: ExtensionRecommendations,
  fragment: EditorFragment | undefined
): ExtensionRecommendations {
  const recommend = fragment?.recommend ?? [];
  const unwanted = fragment?.unwanted ?? [];
  return {
    recommendations: unionInOrder(current.recommendations, recommend).filter(
      (id) => !unwanted.includes(id)
    ),
    unwantedRecommendations: unionInOrder(
      current.unwantedRecommendations,
      unwanted
    ).filter((id) => !recommend.includes(id)),
  };
}

function applyAliasOverrides(
  aliases: PathAliasMap,
  overrides: Record<string, string | null> | undefined
): PathAliasMap {
  const merged: PathAliasMap = { ...aliases };
  for (const [alias, target] of Object.entries(overrides ?? {})) {
    if (target === null) {
      delete merged[alias];
    } else {
      merged[alias] = target;
    }
  }
  return merged;
}

/**
 * Composes the config bundle for a preset chain and project configuration.
 * Pure: equal inputs produce equal bundles.
 */
export function composeBundle(options: ComposeBundleOptions): ConfigBundle {
  const { presets, projectConfig = {}, typescript } = options;
  const leaf = presets.at(-1);
  if (!leaf) {
    throw createStylepackError({
      code: "PRESET_UNKNOWN",
      message: "Cannot compose a bundle without a preset",
    });
  }

  const keep = (entry: LintEntry): boolean =>
    typescript || entry.typescriptOnly !== true;

  const entries: LintEntry[] = [];
  const tail: LintEntry[] = [];
  let rules: Record<string, RuleEntry> = {};
  let ignores: string[] = [];
  let formatter: FormatterConfig = { options: {}, overrides: [] };
  let formatterIgnores: string[] = [];
  let aliases: PathAliasMap = {};
  let settings: EditorSettings = {};
  let extensions: ExtensionRecommendations = {
    recommendations: [],
    unwantedRecommendations: [],
  };
  let scripts: Record<string, string> = {};
  let devDependencies: string[] = [];

  for (const preset of presets) {
    entries.push(...(preset.eslint?.entries ?? []).filter(keep));
    // An ancestor's tail closes around its descendants' tails.
    tail.unshift(...(preset.eslint?.tail ?? []).filter(keep));
    rules = { ...rules, ...preset.eslint?.rules };
    ignores = unionInOrder(ignores, preset.eslint?.ignores ?? []);
    formatter = mergeFormatter(formatter, preset.prettier);
    formatterIgnores = unionInOrder(
      formatterIgnores,
      preset.prettier?.ignores ?? []
    );
    aliases = { ...aliases, ...preset.aliases };
    settings = mergeEditorSettings(settings, preset.editor?.settings ?? {});
    extensions = mergeExtensions(extensions, preset.editor);
    scripts = { ...scripts, ...preset.scripts };
    devDependencies = unionInOrder(devDependencies, preset.devDependencies ?? []);
  }

  entries.push(...(projectConfig.eslint?.entries ?? []).filter(keep));
  rules = { ...rules, ...projectConfig.eslint?.rules };
  ignores = unionInOrder(ignores, projectConfig.eslint?.ignores ?? []);
  formatter = mergeFormatter(formatter, projectConfig.prettier);
  formatterIgnores = unionInOrder(
    formatterIgnores,
    projectConfig.prettier?.ignores ?? []
  );
  aliases = applyAliasOverrides(aliases, projectConfig.aliases);
  settings = mergeEditorSettings(settings, projectConfig.editor?.settings ?? {});
  extensions = mergeExtensions(extensions, projectConfig.editor);
  scripts = { ...scripts, ...projectConfig.scripts };

  const lintEntries: LintEntry[] = [...entries];
  if (Object.keys(rules).length > 0) {
    lintEntries.push({ kind: "rules", name: PROJECT_RULE_SET, rules });
  }
  lintEntries.push(...tail);

  const sharedPackages = lintEntries.flatMap((entry) =>
    entry.kind === "shared" ? (entry.packages ?? []) : []
  );

  return {
    preset: leaf.name,
    typescript,
    lint: {
      entries: lintEntries,
      ignores: { kind: "ignores", patterns: ignores },
    },
    formatter,
    formatterIgnores: unionInOrder(ignores, formatterIgnores),
    aliases,
    editor: { settings, extensions },
    scripts,
    devDependencies: unionInOrder(
      devDependencies,
      sharedPackages,
      projectConfig.devDependencies ?? []
    ).sort(),
  };
}
