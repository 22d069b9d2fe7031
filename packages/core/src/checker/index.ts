import { isAbsolute } from "node:path";
import {
  type ConfigBundle,
  type JsonValue,
  REQUIRED_SCRIPTS,
  type RuleSetEntry,
} from "@stylepack/types";
import picomatch from "picomatch";
import { type DestinationId, LINT_TARGET_SAMPLES } from "../config/limits";
import { isJsonRecord, isStringArray } from "../utils/json";

export type CheckSeverity = "error" | "warning" | "info";

export type CheckResult = {
  destination: DestinationId;
  message: string;
  severity: CheckSeverity;
  /** Project-relative file the result is about, when it concerns one. */
  path?: string;
};

export type CheckerConfig = {
  /** Paths a lint run must reach; defaults to {@link LINT_TARGET_SAMPLES}. */
  lintTargets?: readonly string[];
};

const EXTENSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9-]*\.[A-Za-z0-9][A-Za-z0-9-]*$/;

/** `@/x`, `~/x`, `~lib/x`, `#app/x`: import specifiers that only an alias can resolve. */
const ALIAS_REFERENCE_PATTERN = /^(@|~[\w-]*|#[\w-]*)\//;

const MATCH_EVERYTHING = new Set(["**", "**/*", "*"]);

/** Script binaries and the package that provides each. */
const SCRIPT_BINARIES: Readonly<Record<string, string>> = {
  eslint: "eslint",
  prettier: "prettier",
};

/**
 * Plugin prefix of a rule name: `react/jsx-key` → `react`,
 * `@typescript-eslint/no-explicit-any` → `@typescript-eslint`,
 * `@scope/plugin/rule` → `@scope/plugin`. Core rules have none.
 */
export function pluginPrefix(ruleName: string): string | undefined {
  const parts = ruleName.split("/");
  if (parts.length < 2) {
    return;
  }
  if (ruleName.startsWith("@") && parts.length >= 3) {
    return `${parts[0]}/${parts[1]}`;
  }
  return parts[0];
}

function ruleSets(bundle: ConfigBundle): RuleSetEntry[] {
  return bundle.lint.entries.filter(
    (entry): entry is RuleSetEntry => entry.kind === "rules"
  );
}

function checkPlugins(bundle: ConfigBundle): CheckResult[] {
  const available = new Set(
    bundle.lint.entries.flatMap((entry) =>
      entry.kind === "shared" ? (entry.plugins ?? []) : []
    )
  );
  const results: CheckResult[] = [];

  for (const ruleSet of ruleSets(bundle)) {
    for (const ruleName of Object.keys(ruleSet.rules)) {
      const prefix = pluginPrefix(ruleName);
      if (prefix !== undefined && !available.has(prefix)) {
        results.push({
          destination: "eslint",
          message: `Rule "${ruleName}" in rule set "${ruleSet.name}" needs plugin "${prefix}", which no shared config provides.`,
          severity: "error",
        });
      }
    }
  }
  return results;
}

function checkBindings(bundle: ConfigBundle): CheckResult[] {
  const specifiers = new Map<string, string>();
  const results: CheckResult[] = [];

  for (const entry of bundle.lint.entries) {
    if (entry.kind !== "shared") {
      continue;
    }
    const previous = specifiers.get(entry.binding);
    if (previous === undefined) {
      specifiers.set(entry.binding, entry.specifier);
    } else if (previous !== entry.specifier) {
      results.push({
        destination: "eslint",
        message: `Binding "${entry.binding}" is imported from both "${previous}" and "${entry.specifier}".`,
        severity: "error",
      });
    }
  }
  return results;
}

function checkIgnores(
  bundle: ConfigBundle,
  lintTargets: readonly string[]
): CheckResult[] {
  const { patterns } = bundle.lint.ignores;
  if (patterns.length === 0) {
    return [
      {
        destination: "eslint",
        message: "No ignore patterns are configured; ESLint will also lint build output.",
        severity: "info",
      },
    ];
  }

  const results: CheckResult[] = [];
  patterns.forEach((pattern, index) => {
    const trimmed = pattern.trim();
    if (trimmed.length === 0) {
      results.push({
        destination: "eslint",
        message: `Ignore pattern at index ${index} is empty.`,
        severity: "error",
      });
      return;
    }
    if (MATCH_EVERYTHING.has(trimmed)) {
      results.push({
        destination: "eslint",
        message: `Ignore pattern "${trimmed}" excludes every file.`,
        severity: "error",
      });
      return;
    }
    const isMatch = picomatch(trimmed, { dot: true });
    const hit = lintTargets.find((target) => isMatch(target));
    if (hit !== undefined) {
      results.push({
        destination: "eslint",
        message: `Ignore pattern "${trimmed}" matches lint target "${hit}".`,
        severity: "warning",
      });
    }
  });
  return results;
}

function collectStrings(value: JsonValue | undefined, into: string[]): void {
  if (typeof value === "string") {
    into.push(value);
  } else if (Array.isArray(value)) {
    for (const item of value) {
      collectStrings(item, into);
    }
  } else if (isJsonRecord(value)) {
    for (const item of Object.values(value)) {
      collectStrings(item, into);
    }
  }
}

/** Strings in rule options and settings, i.e. everything but severities. */
function referencedStrings(bundle: ConfigBundle): string[] {
  const strings: string[] = [];
  for (const ruleSet of ruleSets(bundle)) {
    for (const entry of Object.values(ruleSet.rules)) {
      if (Array.isArray(entry)) {
        collectStrings(entry.slice(1), strings);
      }
    }
    collectStrings(ruleSet.settings, strings);
  }
  return strings;
}

export function aliasMatches(alias: string, specifier: string): boolean {
  return alias.endsWith("*")
    ? specifier.startsWith(alias.slice(0, -1))
    : specifier === alias;
}

function checkAliases(bundle: ConfigBundle): CheckResult[] {
  const results: CheckResult[] = [];
  const aliases = Object.entries(bundle.aliases);

  for (const [alias, target] of aliases) {
    if (alias.endsWith("/*") !== target.endsWith("/*")) {
      results.push({
        destination: "path-aliases",
        message: `Alias "${alias}" maps to "${target}" but only one side ends in "/*".`,
        severity: "error",
      });
    }
    const relativeTarget = target.replace(/^\.\//, "");
    if (relativeTarget.startsWith("../") || isAbsolute(relativeTarget)) {
      results.push({
        destination: "path-aliases",
        message: `Alias "${alias}" points outside the project ("${target}").`,
        severity: "warning",
      });
    }
  }

  const seen = new Set<string>();
  for (const value of referencedStrings(bundle)) {
    if (!ALIAS_REFERENCE_PATTERN.test(value) || seen.has(value)) {
      continue;
    }
    seen.add(value);
    if (!aliases.some(([alias]) => aliasMatches(alias, value))) {
      results.push({
        destination: "eslint",
        message: `ESLint options reference "${value}" but no path alias resolves it.`,
        severity: "error",
      });
    }
  }
  return results;
}

function checkExtensions(bundle: ConfigBundle): CheckResult[] {
  const { recommendations, unwantedRecommendations } = bundle.editor.extensions;
  const results: CheckResult[] = [];

  for (const id of [...recommendations, ...unwantedRecommendations]) {
    if (!EXTENSION_ID_PATTERN.test(id)) {
      results.push({
        destination: "editor-extensions",
        message: `Extension id "${id}" is not of the form publisher.name.`,
        severity: "error",
      });
    }
  }
  for (const id of recommendations) {
    if (unwantedRecommendations.includes(id)) {
      results.push({
        destination: "editor-extensions",
        message: `Extension "${id}" is both recommended and unwanted.`,
        severity: "error",
      });
    }
  }
  return results;
}

function checkDefaultFormatters(bundle: ConfigBundle): CheckResult[] {
  const { settings, extensions } = bundle.editor;
  const formatters: Array<[scope: string, id: JsonValue | undefined]> = [
    ["editor", settings["editor.defaultFormatter"]],
  ];
  for (const [key, value] of Object.entries(settings)) {
    if (/^\[.+\]$/.test(key) && isJsonRecord(value)) {
      formatters.push([key, value["editor.defaultFormatter"]]);
    }
  }

  return formatters.flatMap(([scope, id]): CheckResult[] =>
    typeof id === "string" && !extensions.recommendations.includes(id)
      ? [
          {
            destination: "editor-settings",
            message: `Default formatter "${id}" (${scope}) is not a recommended extension.`,
            severity: "warning",
          },
        ]
      : []
  );
}

function checkFormatter(bundle: ConfigBundle): CheckResult[] {
  const { options, overrides } = bundle.formatter;
  const results: CheckResult[] = [];
  const plugins = new Set<string>();

  if (isStringArray(options.plugins)) {
    for (const plugin of options.plugins) {
      plugins.add(plugin);
    }
  }

  overrides.forEach((override, index) => {
    const files = Array.isArray(override.files) ? override.files : [override.files];
    if (files.length === 0 || files.some((glob) => glob.trim().length === 0)) {
      results.push({
        destination: "prettier",
        message: `Prettier override #${index + 1} has an empty files pattern.`,
        severity: "error",
      });
    }
    if (isStringArray(override.options.plugins)) {
      for (const plugin of override.options.plugins) {
        plugins.add(plugin);
      }
    }
  });

  for (const plugin of plugins) {
    if (!bundle.devDependencies.includes(plugin)) {
      results.push({
        destination: "prettier",
        message: `Prettier plugin "${plugin}" is not in devDependencies.`,
        severity: "error",
      });
    }
  }
  return results;
}

function checkScripts(bundle: ConfigBundle): CheckResult[] {
  const results: CheckResult[] = [];

  for (const name of REQUIRED_SCRIPTS) {
    if (bundle.scripts[name] === undefined) {
      results.push({
        destination: "package-scripts",
        message: `Script "${name}" is missing.`,
        severity: "error",
      });
    }
  }

  for (const [name, command] of Object.entries(bundle.scripts)) {
    const binary = command.trim().split(/\s+/)[0] ?? "";
    const provider = SCRIPT_BINARIES[binary];
    if (provider !== undefined && !bundle.devDependencies.includes(provider)) {
      results.push({
        destination: "package-scripts",
        message: `Script "${name}" runs ${binary}, but "${provider}" is not in devDependencies.`,
        severity: "warning",
      });
    }
  }
  return results;
}

/**
 * Checks that the documents of a bundle are valid and agree with each
 * other. Results come back grouped by check, in a stable order.
 */
export function checkBundle(
  bundle: ConfigBundle,
  config: CheckerConfig = {}
): CheckResult[] {
  const lintTargets = config.lintTargets ?? LINT_TARGET_SAMPLES;
  return [
    ...checkPlugins(bundle),
    ...checkBindings(bundle),
    ...checkIgnores(bundle, lintTargets),
    ...checkAliases(bundle),
    ...checkExtensions(bundle),
    ...checkDefaultFormatters(bundle),
    ...checkFormatter(bundle),
    ...checkScripts(bundle),
  ];
}

export function hasErrors(results: readonly CheckResult[]): boolean {
  return results.some((result) => result.severity === "error");
}
