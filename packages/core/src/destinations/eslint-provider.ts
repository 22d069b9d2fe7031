import type { ConfigBundle, LintEntry, SharedConfigEntry } from "@stylepack/types";
import Handlebars from "handlebars";
import type { DestinationId } from "../config/limits";
import type {
  DestinationOwnership,
  DestinationProvider,
  DestinationRenderContext,
  DestinationRenderResult,
} from "../interfaces";
import type { JsonRecord } from "../utils/json";

type EslintTemplateContext = {
  preset: string;
  imports: Array<{ binding: string; specifier: string }>;
  elements: string[];
};

const ESLINT_CONFIG_TEMPLATE = `// Generated by stylepack from the "{{preset}}" preset.
// Change .stylepack/config.yaml and run \`stylepack apply\` rather than editing this file.
{{#each imports}}
import {{binding}} from "{{specifier}}";
{{/each}}

export default [
{{#each elements}}
  {{{this}}},
{{/each}}
];
`;

const renderTemplate = Handlebars.compile<EslintTemplateContext>(
  ESLINT_CONFIG_TEMPLATE,
  { noEscape: true, strict: true }
);

/** Renders an object literal indented to sit inside the exported array. */
function objectLiteral(value: JsonRecord): string {
  return JSON.stringify(value, null, 2).split("\n").join("\n  ");
}

export function sharedConfigExpression(entry: SharedConfigEntry): string {
  const spread = entry.spread ? "..." : "";
  if (!entry.member) {
    return `${spread}${entry.binding}`;
  }
  const separator = entry.member.startsWith("[") ? "" : ".";
  return `${spread}${entry.binding}${separator}${entry.member}`;
}

function entryExpression(entry: LintEntry): string {
  if (entry.kind === "shared") {
    return sharedConfigExpression(entry);
  }
  const literal: JsonRecord = { name: entry.name };
  if (entry.files && entry.files.length > 0) {
    literal.files = entry.files;
  }
  if (entry.languageOptions) {
    literal.languageOptions = entry.languageOptions;
  }
  if (entry.settings) {
    literal.settings = entry.settings;
  }
  if (Object.keys(entry.rules).length > 0) {
    literal.rules = entry.rules;
  }
  return objectLiteral(literal);
}

/** Distinct `import` statements in first-use order. */
export function collectImports(
  entries: readonly LintEntry[]
): Array<{ binding: string; specifier: string }> {
  const seen = new Set<string>();
  const imports: Array<{ binding: string; specifier: string }> = [];
  for (const entry of entries) {
    if (entry.kind !== "shared") {
      continue;
    }
    const key = `${entry.binding}\u0000${entry.specifier}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    imports.push({ binding: entry.binding, specifier: entry.specifier });
  }
  return imports;
}

/**
 * ESLint flat config: the lint entries in order, then the single global
 * ignore object.
 */
export class EslintProvider implements DestinationProvider {
  get name(): DestinationId {
    return "eslint";
  }

  get description(): string {
    return "ESLint flat config (eslint.config.mjs)";
  }

  get ownership(): DestinationOwnership {
    return "whole-file";
  }

  defaultPath(_bundle: ConfigBundle): string {
    return "eslint.config.mjs";
  }

  render({ bundle }: DestinationRenderContext): DestinationRenderResult {
    const { entries, ignores } = bundle.lint;
    const elements = entries.map(entryExpression);
    elements.push(objectLiteral({ ignores: ignores.patterns }));

    return {
      content: renderTemplate({
        preset: bundle.preset,
        imports: collectImports(entries),
        elements,
      }),
      conflicts: [],
    };
  }
}
