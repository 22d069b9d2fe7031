/**
 * Shared type definitions for the stylepack toolchain.
 *
 * The config bundle model lives here so the core library, the CLI and any
 * third-party destination can agree on the shape of each document without
 * depending on the core bundle.
 */

import type { JsonValue as JsonValueType } from "type-fest";
import { z } from "zod";
import { type JsonSchema7Type, zodToJsonSchema } from "zod-to-json-schema";

export type JsonValue = JsonValueType;

export type StylepackVersionTag =
  | `${number}.${number}.${number}`
  | `${number}.${number}.${number}-${string}`;

export const STYLEPACK_VERSION_TAG: StylepackVersionTag = "0.3.0";

export type ResultOk<TValue> = {
  readonly ok: true;
  readonly value: TValue;
};

export type ResultErr<TError = StylepackError> = {
  readonly ok: false;
  readonly error: TError;
};

export type Result<TValue, TError = StylepackError> =
  | ResultOk<TValue>
  | ResultErr<TError>;

export const createResultOk = <TValue>(value: TValue): ResultOk<TValue> => ({
  ok: true as const,
  value,
});

export const createResultErr = <TError>(error: TError): ResultErr<TError> => ({
  ok: false as const,
  error,
});

export const isResultErr = <TValue, TError>(
  result: Result<TValue, TError>
): result is ResultErr<TError> => result.ok === false;

export const STYLEPACK_ERROR_CODES = [
  "PROJECT_CONFIG_NOT_FOUND",
  "PROJECT_CONFIG_INVALID",
  "PROJECT_CONFIG_EXISTS",
  "PRESET_UNKNOWN",
  "DESTINATION_UNKNOWN",
  "PATH_OUTSIDE_PROJECT",
  "EXISTING_FILE_UNREADABLE",
  "LOCK_TIMEOUT",
] as const;

export type StylepackErrorCode = (typeof STYLEPACK_ERROR_CODES)[number];

export type StylepackErrorInput<TDetails = JsonValue> = {
  readonly code: StylepackErrorCode;
  readonly message: string;
  readonly details?: TDetails;
  readonly help?: string;
  readonly cause?: unknown;
};

/**
 * Error raised by stylepack operations. Extends `Error` so stacks survive
 * through pino and the CLI, while `code` stays machine-readable.
 */
export class StylepackError<TDetails = JsonValue> extends Error {
  readonly code: StylepackErrorCode;
  readonly details?: TDetails;
  readonly help?: string;

  constructor(input: StylepackErrorInput<TDetails>) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "StylepackError";
    this.code = input.code;
    if (input.details !== undefined) {
      this.details = input.details;
    }
    if (input.help !== undefined) {
      this.help = input.help;
    }
  }
}

export const createStylepackError = <TDetails = JsonValue>(
  input: StylepackErrorInput<TDetails>
): StylepackError<TDetails> => new StylepackError(input);

export const isStylepackError = (value: unknown): value is StylepackError =>
  value instanceof StylepackError;

// ---------------------------------------------------------------------------
// Config bundle documents
// ---------------------------------------------------------------------------

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const stringArraySchema = z.array(z.string());

export const ruleSeveritySchema = z.union([
  z.enum(["off", "warn", "error"]),
  z.literal(0),
  z.literal(1),
  z.literal(2),
]);

export const ruleEntrySchema = z.union([
  ruleSeveritySchema,
  z.tuple([ruleSeveritySchema]).rest(jsonValueSchema),
]);

export const sharedConfigEntrySchema = z.object({
  kind: z.literal("shared"),
  /** npm specifier the config is imported from, e.g. `@eslint/js`. */
  specifier: z.string().min(1),
  /** Local binding the default export is imported as. */
  binding: z.string().regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, {
    message: "Must be a valid JavaScript identifier",
  }),
  /** Member path read off the binding, e.g. `configs.recommended`. */
  member: z.string().min(1).optional(),
  /** Spread the value into the config array (`...binding.member`). */
  spread: z.boolean().optional(),
  /** Plugin prefixes whose rules this config makes available. */
  plugins: stringArraySchema.optional(),
  /** npm packages the config needs installed. */
  packages: stringArraySchema.optional(),
  typescriptOnly: z.boolean().optional(),
});

export const ruleSetEntrySchema = z.object({
  kind: z.literal("rules"),
  name: z.string().min(1),
  files: stringArraySchema.optional(),
  rules: z.record(ruleEntrySchema),
  settings: z.record(jsonValueSchema).optional(),
  languageOptions: z.record(jsonValueSchema).optional(),
  typescriptOnly: z.boolean().optional(),
});

export const lintEntrySchema = z.discriminatedUnion("kind", [
  sharedConfigEntrySchema,
  ruleSetEntrySchema,
]);

export const ignoreEntrySchema = z.object({
  kind: z.literal("ignores"),
  patterns: stringArraySchema,
});

export const formatterOverrideSchema = z.object({
  files: z.union([z.string(), stringArraySchema]),
  excludeFiles: z.union([z.string(), stringArraySchema]).optional(),
  options: z.record(jsonValueSchema),
});

export const extensionRecommendationsSchema = z.object({
  recommendations: stringArraySchema,
  unwantedRecommendations: stringArraySchema,
});

export type RuleSeverity = z.infer<typeof ruleSeveritySchema>;
export type RuleEntry = z.infer<typeof ruleEntrySchema>;
export type SharedConfigEntry = z.infer<typeof sharedConfigEntrySchema>;
export type RuleSetEntry = z.infer<typeof ruleSetEntrySchema>;
export type LintEntry = z.infer<typeof lintEntrySchema>;
export type IgnoreEntry = z.infer<typeof ignoreEntrySchema>;
export type FormatterOverride = z.infer<typeof formatterOverrideSchema>;
export type ExtensionRecommendations = z.infer<
  typeof extensionRecommendationsSchema
>;

/** Ordered rule-set objects followed by exactly one ignore-pattern object. */
export type LintConfig = {
  entries: LintEntry[];
  ignores: IgnoreEntry;
};

export type FormatterConfig = {
  options: Record<string, JsonValue>;
  overrides: FormatterOverride[];
};

/** Alias pattern (e.g. `@/*`) to the path it resolves to (e.g. `./src/*`). */
export type PathAliasMap = Record<string, string>;

export type EditorSettings = Record<string, JsonValue>;

export const REQUIRED_SCRIPTS = [
  "lint",
  "lint:fix",
  "format",
  "format:check",
] as const;

export type RequiredScriptName = (typeof REQUIRED_SCRIPTS)[number];

export type ScriptMap = Record<string, string>;

export type ConfigBundle = {
  preset: string;
  typescript: boolean;
  lint: LintConfig;
  formatter: FormatterConfig;
  formatterIgnores: string[];
  aliases: PathAliasMap;
  editor: {
    settings: EditorSettings;
    extensions: ExtensionRecommendations;
  };
  scripts: ScriptMap;
  devDependencies: string[];
};

// ---------------------------------------------------------------------------
// Project configuration (.stylepack/config.*)
// ---------------------------------------------------------------------------

const SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

export const STYLEPACK_LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type StylepackLogLevel = (typeof STYLEPACK_LOG_LEVELS)[number];

export const PACKAGE_MANAGERS = ["npm", "yarn", "pnpm", "bun"] as const;

export type PackageManager = (typeof PACKAGE_MANAGERS)[number];

export const STYLEPACK_SCHEMA_BASE_URL = "https://stylepack.dev/schema" as const;

export const STYLEPACK_SCHEMA_IDS = {
  projectConfig: `${STYLEPACK_SCHEMA_BASE_URL}/project-config.json`,
  lintEntry: `${STYLEPACK_SCHEMA_BASE_URL}/lint-entry.json`,
  preset: `${STYLEPACK_SCHEMA_BASE_URL}/preset.json`,
} as const;

const JSON_SCHEMA_DRAFT_URL =
  "https://json-schema.org/draft/2020-12/schema" as const;

const attachSchemaMetadata = (schema: JsonSchema7Type, id: string): void => {
  Object.assign(schema, { $id: id, $schema: JSON_SCHEMA_DRAFT_URL });
};

const versionSchema = z.string().regex(SEMVER_PATTERN, {
  message: "Must be a semantic version (e.g., 0.3.0)",
});

const destinationSettingsSchema = z.object({
  enabled: z.boolean().optional(),
  path: z.string().min(1).optional(),
});

const projectEslintSchema = z.object({
  rules: z.record(ruleEntrySchema).optional(),
  ignores: stringArraySchema.optional(),
  entries: z.array(lintEntrySchema).optional(),
});

const projectPrettierSchema = z.object({
  options: z.record(jsonValueSchema).optional(),
  overrides: z.array(formatterOverrideSchema).optional(),
  ignores: stringArraySchema.optional(),
});

const projectEditorSchema = z.object({
  settings: z.record(jsonValueSchema).optional(),
  recommend: stringArraySchema.optional(),
  unwanted: stringArraySchema.optional(),
});

const projectLogSchema = z.object({
  level: z.enum(STYLEPACK_LOG_LEVELS).optional(),
  format: z.enum(["text", "json"]).optional(),
});

export const stylepackProjectConfigSchema = z
  .object({
    version: versionSchema.optional(),
    preset: z.string().min(1).optional(),
    typescript: z.boolean().optional(),
    packageManager: z.enum(PACKAGE_MANAGERS).optional(),
    destinations: z.record(destinationSettingsSchema).optional(),
    eslint: projectEslintSchema.optional(),
    prettier: projectPrettierSchema.optional(),
    aliases: z.record(z.string().min(1).nullable()).optional(),
    editor: projectEditorSchema.optional(),
    scripts: z.record(z.string().min(1)).optional(),
    devDependencies: stringArraySchema.optional(),
    log: projectLogSchema.optional(),
  })
  .strict();

const presetEslintSchema = z
  .object({
    entries: z.array(lintEntrySchema).optional(),
    /** Entries that must stay after the project rule set (formatter compat). */
    tail: z.array(lintEntrySchema).optional(),
    rules: z.record(ruleEntrySchema).optional(),
    ignores: stringArraySchema.optional(),
  })
  .strict();

export const presetDefinitionSchema = z
  .object({
    name: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, {
      message: "Must be kebab-case (e.g., react-app)",
    }),
    description: z.string().min(1).optional(),
    extends: z.string().min(1).optional(),
    eslint: presetEslintSchema.optional(),
    prettier: projectPrettierSchema.strict().optional(),
    aliases: z.record(z.string().min(1)).optional(),
    editor: projectEditorSchema.strict().optional(),
    scripts: z.record(z.string().min(1)).optional(),
    devDependencies: stringArraySchema.optional(),
  })
  .strict();

export type PresetDefinition = z.infer<typeof presetDefinitionSchema>;

export type StylepackDestinationSettings = z.infer<
  typeof destinationSettingsSchema
>;
export type StylepackProjectConfig = z.infer<
  typeof stylepackProjectConfigSchema
>;

export const stylepackProjectConfigJsonSchema: JsonSchema7Type =
  zodToJsonSchema(stylepackProjectConfigSchema, "StylepackProjectConfig");

export const lintEntryJsonSchema: JsonSchema7Type = zodToJsonSchema(
  lintEntrySchema,
  "LintEntry"
);

attachSchemaMetadata(
  stylepackProjectConfigJsonSchema,
  STYLEPACK_SCHEMA_IDS.projectConfig
);

export const presetDefinitionJsonSchema: JsonSchema7Type = zodToJsonSchema(
  presetDefinitionSchema,
  "PresetDefinition"
);

attachSchemaMetadata(lintEntryJsonSchema, STYLEPACK_SCHEMA_IDS.lintEntry);
attachSchemaMetadata(presetDefinitionJsonSchema, STYLEPACK_SCHEMA_IDS.preset);

export const STYLEPACK_SCHEMAS = {
  projectConfig: stylepackProjectConfigJsonSchema,
  lintEntry: lintEntryJsonSchema,
  preset: presetDefinitionJsonSchema,
} as const;

export type StylepackSchemaName = keyof typeof STYLEPACK_SCHEMAS;

export const getStylepackSchema = (name: StylepackSchemaName): JsonSchema7Type =>
  STYLEPACK_SCHEMAS[name];
