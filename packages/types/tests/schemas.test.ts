import { describe, expect, test } from "vitest";

import {
  getStylepackSchema,
  lintEntrySchema,
  ruleEntrySchema,
  STYLEPACK_SCHEMA_IDS,
  stylepackProjectConfigSchema,
} from "../src/index";

describe("rule entries", () => {
  test("accepts severities and option tuples", () => {
    expect(ruleEntrySchema.safeParse("warn").success).toBe(true);
    expect(ruleEntrySchema.safeParse(2).success).toBe(true);
    expect(ruleEntrySchema.safeParse(["error", "always"]).success).toBe(true);
    expect(
      ruleEntrySchema.safeParse(["error", { allow: ["warn"] }]).success
    ).toBe(true);
  });

  test("rejects unknown severities", () => {
    expect(ruleEntrySchema.safeParse("fatal").success).toBe(false);
    expect(ruleEntrySchema.safeParse(3).success).toBe(false);
    expect(ruleEntrySchema.safeParse([]).success).toBe(false);
  });
});

describe("lint entries", () => {
  test("discriminates shared configs from rule sets", () => {
    const shared = lintEntrySchema.parse({
      kind: "shared",
      specifier: "@eslint/js",
      binding: "js",
      member: "configs.recommended",
    });
    expect(shared.kind).toBe("shared");

    const rules = lintEntrySchema.parse({
      kind: "rules",
      name: "project",
      rules: { eqeqeq: ["error", "always"] },
    });
    expect(rules.kind).toBe("rules");
  });

  test("requires a JavaScript identifier as binding", () => {
    const result = lintEntrySchema.safeParse({
      kind: "shared",
      specifier: "eslint-config-prettier",
      binding: "eslint-config-prettier",
    });

    expect(result.success).toBe(false);
  });
});

describe("project config schema", () => {
  test("accepts a typical configuration", () => {
    const result = stylepackProjectConfigSchema.safeParse({
      version: "0.3.0",
      preset: "vue",
      packageManager: "pnpm",
      destinations: { "editor-extensions": { enabled: false } },
      eslint: { rules: { "no-console": "off" }, ignores: ["public/**"] },
      aliases: { "~/*": "./src/*", "@/*": null },
    });

    expect(result.success).toBe(true);
  });

  test("rejects unknown top-level keys", () => {
    const result = stylepackProjectConfigSchema.safeParse({ presets: "vue" });

    expect(result.success).toBe(false);
  });

  test("rejects malformed versions", () => {
    const result = stylepackProjectConfigSchema.safeParse({ version: "v1" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe(
        "Must be a semantic version (e.g., 0.3.0)"
      );
    }
  });

  test("exposes JSON schemas with identifiers", () => {
    const schema = getStylepackSchema("projectConfig");

    expect(schema).toMatchObject({
      $id: STYLEPACK_SCHEMA_IDS.projectConfig,
      $schema: "https://json-schema.org/draft/2020-12/schema",
    });
  });
});
