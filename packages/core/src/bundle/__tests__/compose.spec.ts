import type { ConfigBundle } from "@stylepack/types";
import picomatch from "picomatch";
import { describe, expect, it } from "vitest";
import { builtinChain, bundleFor } from "../../__tests__/helpers";
import { composeBundle, mergeExtensions, PROJECT_RULE_SET } from "../compose";

const entryLabels = (bundle: ConfigBundle): string[] =>
  bundle.lint.entries.map((entry) =>
    entry.kind === "shared" ? entry.specifier : entry.name
  );

describe("composeBundle", () => {
  it("drops TypeScript-only entries from a JavaScript bundle", () => {
    const bundle = bundleFor("base", { typescript: false });

    expect(entryLabels(bundle)).toEqual([
      "@eslint/js",
      "language",
      PROJECT_RULE_SET,
      "eslint-config-prettier",
    ]);
    expect(bundle.typescript).toBe(false);
    expect(bundle.devDependencies).toEqual([
      "@eslint/js",
      "eslint",
      "eslint-config-prettier",
      "prettier",
    ]);
  });

  it("keeps TypeScript entries in order when TypeScript is on", () => {
    const bundle = bundleFor("base", { typescript: true });

    expect(entryLabels(bundle)).toEqual([
      "@eslint/js",
      "typescript-eslint",
      "language",
      PROJECT_RULE_SET,
      "typescript",
      "eslint-config-prettier",
    ]);
    expect(bundle.devDependencies).toContain("typescript-eslint");
  });

  it("lets the TypeScript rule set decide no-unused-vars for .ts files", () => {
    const bundle = bundleFor("base", { typescript: true });
    const appliesToTs = bundle.lint.entries.filter(
      (entry) =>
        entry.kind === "rules" &&
        "no-unused-vars" in entry.rules &&
        (entry.files === undefined || picomatch(entry.files)("src/index.ts"))
    );
    const last = appliesToTs.at(-1);

    expect(last?.kind === "rules" ? last.name : undefined).toBe("typescript");
    expect(last?.kind === "rules" ? last.rules["no-unused-vars"] : undefined).toBe("off");
  });

  it("ends with exactly one ignore object holding the patterns", () => {
    const bundle = bundleFor("svelte");

    expect(bundle.lint.ignores).toEqual({
      kind: "ignores",
      patterns: [
        "dist/**",
        "build/**",
        "coverage/**",
        "node_modules/**",
        ".svelte-kit/**",
      ],
    });
    expect(bundle.formatterIgnores).toEqual(bundle.lint.ignores.patterns);
  });

  it("keeps tail entries after the project rule set", () => {
    const bundle = bundleFor("svelte");

    expect(entryLabels(bundle)).toEqual([
      "@eslint/js",
      "language",
      "eslint-plugin-svelte",
      PROJECT_RULE_SET,
      "eslint-plugin-svelte",
      "eslint-config-prettier",
    ]);
  });

  it("nests a child preset's tail inside its parent's tail", () => {
    const bundle = bundleFor("svelte", { typescript: true });

    expect(entryLabels(bundle).slice(-4)).toEqual([
      PROJECT_RULE_SET,
      "eslint-plugin-svelte",
      "typescript",
      "eslint-config-prettier",
    ]);
  });

  it("unions editor validation languages and extension lists along the chain", () => {
    const bundle = bundleFor("vue");

    expect(bundle.preset).toBe("vue");
    expect(bundle.editor.settings["eslint.validate"]).toEqual([
      "javascript",
      "javascriptreact",
      "typescript",
      "typescriptreact",
      "vue",
    ]);
    expect(bundle.editor.extensions).toEqual({
      recommendations: [
        "dbaeumer.vscode-eslint",
        "esbenp.prettier-vscode",
        "Vue.volar",
      ],
      unwantedRecommendations: ["hookyqr.beautify", "octref.vetur"],
    });
  });

  it("applies project rules, aliases and formatter options last", () => {
    const bundle = bundleFor("svelte", {
      projectConfig: {
        eslint: {
          rules: { eqeqeq: "off", "no-debugger": "error" },
          ignores: ["generated/**"],
        },
        prettier: {
          options: { printWidth: 80, plugins: ["prettier-plugin-tailwindcss"] },
          overrides: [{ files: "*.md", options: { proseWrap: "never" } }],
          ignores: ["*.snap"],
        },
        aliases: { "@/*": null, "~/*": "./app/*" },
        scripts: { lint: "eslint . --cache" },
        devDependencies: ["prettier-plugin-tailwindcss"],
      },
    });

    const project = bundle.lint.entries.find(
      (entry) => entry.kind === "rules" && entry.name === PROJECT_RULE_SET
    );
    expect(project?.kind === "rules" ? project.rules : undefined).toEqual({
      "no-unused-vars": ["warn", { argsIgnorePattern: "^_" }],
      "prefer-const": "error",
      eqeqeq: "off",
      "no-console": ["warn", { allow: ["warn", "error"] }],
      "no-debugger": "error",
    });
    expect(bundle.aliases).toEqual({ "~/*": "./app/*" });
    expect(bundle.formatter.options.printWidth).toBe(80);
    expect(bundle.formatter.options.plugins).toEqual([
      "prettier-plugin-svelte",
      "prettier-plugin-tailwindcss",
    ]);
    expect(bundle.formatter.overrides).toEqual([
      { files: "*.md", options: { proseWrap: "never" } },
      { files: "*.json", options: { trailingComma: "none" } },
      { files: "*.svelte", options: { parser: "svelte" } },
    ]);
    expect(bundle.lint.ignores.patterns.at(-1)).toBe("generated/**");
    expect(bundle.formatterIgnores.slice(-2)).toEqual(["generated/**", "*.snap"]);
    expect(bundle.scripts.lint).toBe("eslint . --cache");
    expect(bundle.devDependencies).toContain("prettier-plugin-tailwindcss");
  });

  it("is deterministic for equal inputs", () => {
    const first = composeBundle({ presets: builtinChain("react"), typescript: true });
    const second = composeBundle({ presets: builtinChain("react"), typescript: true });

    expect(second).toEqual(first);
  });

  it("requires at least one preset", () => {
    expect(() => composeBundle({ presets: [], typescript: false })).toThrow(
      "Cannot compose a bundle without a preset"
    );
  });
});

describe("mergeExtensions", () => {
  it("moves an id between lists when a later fragment says so", () => {
    const merged = mergeExtensions(
      {
        recommendations: ["dbaeumer.vscode-eslint"],
        unwantedRecommendations: ["hookyqr.beautify"],
      },
      { recommend: ["hookyqr.beautify"], unwanted: ["dbaeumer.vscode-eslint"] }
    );

    expect(merged).toEqual({
      recommendations: ["hookyqr.beautify"],
      unwantedRecommendations: ["dbaeumer.vscode-eslint"],
    });
  });
});
