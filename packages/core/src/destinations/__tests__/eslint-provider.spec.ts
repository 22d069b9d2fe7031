import { describe, expect, it } from "vitest";
import { bundleFor, createMockLogger } from "../../__tests__/helpers";
import { collectImports, EslintProvider, sharedConfigExpression } from "../eslint-provider";

const provider = new EslintProvider();

function renderLines(name: string, typescript = false): string[] {
  const { content } = provider.render({
    bundle: bundleFor(name, { typescript }),
    logger: createMockLogger(),
  });
  return content.split("\n");
}

describe("EslintProvider", () => {
  it("writes eslint.config.mjs and owns the whole file", () => {
    expect(provider.name).toBe("eslint");
    expect(provider.ownership).toBe("whole-file");
    expect(provider.defaultPath(bundleFor("base"))).toBe("eslint.config.mjs");
  });

  it("imports each shared config once, in first-use order", () => {
    const lines = renderLines("base", true);

    expect(lines.filter((line) => line.startsWith("import "))).toEqual([
      'import js from "@eslint/js";',
      'import tseslint from "typescript-eslint";',
      'import prettierConfig from "eslint-config-prettier";',
    ]);
  });

  it("lists entries in order with the ignore object last", () => {
    const lines = renderLines("base", true);
    const position = (line: string) => lines.indexOf(line);

    expect(lines[0]).toBe('// Generated by stylepack from the "base" preset.');
    expect(position("export default [")).toBeGreaterThan(0);
    expect(position("  js.configs.recommended,")).toBeGreaterThan(
      position("export default [")
    );
    expect(position("  ...tseslint.configs.recommended,")).toBeGreaterThan(
      position("  js.configs.recommended,")
    );
    expect(position('    "name": "language",')).toBeGreaterThan(
      position("  ...tseslint.configs.recommended,")
    );
    expect(position('    "name": "typescript",')).toBeGreaterThan(
      position('    "name": "project",')
    );
    expect(position("  prettierConfig,")).toBeGreaterThan(
      position('    "name": "typescript",')
    );
    expect(position('    "ignores": [')).toBeGreaterThan(position("  prettierConfig,"));
    expect(lines.slice(-3)).toEqual(["  },", "];", ""]);
  });

  it("renders rule-set objects as indented literals", () => {
    const lines = renderLines("base");
    const start = lines.indexOf('    "name": "language",');

    expect(lines.slice(start - 1, start + 7)).toEqual([
      "  {",
      '    "name": "language",',
      '    "languageOptions": {',
      '      "ecmaVersion": "latest",',
      '      "sourceType": "module"',
      "    }",
      "  },",
      "  {",
    ]);
  });

  it("renders the ignore patterns as the final element", () => {
    const lines = renderLines("base");
    const start = lines.indexOf('    "ignores": [');

    expect(lines.slice(start - 1)).toEqual([
      "  {",
      '    "ignores": [',
      '      "dist/**",',
      '      "build/**",',
      '      "coverage/**",',
      '      "node_modules/**"',
      "    ]",
      "  },",
      "];",
      "",
    ]);
  });

  it("leaves TypeScript entries out of a JavaScript project", () => {
    const lines = renderLines("base", false);

    expect(lines.some((line) => line.includes("tseslint"))).toBe(false);
  });

  it("spreads bracketed members without a dot", () => {
    const lines = renderLines("svelte");

    expect(lines).toContain("  ...svelte.configs['flat/recommended'],");
    expect(lines).toContain("  ...svelte.configs['flat/prettier'],");
    expect(lines.filter((line) => line.startsWith("import svelte"))).toEqual([
      'import svelte from "eslint-plugin-svelte";',
    ]);
  });
});

describe("sharedConfigExpression", () => {
  it("uses the bare binding when there is no member", () => {
    expect(
      sharedConfigExpression({
        kind: "shared",
        specifier: "eslint-config-prettier",
        binding: "prettierConfig",
      })
    ).toBe("prettierConfig");
  });
});

describe("collectImports", () => {
  it("keeps one import per binding and specifier", () => {
    const imports = collectImports(bundleFor("svelte").lint.entries);

    expect(imports).toEqual([
      { binding: "js", specifier: "@eslint/js" },
      { binding: "svelte", specifier: "eslint-plugin-svelte" },
      { binding: "prettierConfig", specifier: "eslint-config-prettier" },
    ]);
  });
});
