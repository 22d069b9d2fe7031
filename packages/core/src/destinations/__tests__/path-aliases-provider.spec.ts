import { parse } from "jsonc-parser";
import { describe, expect, it } from "vitest";
import { bundleFor, createMockLogger } from "../../__tests__/helpers";
import { PathAliasesProvider } from "../path-aliases-provider";

const provider = new PathAliasesProvider();

describe("PathAliasesProvider", () => {
  it("targets tsconfig.json or jsconfig.json", () => {
    expect(provider.defaultPath(bundleFor("base", { typescript: true }))).toBe(
      "tsconfig.json"
    );
    expect(provider.defaultPath(bundleFor("base", { typescript: false }))).toBe(
      "jsconfig.json"
    );
    expect(provider.ownership).toBe("merge");
  });

  it("creates compilerOptions.paths for a new file", () => {
    const { content, conflicts } = provider.render({
      bundle: bundleFor("base"),
      logger: createMockLogger(),
    });

    expect(conflicts).toEqual([]);
    expect(content).toBe(
      '{\n  "compilerOptions": {\n    "paths": {\n      "@/*": [\n        "./src/*"\n      ]\n    }\n  }\n}\n'
    );
  });

  it("keeps other keys of an existing JSONC tsconfig", () => {
    const existing = `{
  // project settings
  "extends": "./tsconfig.base.json",
  "compilerOptions": {
    "strict": true,
    "paths": { "#lib/*": ["./lib/*"] },
  },
  "include": ["src"],
}`;

    const { content, conflicts } = provider.render({
      bundle: bundleFor("base", { typescript: true }),
      existing,
      logger: createMockLogger(),
    });

    expect(conflicts).toEqual([]);
    expect(content).toContain("// project settings");
    expect(parse(content, [], { allowTrailingComma: true })).toEqual({
      extends: "./tsconfig.base.json",
      compilerOptions: {
        strict: true,
        paths: { "#lib/*": ["./lib/*"], "@/*": ["./src/*"] },
      },
      include: ["src"],
    });
  });

  it("edits a commented tsconfig in place", () => {
    const existing = [
      "{",
      "  // keep me",
      '  "compilerOptions": {',
      '    "strict": true /* strict */',
      "  }",
      "}",
      "",
    ].join("\n");
    const logger = createMockLogger();

    const { content } = provider.render({
      bundle: bundleFor("base", { typescript: true }),
      existing,
      logger,
    });

    expect(content.startsWith('{\n  // keep me\n  "compilerOptions": {\n')).toBe(true);
    expect(content).toContain("/* strict */");
    expect(parse(content)).toEqual({
      compilerOptions: { strict: true, paths: { "@/*": ["./src/*"] } },
    });
    expect(logger.debug).toHaveBeenCalledWith('Set compilerOptions.paths["@/*"]', {
      destination: "path-aliases",
      path: "tsconfig.json",
    });
  });

  it("returns an up-to-date file unchanged", () => {
    const existing = '{\n  // aliases\n  "compilerOptions": { "paths": { "@/*": ["./src/*"] } }\n}';
    const logger = createMockLogger();

    const { content } = provider.render({
      bundle: bundleFor("base", { typescript: true }),
      existing,
      logger,
    });

    expect(content).toBe(existing);
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it("keeps a differing mapping unless forced", () => {
    const existing = JSON.stringify({
      compilerOptions: { paths: { "@/*": ["./app/*"] } },
    });
    const bundle = bundleFor("base", { typescript: true });

    const kept = provider.render({ bundle, existing, logger: createMockLogger() });
    expect(JSON.parse(kept.content).compilerOptions.paths).toEqual({
      "@/*": ["./app/*"],
    });
    expect(kept.conflicts).toEqual([
      'Alias "@/*" is mapped to ["./app/*"] in tsconfig.json; kept (use --force to map it to "./src/*")',
    ]);

    const forced = provider.render({
      bundle,
      existing,
      force: true,
      logger: createMockLogger(),
    });
    expect(JSON.parse(forced.content).compilerOptions.paths).toEqual({
      "@/*": ["./src/*"],
    });
    expect(forced.conflicts).toEqual([]);
  });

  it("reports a baseUrl other than the project root", () => {
    const { conflicts } = provider.render({
      bundle: bundleFor("base", { typescript: true }),
      existing: '{ "compilerOptions": { "baseUrl": "src" } }',
      logger: createMockLogger(),
    });

    expect(conflicts).toEqual([
      'compilerOptions.baseUrl is "src" in tsconfig.json; alias targets resolve relative to it',
    ]);
  });

  it("rejects a file that does not parse", () => {
    let caught: unknown;
    try {
      provider.render({
        bundle: bundleFor("base", { typescript: true }),
        existing: "{ compilerOptions: ",
        logger: createMockLogger(),
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({ code: "EXISTING_FILE_UNREADABLE" });
  });
});
