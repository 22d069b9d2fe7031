import { describe, expect, it } from "vitest";
import { bundleFor, createMockLogger } from "../../__tests__/helpers";
import { PackageScriptsProvider } from "../package-scripts-provider";

const provider = new PackageScriptsProvider();

describe("PackageScriptsProvider", () => {
  it("adds the four scripts and keeps the rest of package.json in order", () => {
    const existing = JSON.stringify({
      name: "demo-app",
      version: "1.0.0",
      scripts: { build: "vite build" },
      devDependencies: { vite: "^5.0.0" },
    });

    const { content, conflicts } = provider.render({
      bundle: bundleFor("base"),
      existing,
      logger: createMockLogger(),
    });

    expect(conflicts).toEqual([]);
    const manifest = JSON.parse(content);
    expect(Object.keys(manifest)).toEqual([
      "name",
      "version",
      "scripts",
      "devDependencies",
    ]);
    expect(manifest.scripts).toEqual({
      build: "vite build",
      lint: "eslint .",
      "lint:fix": "eslint . --fix",
      format: "prettier --write .",
      "format:check": "prettier --check .",
    });
  });

  it("keeps a differing script unless forced", () => {
    const existing = JSON.stringify({ scripts: { lint: "next lint" } });
    const bundle = bundleFor("base");

    const kept = provider.render({ bundle, existing, logger: createMockLogger() });
    expect(JSON.parse(kept.content).scripts.lint).toBe("next lint");
    expect(kept.conflicts).toEqual([
      'Script "lint" is "next lint"; kept (use --force to replace it with "eslint .")',
    ]);

    const forced = provider.render({
      bundle,
      existing,
      force: true,
      logger: createMockLogger(),
    });
    expect(JSON.parse(forced.content).scripts.lint).toBe("eslint .");
    expect(forced.conflicts).toEqual([]);
  });

  it("creates a minimal package.json when none exists", () => {
    const { content } = provider.render({
      bundle: bundleFor("base"),
      logger: createMockLogger(),
    });

    expect(Object.keys(JSON.parse(content))).toEqual(["scripts"]);
  });
});
