import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { bundleFor, createMockLogger } from "../../__tests__/helpers";
import type { Logger } from "../../interfaces";
import { ApplyManager, hashContent } from "../apply-manager";

const DEFAULT_FILES = [
  "eslint.config.mjs",
  ".prettierrc.json",
  ".prettierignore",
  "jsconfig.json",
  ".vscode/settings.json",
  ".vscode/extensions.json",
  "package.json",
];

describe("ApplyManager", () => {
  let projectDir: string;
  let logger: Logger;
  let manager: ApplyManager;

  beforeEach(async () => {
    projectDir = await fs.mkdtemp(join(tmpdir(), "stylepack-apply-"));
    logger = createMockLogger();
    manager = new ApplyManager(projectDir, { logger });
  });

  afterEach(async () => {
    await fs.rm(projectDir, { recursive: true, force: true });
  });

  describe("plan", () => {
    it("plans every destination as a new file in an empty project", async () => {
      const changes = await manager.plan(bundleFor("base"));

      expect(changes.map((change) => change.relativePath)).toEqual(DEFAULT_FILES);
      expect(changes.every((change) => change.action === "create")).toBe(true);
      expect(changes[0]?.path).toBe(join(projectDir, "eslint.config.mjs"));
    });

    it("limits the plan to the requested destinations", async () => {
      const changes = await manager.plan(bundleFor("base"), {
        only: ["prettier-ignore", "prettier"],
      });

      expect(changes.map((change) => change.destination)).toEqual([
        "prettier",
        "prettier-ignore",
      ]);
    });

    it("honours disabled destinations and custom paths from config", async () => {
      const configured = new ApplyManager(projectDir, {
        logger,
        destinations: {
          "editor-settings": { enabled: false },
          "editor-extensions": { enabled: false },
          prettier: { path: "config/prettier.json" },
        },
      });

      const changes = await configured.plan(bundleFor("base"));

      expect(changes.map((change) => change.relativePath)).toEqual([
        "eslint.config.mjs",
        "config/prettier.json",
        ".prettierignore",
        "jsconfig.json",
        "package.json",
      ]);
    });

    it("rejects a destination path outside the project", async () => {
      const escaping = new ApplyManager(projectDir, {
        logger,
        destinations: { prettier: { path: "../outside.json" } },
      });

      await expect(escaping.plan(bundleFor("base"))).rejects.toMatchObject({
        code: "PATH_OUTSIDE_PROJECT",
      });
    });

    it("reports and logs values kept from existing files", async () => {
      await fs.writeFile(
        join(projectDir, "package.json"),
        JSON.stringify({ name: "demo", scripts: { lint: "next lint" } })
      );

      const [change] = await manager.plan(bundleFor("base"), {
        only: ["package-scripts"],
      });

      expect(change?.action).toBe("update");
      expect(change?.conflicts).toEqual([
        'Script "lint" is "next lint"; kept (use --force to replace it with "eslint .")',
      ]);
      expect(logger.warn).toHaveBeenCalledWith(
        'Script "lint" is "next lint"; kept (use --force to replace it with "eslint .")',
        { destination: "package-scripts", path: "package.json" }
      );
    });
  });

  describe("apply", () => {
    it("writes every file and records their hashes", async () => {
      const bundle = bundleFor("base");

      const report = await manager.apply(bundle);

      expect(report.dryRun).toBe(false);
      expect(report.written).toEqual(DEFAULT_FILES);
      const settings = await fs.readFile(
        join(projectDir, ".vscode", "settings.json"),
        "utf8"
      );
      expect(JSON.parse(settings)["eslint.useFlatConfig"]).toBe(true);

      const record = await manager.loadRecord();
      expect(record?.preset).toBe("base");
      expect(Object.keys(record?.files ?? {})).toEqual(DEFAULT_FILES);
      expect(record?.files[".prettierignore"]).toEqual({
        destination: "prettier-ignore",
        hash: hashContent(
          await fs.readFile(join(projectDir, ".prettierignore"), "utf8")
        ),
      });
    });

    it("is idempotent", async () => {
      const bundle = bundleFor("react");
      await manager.apply(bundle);

      const second = await manager.apply(bundle);

      expect(second.written).toEqual([]);
      expect(second.changes.every((change) => change.action === "unchanged")).toBe(true);
    });

    it("writes nothing on a dry run", async () => {
      const report = await manager.apply(bundleFor("base"), { dryRun: true });

      expect(report.dryRun).toBe(true);
      expect(report.written).toEqual([]);
      expect(report.changes).toHaveLength(DEFAULT_FILES.length);
      await expect(fs.readdir(projectDir)).resolves.toEqual([]);
    });

    it("leaves no lock files behind", async () => {
      await manager.apply(bundleFor("base"));

      const vscode = await fs.readdir(join(projectDir, ".vscode"));
      expect(vscode.sort()).toEqual(["extensions.json", "settings.json"]);
      const stylepack = await fs.readdir(join(projectDir, ".stylepack"));
      expect(stylepack).toEqual(["applied.json"]);
    });
  });

  describe("status", () => {
    it("reports missing files before the first apply", async () => {
      const drift = await manager.status(bundleFor("base"));

      expect(drift.every((entry) => entry.state === "missing")).toBe(true);
      expect(drift.every((entry) => !entry.editedSinceApply)).toBe(true);
    });

    it("tracks edits made after an apply", async () => {
      const bundle = bundleFor("base");
      await manager.apply(bundle);
      await fs.writeFile(join(projectDir, ".prettierrc.json"), "{}\n");
      await fs.rm(join(projectDir, ".prettierignore"));

      const drift = await manager.status(bundle);
      const byPath = new Map(drift.map((entry) => [entry.relativePath, entry]));

      expect(byPath.get("eslint.config.mjs")).toMatchObject({
        state: "in-sync",
        editedSinceApply: false,
      });
      expect(byPath.get(".prettierrc.json")).toMatchObject({
        state: "modified",
        editedSinceApply: true,
      });
      expect(byPath.get(".prettierignore")).toMatchObject({
        state: "missing",
        editedSinceApply: false,
      });
    });

    it("ignores a malformed apply record", async () => {
      await fs.mkdir(join(projectDir, ".stylepack"));
      await fs.writeFile(join(projectDir, ".stylepack", "applied.json"), "not json");

      await expect(manager.loadRecord()).resolves.toBeUndefined();
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });
});

describe("hashContent", () => {
  it("returns the sha256 hex digest", () => {
    expect(hashContent("")).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
    );
  });
});
