import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileLock, withFileLock } from "../file-lock";

describe("FileLock", () => {
  let dir: string;
  let target: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), "stylepack-lock-"));
    target = join(dir, "settings.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("holds the lock until it is released", async () => {
    const first = new FileLock(target);
    const second = new FileLock(target);

    await expect(first.acquire()).resolves.toBe(true);
    await expect(second.acquire(250)).resolves.toBe(false);

    await first.release();
    await expect(second.acquire(250)).resolves.toBe(true);
    await second.release();
  });

  it("takes over a stale lock", async () => {
    const lockPath = `${target}.lock`;
    await fs.writeFile(lockPath, JSON.stringify({ pid: 0, timestamp: 0 }));
    const longAgo = new Date(Date.now() - 60_000);
    await fs.utimes(lockPath, longAgo, longAgo);

    const lock = new FileLock(target);

    await expect(lock.acquire(250)).resolves.toBe(true);
    await lock.release();
  });

  it("treats releasing a missing lock as done", async () => {
    await expect(new FileLock(target).release()).resolves.toBeUndefined();
  });
});

describe("withFileLock", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), "stylepack-lock-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns the callback result and removes the lock file", async () => {
    const target = join(dir, "package.json");

    const result = await withFileLock(target, async () => "done");

    expect(result).toBe("done");
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  it("releases the lock when the callback throws", async () => {
    const target = join(dir, "package.json");

    await expect(
      withFileLock(target, async () => {
        throw new Error("write failed");
      })
    ).rejects.toThrow("write failed");
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });
});
