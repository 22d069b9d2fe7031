import { promises as fs } from "node:fs";
import { createStylepackError } from "@stylepack/types";
import { RESOURCE_LIMITS } from "../config/limits";

const { fileLock: limits } = RESOURCE_LIMITS;

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

export class FileLock {
  private readonly lockPath: string;

  constructor(filePath: string) {
    this.lockPath = `${filePath}.lock`;
  }

  /**
   * Acquire a lock for the file
   * @param timeout Maximum time to wait for the lock (ms)
   * @returns true if lock acquired, false if timeout
   */
  async acquire(timeout: number = limits.timeout): Promise<boolean> {
    const startTime = Date.now();

    while (Date.now() - startTime < timeout) {
      try {
        // Exclusive create fails with EEXIST while another writer holds it
        const fd = await fs.open(this.lockPath, "wx");
        await fd.write(
          JSON.stringify({
            pid: process.pid,
            timestamp: Date.now(),
          })
        );
        await fd.close();
        return true;
      } catch (error: unknown) {
        if (!isErrnoException(error) || error.code !== "EEXIST") {
          throw error;
        }
        if (await this.isLockStale()) {
          await this.release();
          continue;
        }
        await new Promise((resolve) => setTimeout(resolve, limits.retryDelay));
      }
    }
    return false;
  }

  /**
   * Release the lock. A lock file that is already gone counts as released.
   */
  async release(): Promise<void> {
    try {
      await fs.unlink(this.lockPath);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "ENOENT") {
        throw error;
      }
    }
  }

  /**
   * A lock older than the stale threshold belongs to a crashed writer.
   */
  private async isLockStale(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.lockPath);
      const age = Date.now() - stat.mtime.getTime();
      return age > limits.staleThreshold;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return true;
      }
      throw error;
    }
  }
}

/**
 * Execute a function with file locking
 * @param filePath The file to lock
 * @param fn The function to execute
 * @returns The result of the function
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => Promise<T>
): Promise<T> {
  const lock = new FileLock(filePath);

  const acquired = await lock.acquire();
  if (!acquired) {
    throw createStylepackError({
      code: "LOCK_TIMEOUT",
      message: `Failed to acquire lock for ${filePath}`,
      help: `Remove ${filePath}.lock if no other stylepack process is running.`,
    });
  }

  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
