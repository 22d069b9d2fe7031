import { promises as fs } from "node:fs";
import { dirname, isAbsolute, relative, resolve } from "node:path";

const PACKAGE_NAME_MAX_LENGTH = 214;
const PACKAGE_NAME_PATTERN = /^(?:@[a-z0-9~-][a-z0-9._~-]*\/)?[a-z0-9~-][a-z0-9._~-]*$/;

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Real path of `target` with symlinks resolved. A path that does not exist
 * yet resolves through its nearest existing ancestor.
 */
async function realPathOf(target: string): Promise<string> {
  const absolute = resolve(target);
  let existing = absolute;
  for (;;) {
    try {
      return resolve(await fs.realpath(existing), relative(existing, absolute));
    } catch (error) {
      if (!isMissing(error)) {
        throw error;
      }
    }
    const parent = dirname(existing);
    if (parent === existing) {
      return absolute;
    }
    existing = parent;
  }
}

/**
 * Whether `target` stays inside `boundary` once symlinks on either side are
 * resolved. Destination paths from the project config pass through here
 * before anything is written.
 */
export async function isPathWithinBoundaryReal(
  target: string,
  boundary: string
): Promise<boolean> {
  const [realTarget, realBoundary] = await Promise.all([
    realPathOf(target),
    realPathOf(boundary),
  ]);
  const fromBoundary = relative(realBoundary, realTarget);
  return !(fromBoundary.startsWith("..") || isAbsolute(fromBoundary));
}

/** Lower-case npm name, optionally scoped, safe to put on a command line. */
export function isValidPackageName(name: string): boolean {
  return (
    name.length > 0 &&
    name.length <= PACKAGE_NAME_MAX_LENGTH &&
    !name.includes("..") &&
    PACKAGE_NAME_PATTERN.test(name)
  );
}

/** Drops NUL and line-break characters and surrounding whitespace. */
export function sanitizePath(filePath: string): string {
  return filePath.replace(/[\0\r\n]/g, "").trim();
}
