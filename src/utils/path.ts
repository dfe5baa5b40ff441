/**
 * Path validation and manipulation utilities
 */

import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return normalizedPath.startsWith(normalizedDir + path.sep) || normalizedPath === normalizedDir;
}

/**
 * Convert a relative path to the `/`-separated form used in checksums and archives
 */
export function toPosixPath(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

/**
 * Name of the directory a project lives in, safe for use in file names
 */
export function getProjectName(projectPath: string): string {
  const base = path.basename(path.resolve(projectPath));
  const safe = base.replace(/[^A-Za-z0-9._-]+/g, "-").replace(/^-+|-+$/g, "");
  return safe || "project";
}

export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value;
}

export function isNotFoundError(value: unknown): boolean {
  return isErrnoException(value) && value.code === "ENOENT";
}
