/**
 * File selection and staging for project backups
 */

import { copyFile, mkdir } from "node:fs/promises";
import * as path from "node:path";
import type { BackupType, CollectedFile } from "../../types";
import { listTreeFiles } from "../../utils/crypto";
import { logger } from "../../utils/logger";
import { isPathWithinDir, toPosixPath } from "../../utils/path";

export const CONFIG_PATTERNS = ["*.config", "*.ini", "*.yaml", "*.yml", "*.json", "*.xml", "*.conf", "config*.*"];

export interface CollectOptions {
  type: BackupType;
  excludeDir: string;
  partialExtensions: string[];
  /** Directories left out of every type's walk, such as the backup location itself */
  excludePaths?: string[];
  /** Explicit selection, absolute or relative to the project; wins for every type */
  files?: string[];
}

/**
 * `*` matches any run of characters. A pattern without one must match exactly.
 */
export function matchesPattern(fileName: string, pattern: string): boolean {
  if (!pattern.includes("*")) return fileName === pattern;

  const segments = pattern.split("*");
  const first = segments[0] ?? "";
  const last = segments[segments.length - 1] ?? "";

  if (fileName.length < first.length + last.length) return false;
  if (!fileName.startsWith(first) || !fileName.endsWith(last)) return false;

  let cursor = first.length;
  const end = fileName.length - last.length;
  for (const middle of segments.slice(1, -1)) {
    const index = fileName.indexOf(middle, cursor);
    if (index === -1 || index + middle.length > end) return false;
    cursor = index + middle.length;
  }
  return true;
}

export function isConfigFile(fileName: string): boolean {
  return CONFIG_PATTERNS.some((pattern) => matchesPattern(fileName, pattern));
}

function acceptsFile(fileName: string, options: CollectOptions): boolean {
  switch (options.type) {
    case "FULL":
      return !fileName.startsWith(".");
    case "CONFIG":
      return isConfigFile(fileName);
    case "PARTIAL":
      return options.partialExtensions.some((ext) => fileName.endsWith(ext));
  }
}

export async function collectFiles(projectPath: string, options: CollectOptions): Promise<CollectedFile[]> {
  const root = path.resolve(projectPath);

  if (options.files && options.files.length > 0) {
    return collectExplicitFiles(root, options.files);
  }

  const excludedDirs = (options.excludePaths ?? [])
    .map((dir) => path.resolve(dir))
    .filter((dir) => dir !== root && isPathWithinDir(dir, root))
    .map((dir) => toPosixPath(path.relative(root, dir)));

  const files = await listTreeFiles(root, {
    exclude: (relativePath) => {
      if (excludedDirs.some((dir) => relativePath.startsWith(`${dir}/`))) return true;
      const parts = relativePath.split("/");
      const fileName = parts.pop() ?? "";
      if (parts.some((dir) => dir.startsWith(".") || dir === options.excludeDir)) return true;
      return !acceptsFile(fileName, options);
    },
  });

  logger.debug(`Collected ${files.length} files from ${root} (${options.type})`);
  return files;
}

function collectExplicitFiles(root: string, files: string[]): CollectedFile[] {
  const collected: CollectedFile[] = [];

  for (const file of files) {
    const absolutePath = path.resolve(root, file);
    if (!isPathWithinDir(absolutePath, root) || absolutePath === root) {
      logger.warn(`Skipping file outside project: ${file}`);
      continue;
    }
    collected.push({ absolutePath, relativePath: toPosixPath(path.relative(root, absolutePath)) });
  }

  return collected;
}

/**
 * Copy files into `stagingDir` keeping their relative paths. Files that
 * cannot be read are skipped with a warning. Returns the number copied.
 */
export async function stageFiles(files: CollectedFile[], stagingDir: string): Promise<number> {
  await mkdir(stagingDir, { recursive: true });
  const dirsCreated = new Set<string>();
  let count = 0;

  for (const file of files) {
    const targetPath = path.join(stagingDir, ...file.relativePath.split("/"));
    const targetDir = path.dirname(targetPath);

    if (!dirsCreated.has(targetDir)) {
      await mkdir(targetDir, { recursive: true });
      dirsCreated.add(targetDir);
    }

    try {
      await copyFile(file.absolutePath, targetPath);
      count++;
    } catch (err) {
      logger.warn(`Failed to back up file ${file.absolutePath}`, err);
    }
  }

  return count;
}

/**
 * Copy every file under `sourceDir` into `targetDir`
 */
export async function copyTree(
  sourceDir: string,
  targetDir: string,
  exclude?: (relativePath: string) => boolean,
): Promise<number> {
  const files = await listTreeFiles(sourceDir, { exclude });
  for (const file of files) {
    const targetPath = path.join(targetDir, ...file.relativePath.split("/"));
    await mkdir(path.dirname(targetPath), { recursive: true });
    await copyFile(file.absolutePath, targetPath);
  }
  return files.length;
}
