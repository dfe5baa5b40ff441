/**
 * tar.gz packing for backup artifacts
 */

import { readdir } from "node:fs/promises";
import * as path from "node:path";
import * as tar from "tar";
import { logger } from "../../utils/logger";

/**
 * Pack `parentDir/entryName` into `archivePath`, so the archive holds a
 * single root directory named `entryName`.
 */
export async function createTarGzip(
  parentDir: string,
  entryName: string,
  archivePath: string,
  compressionLevel: number,
): Promise<void> {
  logger.debug(`Creating tar.gz archive with compression level ${compressionLevel}`);
  await tar.create({ gzip: { level: compressionLevel }, file: archivePath, cwd: parentDir, portable: true }, [
    entryName,
  ]);
}

export async function extractTarGzip(
  archivePath: string,
  targetDir: string,
  filter?: (entryPath: string) => boolean,
): Promise<void> {
  await tar.extract({ file: archivePath, cwd: targetDir, filter });
}

/**
 * Directory holding an extracted backup: its single root directory when the
 * archive has one, otherwise the extraction directory itself.
 */
export async function locateExtractedRoot(extractDir: string): Promise<string> {
  const entries = await readdir(extractDir, { withFileTypes: true });
  const [only] = entries;
  if (entries.length === 1 && only?.isDirectory()) {
    return path.join(extractDir, only.name);
  }
  return extractDir;
}

export function normalizeEntryPath(entryPath: string): string {
  return entryPath.replace(/^\.\//, "").replace(/\/+$/, "");
}
