/**
 * Per-file archive of previous destination versions.
 *
 * Before a destination is overwritten its bytes are copied into a hidden
 * directory beside it as `<fileName>.<tag>`. Restoring consumes the newest
 * entry, so every restore undoes exactly one generation; restoring a path with
 * no entry left deletes the file.
 */

import { copyFile, mkdir, readdir, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import type { FileRestorer } from "../../types";
import { logger } from "../../utils/logger";
import { ARCHIVE_TAG_PATTERN, nextArchiveTag } from "../../utils/naming";
import { isNotFoundError } from "../../utils/path";

export const DEFAULT_ARCHIVE_DIR = ".archive";

export type RestoreOutcome = "restored" | "removed" | "absent";

export interface ArchiveEntry {
  path: string;
  tag: string;
}

export interface ArchiveStoreOptions {
  dirName?: string;
  now?: () => Date;
}

export class ArchiveStore implements FileRestorer {
  private readonly dirName: string;
  private readonly now: () => Date;

  constructor(options: ArchiveStoreOptions = {}) {
    this.dirName = options.dirName ?? DEFAULT_ARCHIVE_DIR;
    this.now = options.now ?? (() => new Date());
  }

  getArchiveDir(filePath: string): string {
    return path.join(path.dirname(path.resolve(filePath)), this.dirName);
  }

  /**
   * Copy the current file into the archive. Returns null when there is
   * nothing at `filePath` to keep.
   */
  async archive(filePath: string): Promise<string | null> {
    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) return null;
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }

    const archiveDir = this.getArchiveDir(filePath);
    await mkdir(archiveDir, { recursive: true });

    const existing = await this.listEntries(filePath);
    const tag = nextArchiveTag(
      this.now(),
      existing.map((entry) => entry.tag),
    );
    const archivedPath = path.join(archiveDir, `${path.basename(filePath)}.${tag}`);

    await copyFile(filePath, archivedPath);
    logger.debug(`Archived ${filePath} -> ${archivedPath}`);
    return archivedPath;
  }

  /**
   * Archived versions of `filePath`, oldest first
   */
  async listEntries(filePath: string): Promise<ArchiveEntry[]> {
    const archiveDir = this.getArchiveDir(filePath);
    const prefix = `${path.basename(filePath)}.`;

    let names: string[];
    try {
      names = await readdir(archiveDir);
    } catch (err) {
      if (isNotFoundError(err)) return [];
      throw err;
    }

    return names
      .filter((name) => name.startsWith(prefix) && ARCHIVE_TAG_PATTERN.test(name.slice(prefix.length)))
      .map((name) => ({ path: path.join(archiveDir, name), tag: name.slice(prefix.length) }))
      .sort((a, b) => (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0));
  }

  /**
   * Put the newest archived version back and consume it, or delete the file
   * when no version was archived.
   */
  async restoreLatest(filePath: string): Promise<RestoreOutcome> {
    const latest = (await this.listEntries(filePath)).at(-1);

    if (latest) {
      await copyFile(latest.path, filePath);
      await rm(latest.path);
      logger.info(`Restored ${filePath} from archive ${latest.tag}`);
      return "restored";
    }

    try {
      await rm(filePath);
    } catch (err) {
      if (isNotFoundError(err)) return "absent";
      throw err;
    }
    logger.info(`Removed ${filePath} (no archived version)`);
    return "removed";
  }

  async restore(destinationPath: string): Promise<boolean> {
    await this.restoreLatest(destinationPath);
    return true;
  }
}
