/**
 * Copy-based file deployer
 */

import { copyFile, mkdir, rm } from "node:fs/promises";
import * as path from "node:path";
import type { FileDeployer } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { logger } from "../../utils/logger";
import { ChecksumMismatchError, DeploymentIOError, errorMessage } from "../errors";
import type { ArchiveStore } from "./archive-store";

/**
 * Archives any existing destination, copies the source over it and checks the
 * destination hash. A failed copy or check restores the destination before
 * the error is thrown.
 */
export class CopyFileDeployer implements FileDeployer {
  constructor(private readonly archives: ArchiveStore) {}

  async deploy(sourcePath: string, destinationPath: string, expectedChecksum?: string | null): Promise<boolean> {
    await mkdir(path.dirname(destinationPath), { recursive: true });
    const archived = await this.archives.archive(destinationPath);

    try {
      await copyFile(sourcePath, destinationPath);
    } catch (err) {
      await this.undo(destinationPath, archived);
      throw new DeploymentIOError(`Failed to copy ${sourcePath} to ${destinationPath}: ${errorMessage(err)}`, destinationPath, {
        cause: err,
      });
    }

    const expected = expectedChecksum ?? (await computeFileChecksum(sourcePath));
    const actual = await computeFileChecksum(destinationPath);

    if (actual !== expected) {
      await this.undo(destinationPath, archived);
      throw new ChecksumMismatchError(destinationPath, expected, actual);
    }

    logger.debug(`Copied ${sourcePath} -> ${destinationPath}`, { checksum: actual });
    return true;
  }

  /**
   * Put back the version archived by this call, or remove the destination
   * when there was nothing there before.
   */
  private async undo(destinationPath: string, archived: string | null): Promise<void> {
    if (archived === null) {
      await rm(destinationPath, { force: true });
      logger.debug(`Removed ${destinationPath} after failed deploy`);
      return;
    }
    await this.archives.restoreLatest(destinationPath);
  }
}
