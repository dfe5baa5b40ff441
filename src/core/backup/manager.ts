/**
 * Project snapshots: create, verify, restore and delete
 */

import { mkdir, mkdtemp, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  type DatabaseHandle,
  deleteBackupRecord,
  getBackupById,
  insertBackup,
  listBackupRecords,
  markBackupVerified,
} from "../../db";
import {
  BACKUP_TYPES,
  type BackupMetadata,
  type BackupRecord,
  type BackupResult,
  type BackupType,
  type CreateBackupOptions,
  type ListBackupsOptions,
} from "../../types";
import { computeTreeChecksum, computeTreeSize, generateUUID } from "../../utils/crypto";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { COMPRESSED_EXTENSION, generateBackupName } from "../../utils/naming";
import { getProjectName, isErrnoException, isNotFoundError, isPathWithinDir } from "../../utils/path";
import { ArgumentError, errorMessage, NotFoundError, VerificationError } from "../errors";
import { createTarGzip, extractTarGzip, locateExtractedRoot, normalizeEntryPath } from "./archive-creator";
import { collectFiles, copyTree, stageFiles } from "./file-collector";

export const METADATA_FILE = ".backup-metadata.json";

export interface BackupManagerOptions {
  location: string;
  /** Type used when a request names none */
  defaultType?: BackupType;
  compression?: boolean;
  compressionLevel?: number;
  excludeDir?: string;
  partialExtensions?: string[];
  /** Parent of staging and extraction directories */
  tmpDir?: string;
  now?: () => Date;
}

const isMetadataFile = (relativePath: string): boolean => relativePath === METADATA_FILE;

function isBackupType(value: string): value is BackupType {
  return BACKUP_TYPES.some((type) => type === value);
}

export class BackupManager {
  private readonly location: string;
  private readonly defaultType: BackupType;
  private readonly compression: boolean;
  private readonly compressionLevel: number;
  private readonly excludeDir: string;
  private readonly partialExtensions: string[];
  private readonly tmpDir: string;
  private readonly now: () => Date;

  constructor(
    private readonly database: DatabaseHandle,
    options: BackupManagerOptions,
  ) {
    this.location = path.resolve(options.location);
    this.defaultType = options.defaultType ?? "FULL";
    this.compression = options.compression ?? true;
    this.compressionLevel = options.compressionLevel ?? 6;
    this.excludeDir = options.excludeDir ?? ".Exclude";
    this.partialExtensions = options.partialExtensions ?? [".ts"];
    this.tmpDir = options.tmpDir ?? os.tmpdir();
    this.now = options.now ?? (() => new Date());
  }

  async createBackup(options: CreateBackupOptions): Promise<BackupResult> {
    const startTime = Date.now();
    const projectPath = path.resolve(options.projectPath);
    await assertDirectory(projectPath);

    const type = options.type ?? this.defaultType;
    if (!isBackupType(type)) {
      throw new ArgumentError(`Invalid backup type: ${type}`);
    }

    const backupId = generateUUID();
    const timestamp = this.now();
    const name = generateBackupName(projectPath, type, timestamp);

    const files = await collectFiles(projectPath, {
      type,
      excludeDir: this.excludeDir,
      excludePaths: [this.location, this.tmpDir],
      partialExtensions: this.partialExtensions,
      files: options.files,
    });
    logger.info(`Creating ${type} backup of ${projectPath} (${files.length} files)`);

    const stagingParent = await mkdtemp(path.join(this.tmpDir, "txdeploy-"));

    try {
      const stagingDir = path.join(stagingParent, name);
      const fileCount = await stageFiles(files, stagingDir);

      const metadata: BackupMetadata = {
        backupId,
        projectName: getProjectName(projectPath),
        projectPath,
        backupType: type,
        timestamp: timestamp.toISOString(),
        fileCount,
        userId: options.userId,
        description: options.description ?? null,
      };
      await writeMetadata(stagingDir, metadata);

      const sizeBytes = await computeTreeSize(stagingDir, { exclude: isMetadataFile });
      const checksum = await computeTreeChecksum(stagingDir, { exclude: isMetadataFile });
      await writeMetadata(stagingDir, { ...metadata, size: sizeBytes, checksum });

      await mkdir(this.location, { recursive: true });

      let storagePath: string;
      if (this.compression) {
        storagePath = path.join(this.location, `${name}${COMPRESSED_EXTENSION}`);
        await createTarGzip(stagingParent, name, storagePath, this.compressionLevel);
      } else {
        storagePath = path.join(this.location, name);
        await moveDirectory(stagingDir, storagePath);
      }

      insertBackup(this.database, {
        backup_id: backupId,
        created_at: metadata.timestamp,
        project_path: projectPath,
        storage_path: storagePath,
        backup_type: type,
        size_bytes: sizeBytes,
        file_count: fileCount,
        user_id: options.userId,
        checksum,
        compressed: this.compression,
        description: metadata.description,
      });

      logger.info(
        `Backup created: ${storagePath} (${formatBytes(sizeBytes)}, ${fileCount} files, ${formatDuration(Date.now() - startTime)})`,
      );

      return {
        backupId,
        path: storagePath,
        timestamp: metadata.timestamp,
        type,
        sizeBytes,
        fileCount,
        checksum,
        compressed: this.compression,
      };
    } finally {
      await rm(stagingParent, { recursive: true, force: true });
    }
  }

  /**
   * Recompute the artifact's tree checksum and compare it with the recorded one.
   */
  async verifyBackup(backupId: string): Promise<boolean> {
    const backup = this.requireBackup(backupId);

    if (!(await pathExists(backup.storage_path))) {
      logger.warn(`Backup artifact missing: ${backup.storage_path}`);
      return false;
    }

    let checksum: string;
    try {
      checksum = await this.withBackupRoot(backup, (root) =>
        computeTreeChecksum(root, { exclude: isMetadataFile }),
      );
    } catch (err) {
      logger.error(`Failed to read backup ${backupId}: ${errorMessage(err)}`);
      return false;
    }

    if (checksum !== backup.checksum) {
      logger.warn(`Backup checksum mismatch: ${backupId}`, { expected: backup.checksum, actual: checksum });
      return false;
    }

    markBackupVerified(this.database, backupId);
    logger.info(`Backup verified: ${backupId}`);
    return true;
  }

  /**
   * Copy the backed up tree into `restorePath`, by default the project it was taken from.
   */
  async restoreFromBackup(backupId: string, restorePath?: string): Promise<true> {
    const backup = this.requireBackup(backupId);

    if (!(await this.verifyBackup(backupId))) {
      throw new VerificationError(backupId);
    }

    const target = path.resolve(restorePath ?? backup.project_path);
    await mkdir(target, { recursive: true });

    const restored = await this.withBackupRoot(backup, (root) => copyTree(root, target, isMetadataFile));
    logger.info(`Restored ${restored} files from backup ${backupId} to ${target}`);
    return true;
  }

  async deleteBackup(backupId: string): Promise<boolean> {
    const backup = this.requireBackup(backupId);

    await rm(backup.storage_path, { recursive: true, force: true });
    deleteBackupRecord(this.database, backupId);

    logger.info(`Backup deleted: ${backupId}`);
    return true;
  }

  /**
   * Read one file out of a backup without restoring the rest. Null when the
   * file is not in the backup or the path leaves the backup root.
   */
  async getFileFromBackup(backupId: string, relativePath: string): Promise<Buffer | null> {
    const backup = this.requireBackup(backupId);

    const entryPath = path.posix.normalize(relativePath.replace(/\\/g, "/").replace(/^\/+/, ""));
    if (entryPath === "." || entryPath === ".." || entryPath.startsWith("../")) {
      logger.warn(`Rejected path outside backup root: ${relativePath}`);
      return null;
    }

    if (!backup.compressed) {
      return readFileWithin(backup.storage_path, entryPath);
    }

    const rootName = path.basename(backup.storage_path, COMPRESSED_EXTENSION);
    const wanted = `${rootName}/${entryPath}`;
    const extractDir = await mkdtemp(path.join(this.tmpDir, "txdeploy-"));

    try {
      await extractTarGzip(backup.storage_path, extractDir, (entry) => normalizeEntryPath(entry) === wanted);
      return await readFileWithin(path.join(extractDir, rootName), entryPath);
    } finally {
      await rm(extractDir, { recursive: true, force: true });
    }
  }

  getBackup(backupId: string): BackupRecord | null {
    return getBackupById(this.database, backupId);
  }

  listBackups(options: ListBackupsOptions = {}): BackupRecord[] {
    const projectPath = options.projectPath ? path.resolve(options.projectPath) : undefined;
    return listBackupRecords(this.database, projectPath, options.limit ?? 10);
  }

  private requireBackup(backupId: string): BackupRecord {
    const backup = getBackupById(this.database, backupId);
    if (!backup) {
      throw new NotFoundError("backup", backupId);
    }
    return backup;
  }

  /**
   * Run `fn` against the backup's file tree, extracting compressed artifacts
   * into a temporary directory that is removed afterwards.
   */
  private async withBackupRoot<T>(backup: BackupRecord, fn: (root: string) => Promise<T>): Promise<T> {
    if (!backup.compressed) {
      return fn(backup.storage_path);
    }

    const extractDir = await mkdtemp(path.join(this.tmpDir, "txdeploy-"));
    try {
      await extractTarGzip(backup.storage_path, extractDir);
      return await fn(await locateExtractedRoot(extractDir));
    } finally {
      await rm(extractDir, { recursive: true, force: true });
      logger.debug(`Cleaned up temp directory: ${extractDir}`);
    }
  }
}

async function assertDirectory(dirPath: string): Promise<void> {
  try {
    if ((await stat(dirPath)).isDirectory()) return;
  } catch (err) {
    if (!isNotFoundError(err)) throw err;
  }
  throw new ArgumentError(`Project path does not exist: ${dirPath}`);
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (err) {
    if (isNotFoundError(err)) return false;
    throw err;
  }
}

async function writeMetadata(stagingDir: string, metadata: BackupMetadata): Promise<void> {
  await writeFile(path.join(stagingDir, METADATA_FILE), `${JSON.stringify(metadata, null, 2)}\n`);
}

async function readFileWithin(root: string, relativePath: string): Promise<Buffer | null> {
  const filePath = path.join(root, ...relativePath.split("/"));
  if (!isPathWithinDir(filePath, root)) return null;

  try {
    if (!(await stat(filePath)).isFile()) return null;
    return await readFile(filePath);
  } catch (err) {
    if (isNotFoundError(err)) return null;
    throw err;
  }
}

async function moveDirectory(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (err) {
    if (!isErrnoException(err) || err.code !== "EXDEV") throw err;
    await copyTree(source, target);
    await rm(source, { recursive: true, force: true });
  }
}
