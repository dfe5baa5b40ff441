/**
 * Configuration type definitions for txdeploy
 */

import type { LogLevel } from "../utils/logger";
import type { BackupType } from "./database";

export interface DatabaseConfig {
  path: string;
}

export interface BackupConfig {
  /** Directory where backup artifacts are stored */
  location: string;
  /** Create a project backup before every deployment */
  autoBackup: boolean;
  /** Backup type used for automatic pre-deployment backups */
  type: BackupType;
  /** Store backups as .tar.gz instead of plain directories */
  compression: boolean;
  /** gzip level (0-9) */
  compressionLevel: number;
  /** Directory name skipped by FULL backups */
  excludeDir: string;
  /** File extensions selected by PARTIAL backups */
  partialExtensions: string[];
}

export interface ArchiveConfig {
  /** Hidden directory created beside a destination to hold its previous versions */
  dirName: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface DeployerConfig {
  version: string;
  database: DatabaseConfig;
  backup: BackupConfig;
  archive: ArchiveConfig;
  logging: LoggingConfig;
}
