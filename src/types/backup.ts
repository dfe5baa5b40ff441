/**
 * Backup operation type definitions
 */

import type { BackupType } from "./database";

export interface CreateBackupOptions {
  projectPath: string;
  type?: BackupType;
  userId: string;
  description?: string;
  /** Explicit files to back up; takes precedence over the type's selection */
  files?: string[];
}

export interface BackupResult {
  backupId: string;
  path: string;
  timestamp: string;
  type: BackupType;
  sizeBytes: number;
  fileCount: number;
  checksum: string;
  compressed: boolean;
}

export interface BackupMetadata {
  backupId: string;
  projectName: string;
  projectPath: string;
  backupType: BackupType;
  timestamp: string;
  fileCount: number;
  userId: string;
  description: string | null;
  size?: number;
  checksum?: string;
}

export interface CollectedFile {
  absolutePath: string;
  /** Relative to the project root, `/`-separated */
  relativePath: string;
}

export interface ListBackupsOptions {
  projectPath?: string;
  limit?: number;
}
