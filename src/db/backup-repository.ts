/**
 * Backup record repository
 */

import type { BackupInsert, BackupRecord } from "../types";
import type { DatabaseHandle } from "./connection";
import { parseBackupRow, type RawBackupRow, serializeBoolean } from "./mappers";

export function insertBackup(database: DatabaseHandle, backup: BackupInsert): BackupRecord {
  database
    .prepare(`
      INSERT INTO backups (
        backup_id, created_at, project_path, storage_path, backup_type, size_bytes,
        file_count, user_id, checksum, compressed, description
      ) VALUES ($backup_id, $created_at, $project_path, $storage_path, $backup_type, $size_bytes,
        $file_count, $user_id, $checksum, $compressed, $description)
    `)
    .run({
      ...backup,
      compressed: serializeBoolean(backup.compressed),
      description: backup.description ?? null,
    });

  const inserted = getBackupById(database, backup.backup_id);
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted backup: ${backup.backup_id}`);
  }
  return inserted;
}

export function getBackupById(database: DatabaseHandle, backupId: string): BackupRecord | null {
  const row = database.prepare<[string], RawBackupRow>("SELECT * FROM backups WHERE backup_id = ?").get(backupId);
  return row ? parseBackupRow(row) : null;
}

export function listBackupRecords(database: DatabaseHandle, projectPath: string | undefined, limit: number): BackupRecord[] {
  const rows = projectPath
    ? database
        .prepare<[string, number], RawBackupRow>(
          "SELECT * FROM backups WHERE project_path = ? ORDER BY id DESC LIMIT ?",
        )
        .all(projectPath, limit)
    : database.prepare<[number], RawBackupRow>("SELECT * FROM backups ORDER BY id DESC LIMIT ?").all(limit);

  return rows.map(parseBackupRow);
}

export function markBackupVerified(database: DatabaseHandle, backupId: string): void {
  database.prepare("UPDATE backups SET verified = 1 WHERE backup_id = ?").run(backupId);
}

export function deleteBackupRecord(database: DatabaseHandle, backupId: string): void {
  database.prepare("DELETE FROM backups WHERE backup_id = ?").run(backupId);
}
