/**
 * File record repository
 */

import * as path from "node:path";
import type { FileInsert, FileRecord, FileStatus, ValidationStatus } from "../types";
import type { DatabaseHandle } from "./connection";

export function insertFile(database: DatabaseHandle, file: FileInsert): FileRecord {
  database
    .prepare(`
      INSERT INTO files (
        file_id, transaction_id, original_name, source_path, destination_path, status, checksum
      ) VALUES ($file_id, $transaction_id, $original_name, $source_path, $destination_path, 'PENDING', $checksum)
    `)
    .run({
      file_id: file.file_id,
      transaction_id: file.transaction_id,
      original_name: path.basename(file.source_path),
      source_path: file.source_path,
      destination_path: file.destination_path,
      checksum: file.checksum,
    });

  const inserted = getFileById(database, file.file_id);
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted file: ${file.file_id}`);
  }
  return inserted;
}

export function getFileById(database: DatabaseHandle, fileId: string): FileRecord | null {
  const row = database.prepare<[string], FileRecord>("SELECT * FROM files WHERE file_id = ?").get(fileId);
  return row ?? null;
}

/**
 * Files of a transaction in registration order
 */
export function getFilesByTransaction(database: DatabaseHandle, transactionId: string): FileRecord[] {
  return database
    .prepare<[string], FileRecord>("SELECT * FROM files WHERE transaction_id = ? ORDER BY id ASC")
    .all(transactionId);
}

export function updateFileStatus(database: DatabaseHandle, fileId: string, status: FileStatus): void {
  database.prepare("UPDATE files SET status = ? WHERE file_id = ?").run(status, fileId);
}

export function updateFileValidationStatus(
  database: DatabaseHandle,
  fileId: string,
  validationStatus: ValidationStatus,
): void {
  database.prepare("UPDATE files SET validation_status = ? WHERE file_id = ?").run(validationStatus, fileId);
}
