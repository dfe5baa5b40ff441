/**
 * Database row mapping utilities
 */

import type { BackupRecord } from "../types";

export type RawBackupRow = Omit<BackupRecord, "verified" | "compressed"> & {
  verified: number;
  compressed: number;
};

export function parseBackupRow(row: RawBackupRow): BackupRecord {
  return {
    ...row,
    verified: Boolean(row.verified),
    compressed: Boolean(row.compressed),
  };
}

export function serializeBoolean(value: boolean): number {
  return value ? 1 : 0;
}
