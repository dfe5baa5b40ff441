/**
 * Database record type definitions
 */

export const TRANSACTION_STATUSES = [
  "INITIALIZED",
  "VALIDATED",
  "IN_PROGRESS",
  "COMPLETED",
  "FAILED",
  "ROLLED_BACK",
] as const;
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];

export type FileStatus = "PENDING" | "DEPLOYED" | "FAILED" | "ROLLED_BACK";
export type ValidationStatus = "PASS" | "FAIL" | "WARNING";
export type OperationType = "DEPLOY" | "ROLLBACK";
export type OperationStatus = "IN_PROGRESS" | "COMPLETED" | "FAILED";
export type DiagnosticSeverity = "FAIL" | "WARNING";

export const BACKUP_TYPES = ["FULL", "PARTIAL", "CONFIG"] as const;
export type BackupType = (typeof BACKUP_TYPES)[number];

export interface TransactionRecord {
  id: number;
  transaction_id: string;
  created_at: string;
  updated_at: string;
  user_id: string;
  status: TransactionStatus;
  project_path: string;
  description: string | null;
  backup_id: string | null;
}

export interface FileRecord {
  id: number;
  file_id: string;
  transaction_id: string;
  original_name: string;
  source_path: string;
  destination_path: string;
  status: FileStatus;
  validation_status: ValidationStatus | null;
  checksum: string | null;
}

export interface OperationRecord {
  id: number;
  operation_id: string;
  transaction_id: string;
  file_id: string | null;
  operation_type: OperationType;
  source_path: string | null;
  destination_path: string | null;
  created_at: string;
  status: OperationStatus;
  error_message: string | null;
}

export interface ValidationResultRecord {
  id: number;
  file_id: string;
  severity: DiagnosticSeverity;
  rule: string;
  line: number;
  message: string;
  created_at: string;
}

export interface BackupRecord {
  id: number;
  backup_id: string;
  created_at: string;
  project_path: string;
  storage_path: string;
  backup_type: BackupType;
  size_bytes: number;
  file_count: number;
  user_id: string;
  verified: boolean;
  checksum: string;
  compressed: boolean;
  description: string | null;
}

export interface TransactionInsert {
  transaction_id: string;
  created_at: string;
  user_id: string;
  project_path: string;
  description?: string | null;
}

export interface FileInsert {
  file_id: string;
  transaction_id: string;
  source_path: string;
  destination_path: string;
  checksum: string | null;
}

export interface OperationInsert {
  operation_id: string;
  transaction_id: string;
  file_id: string | null;
  operation_type: OperationType;
  source_path: string | null;
  destination_path: string;
  created_at: string;
}

export type ValidationResultInsert = Omit<ValidationResultRecord, "id">;

export type BackupInsert = Omit<BackupRecord, "id" | "verified">;

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
}
