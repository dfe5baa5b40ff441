/**
 * Deployment request and result shapes
 */

import type {
  BackupRecord,
  FileRecord,
  OperationRecord,
  TransactionRecord,
  ValidationStatus,
} from "./database";
import type { Diagnostic } from "./validation";

export interface DeploymentRequest {
  sources: string[];
  destinations: string[];
  projectPath: string;
  userId: string;
  description?: string;
}

export interface FileValidationDetail {
  fileId: string;
  path: string;
  status: ValidationStatus | null;
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

export interface ValidationDetails {
  allValid: boolean;
  files: FileValidationDetail[];
}

export type DeploymentResult =
  | { status: "COMPLETED"; transactionId: string; backupId: string | null }
  | { status: "VALIDATION_FAILED"; transactionId: string; validation: ValidationDetails }
  | { status: "FAILED"; transactionId: string; backupId: string | null; error: string };

export interface FileDeploymentStatus {
  file: FileRecord;
  operations: OperationRecord[];
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

export interface DeploymentStatus {
  transaction: TransactionRecord;
  files: FileDeploymentStatus[];
  backup: BackupRecord | null;
}

export interface DeploymentSummary extends TransactionRecord {
  file_count: number;
  success_count: number;
}

export interface ListDeploymentsOptions {
  projectPath?: string;
  userId?: string;
  limit?: number;
}
