/**
 * Centralized type exports for txdeploy
 */

// Backup types
export type {
  BackupMetadata,
  BackupResult,
  CollectedFile,
  CreateBackupOptions,
  ListBackupsOptions,
} from "./backup";
// Config types
export type {
  ArchiveConfig,
  BackupConfig,
  DatabaseConfig,
  DeployerConfig,
  LoggingConfig,
} from "./config";
// Database types
export {
  BACKUP_TYPES,
  TRANSACTION_STATUSES,
  type BackupInsert,
  type BackupRecord,
  type BackupType,
  type DiagnosticSeverity,
  type FileInsert,
  type FileRecord,
  type FileStatus,
  type Migration,
  type OperationInsert,
  type OperationRecord,
  type OperationStatus,
  type OperationType,
  type TransactionInsert,
  type TransactionRecord,
  type TransactionStatus,
  type ValidationResultInsert,
  type ValidationResultRecord,
  type ValidationStatus,
} from "./database";
// Deployment types
export type {
  DeploymentRequest,
  DeploymentResult,
  DeploymentStatus,
  DeploymentSummary,
  FileDeploymentStatus,
  FileValidationDetail,
  ListDeploymentsOptions,
  ValidationDetails,
} from "./deployment";
// Ports
export type { Diagnostic, FileDeployer, FileRestorer, ValidationReport, Validator } from "./validation";
