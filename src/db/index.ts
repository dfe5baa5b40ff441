/**
 * Database module exports
 */

// Backup repository
export {
  deleteBackupRecord,
  getBackupById,
  insertBackup,
  listBackupRecords,
  markBackupVerified,
} from "./backup-repository";
// Connection
export { closeDatabase, type DatabaseHandle, IN_MEMORY, openDatabase, runInTransaction } from "./connection";
// File repository
export {
  getFileById,
  getFilesByTransaction,
  insertFile,
  updateFileStatus,
  updateFileValidationStatus,
} from "./file-repository";
export type { RawBackupRow } from "./mappers";
// Mappers
export { parseBackupRow, serializeBoolean } from "./mappers";
// Migrations
export {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
  initializeDatabase,
} from "./migrations";
// Operation ledger
export {
  finishOperation,
  getOperationById,
  getOperationsByTransaction,
  getRollbackCandidates,
  insertOperation,
} from "./operation-repository";
// Transaction repository
export {
  getTransactionById,
  insertTransaction,
  listTransactionSummaries,
  type TransactionFilter,
  updateTransactionBackup,
  updateTransactionStatus,
} from "./transaction-repository";
// Validation results
export { getValidationResultsByTransaction, replaceValidationResults } from "./validation-result-repository";
