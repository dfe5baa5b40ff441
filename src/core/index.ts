/**
 * Core module exports
 */

// Backup
export {
  BackupManager,
  type BackupManagerOptions,
  CONFIG_PATTERNS,
  collectFiles,
  isConfigFile,
  matchesPattern,
  METADATA_FILE,
} from "./backup";
// Context
export { createDeploymentContext, type DeploymentContext, type DeploymentContextOptions } from "./context";
// Deploy
export {
  type ArchiveEntry,
  ArchiveStore,
  type ArchiveStoreOptions,
  CopyFileDeployer,
  DeploymentEngine,
  type DeploymentEngineOptions,
  type RestoreOutcome,
} from "./deploy";
// Errors
export {
  ArgumentError,
  ChecksumMismatchError,
  DeploymentIOError,
  errorMessage,
  InvalidStateError,
  NoFilesError,
  NotFoundError,
  VerificationError,
} from "./errors";
// Transactions
export { assertTransition, canTransition, isTerminal, TransactionLedger, type TransactionLedgerOptions } from "./transaction";
