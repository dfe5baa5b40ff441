/**
 * Deployment engine: validate, back up, copy and verify as one transaction
 */

import type {
  BackupType,
  DeploymentRequest,
  DeploymentResult,
  DeploymentStatus,
  DeploymentSummary,
  Diagnostic,
  FileDeployer,
  FileRestorer,
  ListDeploymentsOptions,
  ValidationDetails,
  ValidationResultRecord,
  Validator,
} from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import type { BackupManager } from "../backup/manager";
import { ArgumentError, errorMessage, InvalidStateError } from "../errors";
import type { TransactionLedger } from "../transaction/ledger";
import { ArchiveStore } from "./archive-store";
import { CopyFileDeployer } from "./file-deployer";

export interface DeploymentEngineOptions {
  ledger: TransactionLedger;
  backups: BackupManager;
  validator: Validator;
  /** Archive used by the default deployer and restorer */
  archives?: ArchiveStore;
  deployer?: FileDeployer;
  restorer?: FileRestorer;
  /** Snapshot the project before deploying */
  autoBackup?: boolean;
  backupType?: BackupType;
}

export class DeploymentEngine {
  private readonly ledger: TransactionLedger;
  private readonly backups: BackupManager;
  private readonly validator: Validator;
  private readonly deployer: FileDeployer;
  private readonly restorer: FileRestorer;
  private readonly autoBackup: boolean;
  private readonly backupType: BackupType;

  constructor(options: DeploymentEngineOptions) {
    const archives = options.archives ?? new ArchiveStore();

    this.ledger = options.ledger;
    this.backups = options.backups;
    this.validator = options.validator;
    this.deployer = options.deployer ?? new CopyFileDeployer(archives);
    this.restorer = options.restorer ?? archives;
    this.autoBackup = options.autoBackup ?? true;
    this.backupType = options.backupType ?? "FULL";
  }

  async deployFiles(request: DeploymentRequest): Promise<DeploymentResult> {
    const { sources, destinations } = request;

    if (sources.length !== destinations.length) {
      throw new ArgumentError(
        `Sources and destinations must have the same length (${sources.length} != ${destinations.length})`,
      );
    }
    if (sources.length === 0) {
      throw new ArgumentError("At least one file is required for deployment");
    }

    const startTime = Date.now();
    const transactionId = this.ledger.createTransaction(request.userId, request.projectPath, request.description);
    let backupId: string | null = null;

    try {
      for (const [index, source] of sources.entries()) {
        const destination = destinations[index];
        if (destination === undefined) continue;
        this.ledger.addFile(transactionId, source, destination, await sourceChecksum(source));
      }

      const valid = await this.ledger.validate(transactionId, this.validator);
      if (!valid) {
        logger.warn(`Deployment stopped at validation: ${transactionId}`);
        return { status: "VALIDATION_FAILED", transactionId, validation: this.getValidationDetails(transactionId) };
      }

      if (this.autoBackup) {
        const backup = await this.backups.createBackup({
          projectPath: request.projectPath,
          type: this.backupType,
          userId: request.userId,
          description: `Pre-deployment backup for transaction ${transactionId}`,
        });
        backupId = backup.backupId;
      }

      await this.ledger.execute(transactionId, this.deployer, this.restorer, backupId);

      logger.info(
        `Deployment completed: ${transactionId} (${sources.length} files, ${formatDuration(Date.now() - startTime)})`,
      );
      return { status: "COMPLETED", transactionId, backupId };
    } catch (err) {
      this.ledger.close(transactionId);
      const message = errorMessage(err);
      logger.error(`Deployment failed: ${transactionId}: ${message}`);
      return { status: "FAILED", transactionId, backupId, error: message };
    }
  }

  async rollbackDeployment(transactionId: string): Promise<boolean> {
    const transaction = this.ledger.getTransaction(transactionId);
    if (transaction.status !== "COMPLETED" && transaction.status !== "FAILED") {
      throw new InvalidStateError(transactionId, transaction.status, "roll back");
    }
    return this.ledger.rollback(transactionId, this.restorer);
  }

  getDeploymentStatus(transactionId: string): DeploymentStatus {
    const transaction = this.ledger.getTransaction(transactionId);
    const operations = this.ledger.getOperations(transactionId);
    const diagnostics = this.ledger.getValidationResults(transactionId);

    const files = this.ledger.getFiles(transactionId).map((file) => ({
      file,
      operations: operations.filter((op) => op.file_id === file.file_id),
      ...splitDiagnostics(diagnostics.filter((d) => d.file_id === file.file_id)),
    }));

    const backup = transaction.backup_id ? this.backups.getBackup(transaction.backup_id) : null;

    return { transaction, files, backup };
  }

  listDeployments(options: ListDeploymentsOptions = {}): DeploymentSummary[] {
    return this.ledger.listTransactions(options);
  }

  private getValidationDetails(transactionId: string): ValidationDetails {
    const diagnostics = this.ledger.getValidationResults(transactionId);
    const files = this.ledger.getFiles(transactionId).map((file) => ({
      fileId: file.file_id,
      path: file.source_path,
      status: file.validation_status,
      ...splitDiagnostics(diagnostics.filter((d) => d.file_id === file.file_id)),
    }));

    return { allValid: files.every((file) => file.status !== "FAIL"), files };
  }
}

function splitDiagnostics(rows: ValidationResultRecord[]): { errors: Diagnostic[]; warnings: Diagnostic[] } {
  const toDiagnostic = (row: ValidationResultRecord): Diagnostic => ({
    line: row.line,
    message: row.message,
    rule: row.rule,
  });

  return {
    errors: rows.filter((row) => row.severity === "FAIL").map(toDiagnostic),
    warnings: rows.filter((row) => row.severity === "WARNING").map(toDiagnostic),
  };
}

async function sourceChecksum(sourcePath: string): Promise<string | null> {
  try {
    return await computeFileChecksum(sourcePath);
  } catch (err) {
    logger.warn(`Could not checksum source ${sourcePath}: ${errorMessage(err)}`);
    return null;
  }
}
