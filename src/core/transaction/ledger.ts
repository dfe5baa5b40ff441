/**
 * Transaction ledger: lifecycle state plus the append-only operation log.
 *
 * Each logical unit of work (registering a file, recording a validation pass,
 * finishing one file's deploy) is written in a single store transaction.
 */

import {
  type DatabaseHandle,
  finishOperation,
  getFilesByTransaction,
  getOperationsByTransaction,
  getRollbackCandidates,
  getTransactionById,
  getValidationResultsByTransaction,
  insertFile,
  insertOperation,
  insertTransaction,
  listTransactionSummaries,
  replaceValidationResults,
  runInTransaction,
  updateFileStatus,
  updateFileValidationStatus,
  updateTransactionBackup,
  updateTransactionStatus,
} from "../../db";
import type {
  DeploymentSummary,
  FileDeployer,
  FileRecord,
  FileRestorer,
  ListDeploymentsOptions,
  OperationRecord,
  TransactionRecord,
  TransactionStatus,
  ValidationReport,
  ValidationResultInsert,
  ValidationResultRecord,
  Validator,
} from "../../types";
import { generateUUID } from "../../utils/crypto";
import { logger } from "../../utils/logger";
import { DeploymentIOError, errorMessage, InvalidStateError, NoFilesError, NotFoundError } from "../errors";
import { assertTransition } from "./state-machine";

export interface TransactionLedgerOptions {
  /** Clock used for every timestamp the ledger writes */
  now?: () => Date;
}

export class TransactionLedger {
  private readonly now: () => Date;

  constructor(
    private readonly database: DatabaseHandle,
    options: TransactionLedgerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  createTransaction(userId: string, projectPath: string, description?: string): string {
    const transactionId = generateUUID();

    insertTransaction(this.database, {
      transaction_id: transactionId,
      created_at: this.timestamp(),
      user_id: userId,
      project_path: projectPath,
      description: description ?? null,
    });

    logger.info(`Transaction created: ${transactionId}`, { userId, projectPath });
    return transactionId;
  }

  /**
   * Register a source/destination pair. Registering into a VALIDATED
   * transaction reverts it to INITIALIZED.
   */
  addFile(transactionId: string, sourcePath: string, destinationPath: string, checksum: string | null): string {
    const transaction = this.getTransaction(transactionId);
    if (transaction.status !== "INITIALIZED" && transaction.status !== "VALIDATED") {
      throw new InvalidStateError(transactionId, transaction.status, "add files to");
    }

    const fileId = generateUUID();

    runInTransaction(this.database, () => {
      insertFile(this.database, {
        file_id: fileId,
        transaction_id: transactionId,
        source_path: sourcePath,
        destination_path: destinationPath,
        checksum,
      });

      if (transaction.status === "VALIDATED") {
        this.setStatus(transactionId, "INITIALIZED");
      }
    });

    if (transaction.status === "VALIDATED") {
      logger.warn(`File added after validation, transaction ${transactionId} must be re-validated`);
    }
    logger.debug(`File registered: ${sourcePath} -> ${destinationPath}`, { transactionId, fileId });
    return fileId;
  }

  /**
   * Run the validator over every registered file. The transaction moves to
   * VALIDATED only when no file fails.
   */
  async validate(transactionId: string, validator: Validator): Promise<boolean> {
    const transaction = this.getTransaction(transactionId);
    assertTransition(transactionId, transaction.status, "VALIDATED", "validate");

    const files = getFilesByTransaction(this.database, transactionId);
    if (files.length === 0) {
      throw new NoFilesError(transactionId);
    }

    const reports: Array<{ file: FileRecord; report: ValidationReport }> = [];
    for (const file of files) {
      reports.push({ file, report: await validator.validate(file.source_path) });
    }

    const allValid = reports.every(({ report }) => report.status !== "FAIL");
    const createdAt = this.timestamp();

    runInTransaction(this.database, () => {
      for (const { file, report } of reports) {
        updateFileValidationStatus(this.database, file.file_id, report.status);
        replaceValidationResults(this.database, file.file_id, toValidationRows(file.file_id, report, createdAt));
      }
      if (allValid) {
        this.setStatus(transactionId, "VALIDATED");
      }
    });

    const failed = reports.filter(({ report }) => report.status === "FAIL").length;
    if (allValid) {
      logger.info(`Transaction validated: ${transactionId} (${files.length} files)`);
    } else {
      logger.warn(`Validation failed for ${failed} of ${files.length} files in transaction ${transactionId}`);
    }

    return allValid;
  }

  /**
   * Deploy every non-failing file in registration order. The first failure
   * aborts the loop, rolls back the files completed in this call, marks the
   * transaction FAILED and rethrows.
   */
  async execute(
    transactionId: string,
    deployer: FileDeployer,
    restorer: FileRestorer,
    backupId?: string | null,
  ): Promise<void> {
    const transaction = this.getTransaction(transactionId);
    assertTransition(transactionId, transaction.status, "IN_PROGRESS", "execute");

    runInTransaction(this.database, () => {
      this.setStatus(transactionId, "IN_PROGRESS");
      if (backupId) {
        updateTransactionBackup(this.database, transactionId, backupId);
      }
    });

    logger.info(`Executing transaction ${transactionId}`, { backupId: backupId ?? null });

    const files = getFilesByTransaction(this.database, transactionId).filter(
      (file) => file.validation_status !== "FAIL",
    );
    const completed: OperationRecord[] = [];
    let failure: Error | null = null;

    for (const file of files) {
      const operation = insertOperation(this.database, {
        operation_id: generateUUID(),
        transaction_id: transactionId,
        file_id: file.file_id,
        operation_type: "DEPLOY",
        source_path: file.source_path,
        destination_path: file.destination_path,
        created_at: this.timestamp(),
      });

      try {
        const deployed = await deployer.deploy(file.source_path, file.destination_path, file.checksum);
        if (!deployed) {
          throw new DeploymentIOError(`Deployment failed: ${file.destination_path}`, file.destination_path);
        }
      } catch (err) {
        const message = errorMessage(err);
        runInTransaction(this.database, () => {
          finishOperation(this.database, operation.operation_id, "FAILED", message);
          updateFileStatus(this.database, file.file_id, "FAILED");
        });
        logger.error(`Failed to deploy ${file.source_path} -> ${file.destination_path}: ${message}`);
        failure =
          err instanceof Error
            ? err
            : new DeploymentIOError(`Deployment failed: ${file.destination_path}: ${message}`, file.destination_path, {
                cause: err,
              });
        break;
      }

      runInTransaction(this.database, () => {
        updateFileStatus(this.database, file.file_id, "DEPLOYED");
        finishOperation(this.database, operation.operation_id, "COMPLETED");
      });
      completed.push(operation);
      logger.debug(`Deployed ${file.source_path} -> ${file.destination_path}`);
    }

    if (failure !== null) {
      const rolledBack = await this.rollbackOperations(transactionId, completed.reverse(), restorer);
      if (!rolledBack) {
        logger.error(`Automatic rollback incomplete for transaction ${transactionId}`);
      }
      this.setStatus(transactionId, "FAILED");
      logger.error(`Transaction failed: ${transactionId}`);
      throw failure;
    }

    this.setStatus(transactionId, "COMPLETED");
    logger.info(`Transaction completed: ${transactionId} (${completed.length} files deployed)`);
  }

  /**
   * Undo every completed deploy that has not been rolled back yet, newest
   * first. Stops at the first restore failure and leaves the status as is.
   */
  async rollback(transactionId: string, restorer: FileRestorer): Promise<boolean> {
    const transaction = this.getTransaction(transactionId);
    assertTransition(transactionId, transaction.status, "ROLLED_BACK", "roll back");

    const candidates = getRollbackCandidates(this.database, transactionId);
    logger.info(`Rolling back transaction ${transactionId} (${candidates.length} files)`);

    const rolledBack = await this.rollbackOperations(transactionId, candidates, restorer);
    if (!rolledBack) {
      logger.error(`Rollback failed for transaction ${transactionId}, status left ${transaction.status}`);
      return false;
    }

    this.setStatus(transactionId, "ROLLED_BACK");
    logger.info(`Transaction rolled back: ${transactionId}`);
    return true;
  }

  /**
   * Mark a transaction stuck IN_PROGRESS as FAILED. Any other status is left alone.
   */
  close(transactionId: string): void {
    const transaction = this.getTransaction(transactionId);
    if (transaction.status === "IN_PROGRESS") {
      this.setStatus(transactionId, "FAILED");
      logger.warn(`Transaction closed while in progress: ${transactionId}`);
    }
  }

  getTransaction(transactionId: string): TransactionRecord {
    const transaction = getTransactionById(this.database, transactionId);
    if (!transaction) {
      throw new NotFoundError("transaction", transactionId);
    }
    return transaction;
  }

  getStatus(transactionId: string): TransactionStatus {
    return this.getTransaction(transactionId).status;
  }

  getFiles(transactionId: string): FileRecord[] {
    this.getTransaction(transactionId);
    return getFilesByTransaction(this.database, transactionId);
  }

  getOperations(transactionId: string): OperationRecord[] {
    this.getTransaction(transactionId);
    return getOperationsByTransaction(this.database, transactionId);
  }

  getValidationResults(transactionId: string): ValidationResultRecord[] {
    this.getTransaction(transactionId);
    return getValidationResultsByTransaction(this.database, transactionId);
  }

  listTransactions(options: ListDeploymentsOptions = {}): DeploymentSummary[] {
    return listTransactionSummaries(this.database, {
      projectPath: options.projectPath,
      userId: options.userId,
      limit: options.limit ?? 10,
    });
  }

  private async rollbackOperations(
    transactionId: string,
    operations: OperationRecord[],
    restorer: FileRestorer,
  ): Promise<boolean> {
    for (const deployOperation of operations) {
      const fileId = deployOperation.file_id;
      const destination = deployOperation.destination_path;
      if (fileId === null || destination === null) {
        logger.warn(`Skipping operation without a file: ${deployOperation.operation_id}`);
        continue;
      }

      const operation = insertOperation(this.database, {
        operation_id: generateUUID(),
        transaction_id: transactionId,
        file_id: fileId,
        operation_type: "ROLLBACK",
        source_path: null,
        destination_path: destination,
        created_at: this.timestamp(),
      });

      try {
        const restored = await restorer.restore(destination);
        if (!restored) {
          throw new DeploymentIOError(`Rollback failed: ${destination}`, destination);
        }
      } catch (err) {
        const message = errorMessage(err);
        finishOperation(this.database, operation.operation_id, "FAILED", message);
        logger.error(`Failed to roll back ${destination}: ${message}`);
        return false;
      }

      runInTransaction(this.database, () => {
        finishOperation(this.database, operation.operation_id, "COMPLETED");
        updateFileStatus(this.database, fileId, "ROLLED_BACK");
      });
      logger.debug(`Rolled back ${destination}`);
    }

    return true;
  }

  private setStatus(transactionId: string, status: TransactionStatus): void {
    updateTransactionStatus(this.database, transactionId, status, this.timestamp());
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function toValidationRows(fileId: string, report: ValidationReport, createdAt: string): ValidationResultInsert[] {
  return [
    ...report.errors.map((d) => ({
      file_id: fileId,
      severity: "FAIL" as const,
      rule: d.rule,
      line: d.line,
      message: d.message,
      created_at: createdAt,
    })),
    ...report.warnings.map((d) => ({
      file_id: fileId,
      severity: "WARNING" as const,
      rule: d.rule,
      line: d.line,
      message: d.message,
      created_at: createdAt,
    })),
  ];
}
