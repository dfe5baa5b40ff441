/**
 * Error taxonomy for deployments, transactions and backups
 */

import type { TransactionStatus } from "../types";

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentError";
  }
}

export class InvalidStateError extends Error {
  constructor(
    readonly transactionId: string,
    readonly status: TransactionStatus,
    readonly action: string,
  ) {
    super(`Cannot ${action} transaction ${transactionId} in ${status} state`);
    this.name = "InvalidStateError";
  }
}

export class NoFilesError extends Error {
  constructor(readonly transactionId: string) {
    super(`Transaction ${transactionId} has no files to validate`);
    this.name = "NoFilesError";
  }
}

export class NotFoundError extends Error {
  constructor(
    readonly entity: "transaction" | "file" | "backup",
    readonly id: string,
  ) {
    super(`${entity.charAt(0).toUpperCase()}${entity.slice(1)} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

export class ChecksumMismatchError extends Error {
  constructor(
    readonly filePath: string,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Checksum mismatch after deployment: ${filePath}`);
    this.name = "ChecksumMismatchError";
  }
}

export class DeploymentIOError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DeploymentIOError";
  }
}

export class VerificationError extends Error {
  constructor(readonly backupId: string) {
    super(`Backup verification failed: ${backupId}`);
    this.name = "VerificationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
