/**
 * Append-only operation ledger
 */

import type { OperationInsert, OperationRecord, OperationStatus } from "../types";
import type { DatabaseHandle } from "./connection";

export function insertOperation(database: DatabaseHandle, operation: OperationInsert): OperationRecord {
  database
    .prepare(`
      INSERT INTO operations (
        operation_id, transaction_id, file_id, operation_type, source_path, destination_path,
        created_at, status
      ) VALUES ($operation_id, $transaction_id, $file_id, $operation_type, $source_path, $destination_path,
        $created_at, 'IN_PROGRESS')
    `)
    .run({
      operation_id: operation.operation_id,
      transaction_id: operation.transaction_id,
      file_id: operation.file_id,
      operation_type: operation.operation_type,
      source_path: operation.source_path,
      destination_path: operation.destination_path,
      created_at: operation.created_at,
    });

  const inserted = getOperationById(database, operation.operation_id);
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted operation: ${operation.operation_id}`);
  }
  return inserted;
}

export function getOperationById(database: DatabaseHandle, operationId: string): OperationRecord | null {
  const row = database
    .prepare<[string], OperationRecord>("SELECT * FROM operations WHERE operation_id = ?")
    .get(operationId);
  return row ?? null;
}

export function getOperationsByTransaction(database: DatabaseHandle, transactionId: string): OperationRecord[] {
  return database
    .prepare<[string], OperationRecord>("SELECT * FROM operations WHERE transaction_id = ? ORDER BY id ASC")
    .all(transactionId);
}

/**
 * Close an IN_PROGRESS operation. Terminal rows are never touched again.
 */
export function finishOperation(
  database: DatabaseHandle,
  operationId: string,
  status: Exclude<OperationStatus, "IN_PROGRESS">,
  errorMessage: string | null = null,
): void {
  const result = database
    .prepare("UPDATE operations SET status = ?, error_message = ? WHERE operation_id = ? AND status = 'IN_PROGRESS'")
    .run(status, errorMessage, operationId);

  if (result.changes !== 1) {
    throw new Error(`Operation ${operationId} is not in progress`);
  }
}

/**
 * Completed DEPLOY operations that no completed ROLLBACK has undone yet,
 * newest first.
 */
export function getRollbackCandidates(database: DatabaseHandle, transactionId: string): OperationRecord[] {
  return database
    .prepare<[string], OperationRecord>(`
      SELECT o.* FROM operations o
      WHERE o.transaction_id = ?
        AND o.operation_type = 'DEPLOY'
        AND o.status = 'COMPLETED'
        AND NOT EXISTS (
          SELECT 1 FROM operations r
          WHERE r.transaction_id = o.transaction_id
            AND r.file_id = o.file_id
            AND r.operation_type = 'ROLLBACK'
            AND r.status = 'COMPLETED'
            AND r.id > o.id
        )
      ORDER BY o.id DESC
    `)
    .all(transactionId);
}
