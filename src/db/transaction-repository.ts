/**
 * Transaction record repository
 */

import type { DeploymentSummary, TransactionInsert, TransactionRecord, TransactionStatus } from "../types";
import type { DatabaseHandle } from "./connection";

export function insertTransaction(database: DatabaseHandle, transaction: TransactionInsert): TransactionRecord {
  database
    .prepare(`
      INSERT INTO transactions (
        transaction_id, created_at, updated_at, user_id, status, project_path, description
      ) VALUES ($transaction_id, $created_at, $created_at, $user_id, 'INITIALIZED', $project_path, $description)
    `)
    .run({
      transaction_id: transaction.transaction_id,
      created_at: transaction.created_at,
      user_id: transaction.user_id,
      project_path: transaction.project_path,
      description: transaction.description ?? null,
    });

  const inserted = getTransactionById(database, transaction.transaction_id);
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted transaction: ${transaction.transaction_id}`);
  }
  return inserted;
}

export function getTransactionById(database: DatabaseHandle, transactionId: string): TransactionRecord | null {
  const row = database
    .prepare<[string], TransactionRecord>("SELECT * FROM transactions WHERE transaction_id = ?")
    .get(transactionId);
  return row ?? null;
}

export function updateTransactionStatus(
  database: DatabaseHandle,
  transactionId: string,
  status: TransactionStatus,
  updatedAt: string,
): void {
  database
    .prepare("UPDATE transactions SET status = ?, updated_at = ? WHERE transaction_id = ?")
    .run(status, updatedAt, transactionId);
}

export function updateTransactionBackup(database: DatabaseHandle, transactionId: string, backupId: string): void {
  database.prepare("UPDATE transactions SET backup_id = ? WHERE transaction_id = ?").run(backupId, transactionId);
}

export interface TransactionFilter {
  projectPath?: string;
  userId?: string;
  limit: number;
}

/**
 * Newest first, with the number of registered files and completed operations
 */
export function listTransactionSummaries(database: DatabaseHandle, filter: TransactionFilter): DeploymentSummary[] {
  const where: string[] = [];
  const params: Array<string | number> = [];

  if (filter.projectPath) {
    where.push("t.project_path = ?");
    params.push(filter.projectPath);
  }
  if (filter.userId) {
    where.push("t.user_id = ?");
    params.push(filter.userId);
  }
  params.push(filter.limit);

  return database
    .prepare<Array<string | number>, DeploymentSummary>(`
      SELECT t.*,
        (SELECT COUNT(*) FROM files f WHERE f.transaction_id = t.transaction_id) AS file_count,
        (SELECT COUNT(*) FROM operations o
          WHERE o.transaction_id = t.transaction_id AND o.status = 'COMPLETED') AS success_count
      FROM transactions t
      ${where.length > 0 ? `WHERE ${where.join(" AND ")}` : ""}
      ORDER BY t.id DESC
      LIMIT ?
    `)
    .all(...params);
}
