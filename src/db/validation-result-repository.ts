/**
 * Per-file validation diagnostics
 */

import type { ValidationResultInsert, ValidationResultRecord } from "../types";
import type { DatabaseHandle } from "./connection";

export function replaceValidationResults(
  database: DatabaseHandle,
  fileId: string,
  results: ValidationResultInsert[],
): void {
  database.prepare("DELETE FROM validation_results WHERE file_id = ?").run(fileId);

  const stmt = database.prepare(`
    INSERT INTO validation_results (file_id, severity, rule, line, message, created_at)
    VALUES ($file_id, $severity, $rule, $line, $message, $created_at)
  `);
  for (const result of results) {
    stmt.run(result);
  }
}

export function getValidationResultsByTransaction(
  database: DatabaseHandle,
  transactionId: string,
): ValidationResultRecord[] {
  return database
    .prepare<[string], ValidationResultRecord>(`
      SELECT v.* FROM validation_results v
      JOIN files f ON f.file_id = v.file_id
      WHERE f.transaction_id = ?
      ORDER BY f.id ASC, v.id ASC
    `)
    .all(transactionId);
}
