/**
 * Transaction lifecycle graph
 */

import type { TransactionStatus } from "../../types";
import { InvalidStateError } from "../errors";

const TRANSITIONS: Record<TransactionStatus, readonly TransactionStatus[]> = {
  INITIALIZED: ["VALIDATED"],
  // Files registered after validation send the transaction back for re-validation
  VALIDATED: ["IN_PROGRESS", "INITIALIZED"],
  IN_PROGRESS: ["COMPLETED", "FAILED"],
  COMPLETED: ["ROLLED_BACK"],
  FAILED: ["ROLLED_BACK"],
  ROLLED_BACK: [],
};

export function canTransition(from: TransactionStatus, to: TransactionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function getAllowedTransitions(from: TransactionStatus): readonly TransactionStatus[] {
  return TRANSITIONS[from];
}

/**
 * Throws InvalidStateError when `from -> to` is not an edge of the graph.
 */
export function assertTransition(
  transactionId: string,
  from: TransactionStatus,
  to: TransactionStatus,
  action: string,
): void {
  if (!canTransition(from, to)) {
    throw new InvalidStateError(transactionId, from, action);
  }
}

export function isTerminal(status: TransactionStatus): boolean {
  return TRANSITIONS[status].length === 0;
}
