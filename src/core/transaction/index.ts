/**
 * Transaction module exports
 */

export { TransactionLedger, type TransactionLedgerOptions } from "./ledger";
export { assertTransition, canTransition, getAllowedTransitions, isTerminal } from "./state-machine";
