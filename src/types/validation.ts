/**
 * Ports the ledger and engine call out through
 */

import type { ValidationStatus } from "./database";

export interface Diagnostic {
  line: number;
  message: string;
  rule: string;
}

export interface ValidationReport {
  status: ValidationStatus;
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

/**
 * Judges a single source file before it may be deployed.
 */
export interface Validator {
  validate(filePath: string): Promise<ValidationReport>;
}

/**
 * Places one file at its destination. Returning `false` or throwing marks the
 * deploy operation failed; a thrown error's message is kept on the operation.
 */
export interface FileDeployer {
  deploy(sourcePath: string, destinationPath: string, expectedChecksum?: string | null): Promise<boolean>;
}

/**
 * Undoes one deployed file.
 */
export interface FileRestorer {
  restore(destinationPath: string): Promise<boolean>;
}
