/**
 * File-level checks every deployable source must pass
 */

import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { errorMessage } from "../core/errors";
import type { Diagnostic, ValidationReport, Validator } from "../types";
import { isNotFoundError } from "../utils/path";

// Diagnostics that apply to the whole file carry line 0
const FILE_LEVEL = 0;

export class BasicFileValidator implements Validator {
  async validate(filePath: string): Promise<ValidationReport> {
    const errors: Diagnostic[] = [];
    const warnings: Diagnostic[] = [];

    let size: number;
    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) {
        errors.push({ line: FILE_LEVEL, message: `Not a regular file: ${filePath}`, rule: "FileReadability" });
        return { status: "FAIL", errors, warnings };
      }
      size = stats.size;
    } catch (err) {
      if (!isNotFoundError(err)) throw err;
      errors.push({ line: FILE_LEVEL, message: `File does not exist: ${filePath}`, rule: "FileExistence" });
      return { status: "FAIL", errors, warnings };
    }

    try {
      await access(filePath, constants.R_OK);
    } catch (err) {
      errors.push({ line: FILE_LEVEL, message: `Cannot read file: ${errorMessage(err)}`, rule: "FileReadability" });
      return { status: "FAIL", errors, warnings };
    }

    if (size === 0) {
      warnings.push({ line: FILE_LEVEL, message: "File is empty", rule: "EmptyFile" });
    }

    return { status: warnings.length > 0 ? "WARNING" : "PASS", errors, warnings };
  }
}
