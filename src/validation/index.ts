/**
 * Validation module exports
 */

export { BasicFileValidator } from "./basic-validator";
