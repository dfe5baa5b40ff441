/**
 * txdeploy: transactional file deployment with per-file rollback and project backups
 */

export * from "./config";
export * from "./core";
export { closeDatabase, type DatabaseHandle, IN_MEMORY, openDatabase } from "./db";
export * from "./types";
export {
  computeFileChecksum,
  computeTreeChecksum,
  computeTreeSize,
  getLogLevel,
  listTreeFiles,
  logger,
  setLogLevel,
} from "./utils";
export * from "./validation";
