/**
 * Backup module exports
 */

export { createTarGzip, extractTarGzip, locateExtractedRoot, normalizeEntryPath } from "./archive-creator";
export {
  CONFIG_PATTERNS,
  type CollectOptions,
  collectFiles,
  copyTree,
  isConfigFile,
  matchesPattern,
  stageFiles,
} from "./file-collector";
export { BackupManager, type BackupManagerOptions, METADATA_FILE } from "./manager";
