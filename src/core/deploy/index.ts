/**
 * Deployment module exports
 */

export {
  type ArchiveEntry,
  ArchiveStore,
  type ArchiveStoreOptions,
  DEFAULT_ARCHIVE_DIR,
  type RestoreOutcome,
} from "./archive-store";
export { DeploymentEngine, type DeploymentEngineOptions } from "./engine";
export { CopyFileDeployer } from "./file-deployer";
