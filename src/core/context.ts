/**
 * Builds the deployment components from a loaded configuration
 */

import { closeDatabase, type DatabaseHandle, openDatabase } from "../db";
import type { DeployerConfig, Validator } from "../types";
import { logger, setLogLevel } from "../utils/logger";
import { BasicFileValidator } from "../validation/basic-validator";
import { BackupManager } from "./backup/manager";
import { ArchiveStore } from "./deploy/archive-store";
import { DeploymentEngine } from "./deploy/engine";
import { TransactionLedger } from "./transaction/ledger";

export interface DeploymentContextOptions {
  validator?: Validator;
  /** Parent of backup staging and extraction directories */
  tmpDir?: string;
}

export interface DeploymentContext {
  config: DeployerConfig;
  database: DatabaseHandle;
  ledger: TransactionLedger;
  archives: ArchiveStore;
  backups: BackupManager;
  engine: DeploymentEngine;
  close(): void;
}

export async function createDeploymentContext(
  config: DeployerConfig,
  options: DeploymentContextOptions = {},
): Promise<DeploymentContext> {
  setLogLevel(config.logging.level);

  const database = await openDatabase(config.database.path);
  const ledger = new TransactionLedger(database);
  const archives = new ArchiveStore({ dirName: config.archive.dirName });
  const backups = new BackupManager(database, {
    location: config.backup.location,
    defaultType: config.backup.type,
    compression: config.backup.compression,
    compressionLevel: config.backup.compressionLevel,
    excludeDir: config.backup.excludeDir,
    partialExtensions: config.backup.partialExtensions,
    tmpDir: options.tmpDir,
  });
  const engine = new DeploymentEngine({
    ledger,
    backups,
    archives,
    validator: options.validator ?? new BasicFileValidator(),
    autoBackup: config.backup.autoBackup,
    backupType: config.backup.type,
  });

  logger.debug(`Deployment context ready (database: ${config.database.path})`);

  return {
    config,
    database,
    ledger,
    archives,
    backups,
    engine,
    close: () => closeDatabase(database),
  };
}
