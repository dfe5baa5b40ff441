/**
 * Database connection management
 */

import { access, copyFile, mkdir, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { errorMessage } from "../core/errors";
import { info, warn, error as logError } from "../utils/logger";
import { getCurrentVersion, getLatestVersion, getPendingMigrations, initializeDatabase } from "./migrations";

export type DatabaseHandle = Database.Database;

export const IN_MEMORY = ":memory:";

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function removeQuietly(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (err) {
    warn(`Could not remove ${filePath}: ${errorMessage(err)}`);
  }
}

/**
 * Open (creating if needed) the record store and bring its schema up to date.
 * An existing file is copied aside before pending migrations run and copied
 * back if any of them fails.
 */
export async function openDatabase(dbPath: string): Promise<DatabaseHandle> {
  if (dbPath === IN_MEMORY) {
    const db = new Database(IN_MEMORY);
    initializeDatabase(db);
    return db;
  }

  await mkdir(dirname(dbPath), { recursive: true });

  if (await fileExists(dbPath)) {
    const tempDb = new Database(dbPath);
    const currentVersion = getCurrentVersion(tempDb);
    const pending = getPendingMigrations(currentVersion);
    tempDb.close();

    if (pending.length > 0) {
      const backupPath = `${dbPath}.migration-backup`;
      info(`Pending migrations detected (${pending.length}), creating backup...`);
      await copyFile(dbPath, backupPath);

      let db: DatabaseHandle | null = null;
      try {
        db = new Database(dbPath);
        initializeDatabase(db);
        info(`Migrations completed successfully (v${currentVersion} -> v${getLatestVersion()})`);
        await removeQuietly(backupPath);
        return db;
      } catch (err) {
        logError(`Migration failed: ${errorMessage(err)}`);
        info("Rolling back database from backup...");
        db?.close();
        await copyFile(backupPath, dbPath);
        await removeQuietly(backupPath);
        throw new Error(`Database migration failed and was rolled back: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }
  }

  const db = new Database(dbPath);
  initializeDatabase(db);
  return db;
}

export function closeDatabase(database: DatabaseHandle): void {
  if (database.open) {
    database.close();
  }
}

/**
 * Run `fn` inside BEGIN/COMMIT; any throw rolls the unit back and propagates.
 */
export function runInTransaction<T>(database: DatabaseHandle, fn: () => T): T {
  return database.transaction(fn)();
}
