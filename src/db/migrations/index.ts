import type { DatabaseHandle } from "../connection";
import type { Migration } from "../../types/database";

import { migration as m0001 } from "./0001_initial";

const migrations: Migration[] = [m0001];

export function getAllMigrations(): Migration[] {
  return [...migrations].sort((a, b) => a.version - b.version);
}

export function getLatestVersion(): number {
  const all = getAllMigrations();
  const lastMigration = all[all.length - 1];
  return lastMigration ? lastMigration.version : 0;
}

function hasVersionTable(database: DatabaseHandle): boolean {
  const row = database
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'",
    )
    .get();
  return row !== undefined;
}

export function getCurrentVersion(database: DatabaseHandle): number {
  if (!hasVersionTable(database)) {
    return 0;
  }
  const row = database
    .prepare<[], { version: number | null }>("SELECT MAX(version) as version FROM schema_version")
    .get();
  return row?.version ?? 0;
}

export function getPendingMigrations(currentVersion: number): Migration[] {
  return getAllMigrations().filter((m) => m.version > currentVersion);
}

function runMigrationStatements(database: DatabaseHandle, sql: string): void {
  const statements = sql
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  for (const stmt of statements) {
    database.exec(stmt);
  }
}

export function runMigrations(database: DatabaseHandle): void {
  const pending = getPendingMigrations(getCurrentVersion(database));

  for (const migration of pending) {
    database.transaction(() => {
      runMigrationStatements(database, migration.up);
      database.prepare("INSERT INTO schema_version (version) VALUES (?)").run(migration.version);
    })();
  }
}

export function initializeDatabase(database: DatabaseHandle): void {
  database.pragma("journal_mode = WAL");
  database.pragma("foreign_keys = ON");
  runMigrations(database);
}
