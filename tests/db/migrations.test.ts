import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { DatabaseHandle } from "../../src/db/connection";
import {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
  initializeDatabase,
  runMigrations,
} from "../../src/db/migrations";

describe("migrations", () => {
  let db: DatabaseHandle;

  beforeEach(() => {
    db = new Database(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  describe("getAllMigrations", () => {
    test("returns the initial migration first", () => {
      const migrations = getAllMigrations();

      expect(migrations[0]?.version).toBe(1);
      expect(migrations[0]?.name).toBe("initial");
    });

    test("returns migrations sorted by version", () => {
      const versions = getAllMigrations().map((m) => m.version);

      expect(versions).toEqual([...versions].sort((a, b) => a - b));
    });
  });

  describe("getCurrentVersion", () => {
    test("is 0 for a fresh database", () => {
      expect(getCurrentVersion(db)).toBe(0);
    });

    test("is the latest version after migrating", () => {
      runMigrations(db);

      expect(getCurrentVersion(db)).toBe(getLatestVersion());
    });
  });

  describe("getPendingMigrations", () => {
    test("returns everything from version 0", () => {
      expect(getPendingMigrations(0)).toHaveLength(getAllMigrations().length);
    });

    test("returns nothing at the latest version", () => {
      expect(getPendingMigrations(getLatestVersion())).toEqual([]);
    });
  });

  describe("initializeDatabase", () => {
    test("creates every table", () => {
      initializeDatabase(db);

      const tables = db
        .prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
        )
        .all()
        .map((row) => row.name);

      expect(tables).toEqual(["backups", "files", "operations", "schema_version", "transactions", "validation_results"]);
    });

    test("is idempotent", () => {
      initializeDatabase(db);
      initializeDatabase(db);

      const rows = db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM schema_version").get();
      expect(rows?.count).toBe(getAllMigrations().length);
    });
  });
});
