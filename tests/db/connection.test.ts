import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { closeDatabase, type DatabaseHandle, IN_MEMORY, openDatabase, runInTransaction } from "../../src/db/connection";
import { getCurrentVersion, getLatestVersion } from "../../src/db/migrations";

describe("connection", () => {
  let tempDir: string;
  const opened: DatabaseHandle[] = [];

  async function open(dbPath: string): Promise<DatabaseHandle> {
    const db = await openDatabase(dbPath);
    opened.push(db);
    return db;
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "txdeploy-connection-test-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    for (const db of opened.splice(0)) {
      closeDatabase(db);
    }
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("openDatabase", () => {
    test("creates new database with all migrations applied", async () => {
      const db = await open(path.join(tempDir, "new.db"));

      expect(getCurrentVersion(db)).toBe(getLatestVersion());
    });

    test("creates parent directories if they don't exist", async () => {
      const dbPath = path.join(tempDir, "nested", "path", "db.sqlite");

      await open(dbPath);

      expect(existsSync(dbPath)).toBe(true);
    });

    test("returns independent handles for each call", async () => {
      const dbPath = path.join(tempDir, "twice.db");

      const db1 = await open(dbPath);
      const db2 = await open(dbPath);

      expect(db1).not.toBe(db2);
    });

    test("opens an in-memory database", async () => {
      const db = await open(IN_MEMORY);

      expect(db.memory).toBe(true);
      expect(getCurrentVersion(db)).toBe(getLatestVersion());
    });

    test("enables foreign keys", async () => {
      const db = await open(IN_MEMORY);

      expect(db.pragma("foreign_keys", { simple: true })).toBe(1);
    });

    test("migrates an existing database and removes the migration backup", async () => {
      const dbPath = path.join(tempDir, "legacy.db");
      const legacy = new Database(dbPath);
      legacy.exec("CREATE TABLE notes (id INTEGER PRIMARY KEY)");
      legacy.close();

      const db = await open(dbPath);

      expect(getCurrentVersion(db)).toBe(getLatestVersion());
      expect(existsSync(`${dbPath}.migration-backup`)).toBe(false);
    });

    test("restores the original file when a migration fails", async () => {
      const dbPath = path.join(tempDir, "conflict.db");
      const legacy = new Database(dbPath);
      legacy.exec("CREATE TABLE transactions (id INTEGER PRIMARY KEY)");
      legacy.close();
      vi.spyOn(console, "error").mockImplementation(() => {});

      await expect(openDatabase(dbPath)).rejects.toThrow("Database migration failed and was rolled back");

      const reopened = new Database(dbPath);
      const tables = reopened
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
        .all()
        .map((row) => row.name);
      reopened.close();

      expect(tables).toEqual(["transactions"]);
      expect(existsSync(`${dbPath}.migration-backup`)).toBe(false);
    });
  });

  describe("closeDatabase", () => {
    test("closes an open handle and tolerates a second call", async () => {
      const db = await openDatabase(IN_MEMORY);

      closeDatabase(db);
      closeDatabase(db);

      expect(db.open).toBe(false);
    });
  });

  describe("runInTransaction", () => {
    test("commits on success and rolls back on throw", async () => {
      const db = await open(IN_MEMORY);
      db.exec("CREATE TABLE items (name TEXT)");

      runInTransaction(db, () => db.prepare("INSERT INTO items VALUES ('kept')").run());
      expect(() =>
        runInTransaction(db, () => {
          db.prepare("INSERT INTO items VALUES ('dropped')").run();
          throw new Error("abort");
        }),
      ).toThrow("abort");

      const names = db.prepare<[], { name: string }>("SELECT name FROM items").all().map((row) => row.name);
      expect(names).toEqual(["kept"]);
    });
  });
});
