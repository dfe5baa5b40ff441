import { rm, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  ConfigError,
  createConfig,
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfig,
  validateConfig,
} from "../../src/config";
import { createTempDir } from "../helpers";

describe("config loader", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir("config");
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(name: string, content: string): Promise<string> {
    const configPath = path.join(tempDir, name);
    await writeFile(configPath, content);
    return configPath;
  }

  describe("loadConfig", () => {
    test("loads YAML and fills in defaults", async () => {
      const configPath = await writeConfig(
        "txdeploy.config.yaml",
        ["version: '1.0'", "backup:", "  compression: false", "  partialExtensions: [.ts, .tsx]", ""].join("\n"),
      );

      const config = await loadConfig(configPath, {});

      expect(config.version).toBe("1.0");
      expect(config.backup).toEqual({
        ...DEFAULT_CONFIG.backup,
        location: path.join(tempDir, "backups"),
        compression: false,
        partialExtensions: [".ts", ".tsx"],
      });
      expect(config.database.path).toBe(path.join(tempDir, "txdeploy.db"));
      expect(config.archive.dirName).toBe(".archive");
      expect(config.logging.level).toBe("info");
    });

    test("loads JSON and keeps absolute and in-memory paths", async () => {
      const configPath = await writeConfig(
        "txdeploy.config.json",
        JSON.stringify({ version: "1.0", database: { path: ":memory:" }, backup: { location: "/var/backups" } }),
      );

      const config = await loadConfig(configPath, {});

      expect(config.database.path).toBe(":memory:");
      expect(config.backup.location).toBe("/var/backups");
    });

    test("applies environment overrides after the file", async () => {
      const configPath = await writeConfig("txdeploy.config.yml", "version: '1.0'\nlogging:\n  level: warn\n");

      const config = await loadConfig(configPath, { TXDEPLOY_LOGGING_LEVEL: "debug" });

      expect(config.logging.level).toBe("debug");
    });

    test("requires a version", async () => {
      const configPath = await writeConfig("txdeploy.config.yaml", "backup:\n  compression: true\n");

      await expect(loadConfig(configPath, {})).rejects.toThrow("Config must have a 'version' field");
    });

    test("reports a missing file", async () => {
      const configPath = path.join(tempDir, "nope.yaml");

      await expect(loadConfig(configPath, {})).rejects.toThrow(`Config file not found: ${configPath}`);
    });

    test("reports malformed JSON", async () => {
      const configPath = await writeConfig("txdeploy.config.json", "{ not json");

      await expect(loadConfig(configPath, {})).rejects.toThrow(/^Failed to parse JSON: /);
    });

    test("rejects a document that is not a mapping", async () => {
      const configPath = await writeConfig("txdeploy.config.yaml", "- one\n- two\n");

      await expect(loadConfig(configPath, {})).rejects.toThrow("Config must be an object");
    });

    test("rejects unknown extensions", async () => {
      const configPath = await writeConfig("txdeploy.config.toml", "version = '1.0'");

      await expect(loadConfig(configPath, {})).rejects.toThrow(
        "Unsupported config file format: .toml. Use .yaml, .yml, or .json",
      );
    });
  });

  describe("findConfigFile", () => {
    test("prefers the YAML name", async () => {
      await writeConfig("txdeploy.config.json", "{}");
      await writeConfig("txdeploy.config.yaml", "");

      expect(findConfigFile(tempDir)).toBe(path.join(tempDir, "txdeploy.config.yaml"));
    });

    test("returns null when nothing is there", () => {
      expect(findConfigFile(tempDir)).toBeNull();
    });
  });

  describe("createConfig", () => {
    test("merges overrides over the defaults", () => {
      const config = createConfig({ database: { path: ":memory:" }, backup: { type: "CONFIG" } });

      expect(config.version).toBe("1.0");
      expect(config.database.path).toBe(":memory:");
      expect(config.backup.type).toBe("CONFIG");
      expect(config.backup.compressionLevel).toBe(6);
    });
  });

  describe("validateConfig", () => {
    const valid = { version: "1.0", ...DEFAULT_CONFIG };

    test.each([
      [{ ...valid, database: undefined }, "Config must have a 'database' section"],
      [{ ...valid, database: { path: "" } }, "database.path must be a non-empty string"],
      [{ ...valid, backup: { ...valid.backup, type: "INCREMENTAL" } }, "backup.type must be one of FULL, PARTIAL, CONFIG"],
      [
        { ...valid, backup: { ...valid.backup, compressionLevel: 10 } },
        "backup.compressionLevel must be an integer between 0 and 9",
      ],
      [{ ...valid, backup: { ...valid.backup, autoBackup: "yes" } }, "backup.autoBackup must be a boolean"],
      [{ ...valid, archive: { dirName: "a/b" } }, "archive.dirName must be a single directory name"],
      [{ ...valid, logging: { level: "trace" } }, "logging.level must be one of debug, info, warn, error"],
    ])("rejects %j", (config, message) => {
      expect(() => validateConfig(config)).toThrow(new ConfigError(message));
    });
  });
});
