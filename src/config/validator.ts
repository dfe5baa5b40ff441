/**
 * Configuration validation
 */

import { BACKUP_TYPES, type DeployerConfig } from "../types";
import { isLogLevel, LOG_LEVELS } from "../utils/logger";
import { isRecord } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type SectionParsers = { [K in keyof DeployerConfig]: (value: unknown) => DeployerConfig[K] };

function requireSection(value: unknown, name: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return value;
}

function requireString(section: Record<string, unknown>, key: string, name: string): string {
  const value = section[key];
  if (!value || typeof value !== "string") {
    throw new ConfigError(`${name}.${key} must be a non-empty string`);
  }
  return value;
}

function requireBoolean(section: Record<string, unknown>, key: string, name: string): boolean {
  const value = section[key];
  if (typeof value !== "boolean") {
    throw new ConfigError(`${name}.${key} must be a boolean`);
  }
  return value;
}

const parsers: SectionParsers = {
  version: (value) => {
    if (!value || typeof value !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
    return value;
  },

  database: (value) => {
    const db = requireSection(value, "database");
    return { path: requireString(db, "path", "database") };
  },

  backup: (value) => {
    const backup = requireSection(value, "backup");

    const type = BACKUP_TYPES.find((t) => t === backup.type);
    if (!type) {
      throw new ConfigError(`backup.type must be one of ${BACKUP_TYPES.join(", ")}`);
    }

    const level = backup.compressionLevel;
    if (typeof level !== "number" || !Number.isInteger(level) || level < 0 || level > 9) {
      throw new ConfigError("backup.compressionLevel must be an integer between 0 and 9");
    }

    const extensions = backup.partialExtensions;
    if (!Array.isArray(extensions)) {
      throw new ConfigError("backup.partialExtensions must be an array");
    }
    const partialExtensions: string[] = [];
    for (const ext of extensions) {
      if (typeof ext !== "string" || ext.length === 0) {
        throw new ConfigError("backup.partialExtensions must contain only non-empty strings");
      }
      partialExtensions.push(ext);
    }

    return {
      location: requireString(backup, "location", "backup"),
      autoBackup: requireBoolean(backup, "autoBackup", "backup"),
      type,
      compression: requireBoolean(backup, "compression", "backup"),
      compressionLevel: level,
      excludeDir: requireString(backup, "excludeDir", "backup"),
      partialExtensions,
    };
  },

  archive: (value) => {
    const archive = requireSection(value, "archive");
    const dirName = requireString(archive, "dirName", "archive");
    if (dirName.includes("/") || dirName.includes("\\") || dirName === "." || dirName === "..") {
      throw new ConfigError("archive.dirName must be a single directory name");
    }
    return { dirName };
  },

  logging: (value) => {
    const logging = requireSection(value, "logging");
    if (!isLogLevel(logging.level)) {
      throw new ConfigError(`logging.level must be one of ${LOG_LEVELS.join(", ")}`);
    }
    return { level: logging.level };
  },
};

/**
 * Validate a merged configuration object and return it typed
 */
export function validateConfig(config: unknown): DeployerConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  return {
    version: parsers.version(config.version),
    database: parsers.database(config.database),
    backup: parsers.backup(config.backup),
    archive: parsers.archive(config.archive),
    logging: parsers.logging(config.logging),
  };
}
