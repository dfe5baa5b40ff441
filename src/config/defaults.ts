/**
 * Default configuration values
 */

import type { DeployerConfig } from "../types";

// version is not defaulted, it must be specified by the user
export const DEFAULT_CONFIG: Omit<DeployerConfig, "version"> = {
  database: {
    path: "./txdeploy.db",
  },
  backup: {
    location: "./backups",
    autoBackup: true,
    type: "FULL",
    compression: true,
    compressionLevel: 6,
    excludeDir: ".Exclude",
    partialExtensions: [".ts"],
  },
  archive: {
    dirName: ".archive",
  },
  logging: {
    level: "info",
  },
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Shallow copy of an object as a string-keyed record
 */
export function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
