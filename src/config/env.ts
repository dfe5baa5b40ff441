/**
 * Environment variable overrides and dotted-key lookup
 */

import type { DeployerConfig } from "../types";
import { logger } from "../utils/logger";
import { deepMerge, isRecord, toRecord } from "./defaults";
import { ConfigError, validateConfig } from "./validator";

export const ENV_PREFIX = "TXDEPLOY";

const ENV_SECTIONS = ["database", "backup", "archive", "logging"] as const;

type EnvSection = (typeof ENV_SECTIONS)[number];

const TRUE_VALUES = ["true", "1", "yes", "on"];
const FALSE_VALUES = ["false", "0", "no", "off"];

/**
 * `backup` + `autoBackup` -> `TXDEPLOY_BACKUP_AUTO_BACKUP`
 */
export function envVarName(section: EnvSection, key: string): string {
  const snake = key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase();
  return `${ENV_PREFIX}_${section.toUpperCase()}_${snake}`;
}

function coerceEnvValue(name: string, raw: string, current: unknown): unknown {
  if (typeof current === "boolean") {
    const normalized = raw.trim().toLowerCase();
    if (TRUE_VALUES.includes(normalized)) return true;
    if (FALSE_VALUES.includes(normalized)) return false;
    throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
  }

  if (typeof current === "number") {
    const value = Number(raw);
    if (raw.trim() === "" || Number.isNaN(value)) {
      throw new ConfigError(`${name} must be a number, got "${raw}"`);
    }
    return value;
  }

  if (Array.isArray(current)) {
    return raw
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  return raw;
}

/**
 * Override scalar settings from `TXDEPLOY_<SECTION>_<KEY>` variables. Values
 * are coerced to the type of the setting they replace.
 */
export function applyEnvOverrides(
  config: DeployerConfig,
  env: Record<string, string | undefined> = process.env,
): DeployerConfig {
  const overrides: Record<string, unknown> = {};

  for (const section of ENV_SECTIONS) {
    const values: Record<string, unknown> = {};
    const entries: Array<[string, unknown]> = Object.entries(config[section]);

    for (const [key, current] of entries) {
      const name = envVarName(section, key);
      const raw = env[name];
      if (raw === undefined) continue;

      values[key] = coerceEnvValue(name, raw, current);
      logger.debug(`Config override from ${name}`);
    }

    if (Object.keys(values).length > 0) {
      overrides[section] = values;
    }
  }

  if (Object.keys(overrides).length === 0) {
    return config;
  }

  return validateConfig(deepMerge(toRecord(config), overrides));
}

/**
 * Look up a setting by dotted key, e.g. `backup.autoBackup`
 */
export function getConfigValue(config: DeployerConfig, key: string): unknown {
  let current: unknown = toRecord(config);

  for (const part of key.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }

  return current;
}
