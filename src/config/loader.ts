/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { DeployerConfig } from "../types";
import { errorMessage } from "../core/errors";
import { isNotFoundError } from "../utils/path";
import { DEFAULT_CONFIG, deepMerge, isRecord, toRecord } from "./defaults";
import { applyEnvOverrides } from "./env";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = ["txdeploy.config.yaml", "txdeploy.config.yml", "txdeploy.config.json"];

/**
 * Merge partial settings over the defaults and validate them
 */
export function createConfig(overrides: Record<string, unknown> = {}): DeployerConfig {
  return validateConfig(deepMerge({ version: "1.0", ...toRecord(DEFAULT_CONFIG) }, overrides));
}

/**
 * Load and parse a config file
 */
export async function loadConfig(
  configPath: string,
  env: Record<string, string | undefined> = process.env,
): Promise<DeployerConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch (err) {
    if (isNotFoundError(err)) {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw err;
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  if (!isRecord(parsed)) {
    throw new ConfigError("Config must be an object");
  }

  const merged = deepMerge(toRecord(DEFAULT_CONFIG), parsed);
  const config = applyEnvOverrides(validateConfig(merged), env);

  return resolvePaths(config, absolutePath);
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath)) {
      return configPath;
    }
  }

  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(configPath?: string): Promise<DeployerConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError("No config file found. Create txdeploy.config.yaml or pass a config path");
  }

  return loadConfig(found);
}
