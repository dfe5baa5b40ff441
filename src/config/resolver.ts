/**
 * Configuration path resolution
 */

import * as path from "node:path";
import { IN_MEMORY } from "../db/connection";
import type { DeployerConfig } from "../types";

/**
 * Resolve relative paths in config against the config file's directory
 */
export function resolvePaths(config: DeployerConfig, configPath: string): DeployerConfig {
  const configDir = path.dirname(path.resolve(configPath));

  const resolve = (value: string): string => (path.isAbsolute(value) ? value : path.resolve(configDir, value));

  return {
    ...config,
    database: {
      ...config.database,
      path: config.database.path === IN_MEMORY ? IN_MEMORY : resolve(config.database.path),
    },
    backup: {
      ...config.backup,
      location: resolve(config.backup.location),
    },
  };
}
