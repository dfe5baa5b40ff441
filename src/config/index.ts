/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge, isRecord, toRecord } from "./defaults";
// Environment
export { applyEnvOverrides, ENV_PREFIX, envVarName, getConfigValue } from "./env";
// Loader
export { CONFIG_FILE_NAMES, createConfig, findAndLoadConfig, findConfigFile, loadConfig } from "./loader";
// Resolver
export { resolvePaths } from "./resolver";
// Validator
export { ConfigError, validateConfig } from "./validator";
