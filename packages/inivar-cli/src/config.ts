import { existsSync, readFileSync } from "node:fs";
import { load as parseToml } from "js-toml";
import { type CLILogLevel, LOG_LEVELS } from "./constants.js";
import { getConfigPath } from "./paths.js";

/**
 * Options that apply to every command.
 */
export interface GlobalConfig {
  "log-level"?: CLILogLevel;
  /** Characters that start a comment line */
  "comment-chars"?: string;
  /** Whether show/get resolve references */
  interpolate?: boolean;
}

/**
 * Contents of ~/.inivar/cli.toml
 */
export interface CLIConfig {
  global?: GlobalConfig;
  /** Pairs merged into every section that lacks the key */
  defaults?: Record<string, string>;
}

const TOP_LEVEL_KEYS = new Set(["global", "defaults"]);
const GLOBAL_CONFIG_KEYS = new Set(["log-level", "comment-chars", "interpolate"]);

/**
 * Configuration validation error.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLogLevel(value: string): value is CLILogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function validateString(value: unknown, key: string, section: string): string {
  if (typeof value !== "string") {
    throw new ConfigError(`[${section}].${key} must be a string`);
  }
  return value;
}

function validateBoolean(value: unknown, key: string, section: string): boolean {
  if (typeof value !== "boolean") {
    throw new ConfigError(`[${section}].${key} must be a boolean`);
  }
  return value;
}

function validateGlobalConfig(raw: unknown): GlobalConfig {
  if (!isTable(raw)) {
    throw new ConfigError("[global] must be a table");
  }

  for (const key of Object.keys(raw)) {
    if (!GLOBAL_CONFIG_KEYS.has(key)) {
      throw new ConfigError(`[global].${key} is not a valid option`);
    }
  }

  const result: GlobalConfig = {};
  if ("log-level" in raw) {
    const level = validateString(raw["log-level"], "log-level", "global").toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`[global].log-level must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    result["log-level"] = level;
  }
  if ("comment-chars" in raw) {
    result["comment-chars"] = validateString(raw["comment-chars"], "comment-chars", "global");
  }
  if ("interpolate" in raw) {
    result.interpolate = validateBoolean(raw.interpolate, "interpolate", "global");
  }
  return result;
}

function validateDefaults(raw: unknown): Record<string, string> {
  if (!isTable(raw)) {
    throw new ConfigError("[defaults] must be a table");
  }

  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      result[key] = value;
    } else if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
      result[key] = String(value);
    } else {
      throw new ConfigError(`[defaults].${key} must be a string, number or boolean`);
    }
  }
  return result;
}

/**
 * Validates parsed TOML into a typed configuration.
 *
 * @throws ConfigError naming the offending table or key
 */
export function validateConfig(raw: unknown, configPath?: string): CLIConfig {
  try {
    if (!isTable(raw)) {
      throw new ConfigError("Config must be a table");
    }

    const config: CLIConfig = {};
    for (const [key, value] of Object.entries(raw)) {
      if (!TOP_LEVEL_KEYS.has(key)) {
        throw new ConfigError(`[${key}] is not a valid section`);
      }
      if (key === "global") {
        config.global = validateGlobalConfig(value);
      } else {
        config.defaults = validateDefaults(value);
      }
    }
    return config;
  } catch (error) {
    if (error instanceof ConfigError && configPath && !error.path) {
      throw new ConfigError(error.message, configPath);
    }
    throw error;
  }
}

/**
 * Loads ~/.inivar/cli.toml (or `INIVAR_CONFIG`). A missing file is an empty
 * configuration.
 *
 * @throws ConfigError when the file cannot be read, is not valid TOML, or
 *   fails validation
 */
export function loadConfig(configPath: string = getConfigPath()): CLIConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return validateConfig(raw, configPath);
}
