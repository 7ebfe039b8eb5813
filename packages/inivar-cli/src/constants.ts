export const CLI_NAME = "inivar";
export const CLI_VERSION = "1.0.0";
export const CLI_DESCRIPTION = "Parse, check and interpolate INI files.";

export const COMMANDS = {
  show: "show",
  get: "get",
  check: "check",
  config: "config",
} as const;

export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type CLILogLevel = (typeof LOG_LEVELS)[number];

export const OUTPUT_FORMATS = ["ini", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const OPTION_FLAGS = {
  logLevel: "--log-level <level>",
  commentChars: "--comment-chars <chars>",
  defaultValue: "-d, --default <key=value>",
  interpolate: "--interpolate",
  noInterpolate: "--no-interpolate",
  format: "-f, --format <format>",
  type: "-t, --type <type>",
} as const;

export const OPTION_DESCRIPTIONS = {
  logLevel: `Log level: ${LOG_LEVELS.join(", ")}`,
  commentChars: "Characters that start a comment line (default: ;)",
  defaultValue: "Default key=value added to every section lacking it (repeatable)",
  interpolate: "Resolve ${key} and ${section:key} references (default)",
  noInterpolate: "Keep references as written",
  format: `Output format: ${OUTPUT_FORMATS.join(", ")}`,
  type: "Read the value as integer, number, boolean or string",
} as const;

/** Filename argument that reads the document from stdin */
export const STDIN_FILENAME = "-";

export const SUMMARY_PREFIX = "[inivar]";
