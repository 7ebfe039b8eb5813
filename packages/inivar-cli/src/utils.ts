import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { type ExtractType, EXTRACT_TYPES, isExtractType, trim, trimEnd, trimStart } from "inivar";
import { type CLILogLevel, LOG_LEVELS, OUTPUT_FORMATS, type OutputFormat } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";

/**
 * Parses and validates the log level option value.
 */
export function parseLogLevelOption(value: string): CLILogLevel {
  const normalized = value.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

export function parseFormatOption(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new InvalidArgumentError(`Format must be one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return format;
}

export function parseTypeOption(value: string): ExtractType {
  if (!isExtractType(value)) {
    throw new InvalidArgumentError(`Type must be one of: ${EXTRACT_TYPES.join(", ")}`);
  }
  return value;
}

/**
 * Accumulates repeated `--default key=value` options. The key and value are
 * trimmed the way the INI parser trims a `key=value` line.
 */
export function collectDefault(
  value: string,
  previous: Record<string, string> = {},
): Record<string, string> {
  const assignAt = value.indexOf("=");
  const key = assignAt === -1 ? "" : trimEnd(value.slice(0, assignAt));
  if (key.length === 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${value}"`);
  }
  return { ...previous, [trimStart(key)]: trim(value.slice(assignAt + 1)) };
}

/**
 * Reads all data from a readable stream into a string. Chunks are decoded
 * together, so a UTF-8 sequence split across chunks survives.
 */
export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Runs a command body, printing any error to stderr and setting exit code 1.
 */
export async function executeAction(
  action: () => Promise<void>,
  env: CLIEnvironment,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    env.stderr.write(`${chalk.red.bold("Error:")} ${message}\n`);
    env.setExitCode(1);
  }
}
