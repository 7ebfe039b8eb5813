import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

/**
 * tslog level ids by name.
 */
export const LOG_LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

export type LogLevelName = keyof typeof LOG_LEVELS;

function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Parses a level given either as a number (clamped to 0-6) or as a level name.
 */
export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return isLogLevelName(normalized) ? LOG_LEVELS[normalized] : undefined;
}

function parseEnvBoolean(value?: string): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn)
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' for development, 'json' for production, 'hidden' to silence
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /**
   * Logger name (appears in logs)
   * @default 'inivar'
   */
  name?: string;

  /**
   * Truncate the log file instead of appending to it.
   * @default false
   */
  logReset?: boolean;

  /**
   * Stream that receives pretty and JSON output in place of the console.
   * Ignored while `INIVAR_LOG_FILE` is active.
   */
  output?: NodeJS.WritableStream;
}

// All loggers writing to INIVAR_LOG_FILE share one stream
let sharedLogFilePath: string | undefined;
let sharedLogFileStream: WriteStream | undefined;
let writeErrorCount = 0;
const MAX_WRITE_ERRORS_BEFORE_DISABLE = 5;

const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

/**
 * Strips ANSI color codes from a string.
 */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Closes the shared log file stream and forgets its path.
 * @internal
 */
export function _resetFileLoggingState(): void {
  sharedLogFileStream?.end();
  sharedLogFileStream = undefined;
  sharedLogFilePath = undefined;
  writeErrorCount = 0;
}

function disableFileLogging(): void {
  console.error(`[inivar] Too many log file errors (${writeErrorCount}), disabling file logging`);
  sharedLogFileStream?.end();
  sharedLogFileStream = undefined;
}

function openLogFile(path: string, reset: boolean): void {
  if (sharedLogFileStream && sharedLogFilePath === path) {
    return;
  }
  sharedLogFileStream?.end();
  sharedLogFileStream = undefined;

  try {
    mkdirSync(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: reset ? "w" : "a" });
    writeErrorCount = 0;
    stream.on("error", (error) => {
      writeErrorCount++;
      if (writeErrorCount === 1) {
        console.error(`[inivar] Log file write error: ${error.message}`);
      }
      if (writeErrorCount >= MAX_WRITE_ERRORS_BEFORE_DISABLE) {
        disableFileLogging();
      }
    });
    sharedLogFileStream = stream;
    sharedLogFilePath = path;
  } catch (error) {
    console.error("Failed to initialize INIVAR_LOG_FILE output:", error);
  }
}

function formatArgs(logArgs: unknown[]): string {
  return logArgs.map((arg) => (typeof arg === "string" ? arg : JSON.stringify(arg))).join(" ");
}

function writeToLogFile(logMetaMarkup: string, logArgs: unknown[]): void {
  if (!sharedLogFileStream) return;
  sharedLogFileStream.write(`${stripAnsi(logMetaMarkup)}${stripAnsi(formatArgs(logArgs))}\n`);
}

function streamOverwrite(output: NodeJS.WritableStream) {
  return {
    transportFormatted: (logMetaMarkup: string, logArgs: unknown[], logErrors: string[]) => {
      const errors = logErrors.length > 0 ? `\n${logErrors.join("\n")}` : "";
      output.write(`${logMetaMarkup}${formatArgs(logArgs)}${errors}\n`);
    },
    transportJSON: (json: unknown) => {
      output.write(`${JSON.stringify(json)}\n`);
    },
  };
}

/**
 * Create a logger.
 *
 * Options take priority over the `INIVAR_LOG_LEVEL`, `INIVAR_LOG_FILE` and
 * `INIVAR_LOG_RESET` environment variables.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ minLevel: 2 });
 * const ini = new Ini({ logger });
 *
 * // Silent logger for tests
 * const quiet = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const minLevel = options.minLevel ?? parseLogLevel(process.env.INIVAR_LOG_LEVEL) ?? 4;
  const type = options.type ?? "pretty";
  const logFile = process.env.INIVAR_LOG_FILE?.trim() ?? "";

  if (logFile) {
    openLogFile(logFile, options.logReset ?? parseEnvBoolean(process.env.INIVAR_LOG_RESET) ?? false);
  }

  // File output goes through tslog's pretty formatter, redirected by `overwrite`
  const useFileLogging = Boolean(sharedLogFileStream);

  return new Logger<ILogObj>({
    name: options.name ?? "inivar",
    minLevel,
    type: useFileLogging ? "pretty" : type,
    hideLogPositionForProduction: useFileLogging || type !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: useFileLogging
      ? {
          transportFormatted: (logMetaMarkup: string, logArgs: unknown[]) =>
            writeToLogFile(logMetaMarkup, logArgs),
        }
      : options.output
        ? streamOverwrite(options.output)
        : undefined,
  });
}

/**
 * Logger used by {@link Ini} when none is passed in.
 */
export const defaultLogger = createLogger();
