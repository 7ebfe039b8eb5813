import { readFile } from "node:fs/promises";
import { createLogger, type ILogObj, type Logger, LOG_LEVELS, type LoggerOptions } from "inivar";
import type { CLILogLevel } from "./constants.js";

/**
 * Logger configuration for CLI commands.
 */
export interface CLILoggerConfig {
  logLevel?: CLILogLevel;
}

/**
 * I/O and dependencies used by commands, injectable for tests.
 */
export interface CLIEnvironment {
  argv: string[];
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  setExitCode: (code: number) => void;
  createLogger: (name: string) => Logger<ILogObj>;
  /** Reads a document from disk as UTF-8 */
  readFile: (path: string) => Promise<string>;
}

/**
 * Creates a logger factory. Priority: --log-level > config > INIVAR_LOG_LEVEL.
 * Console output goes to `output`, keeping stdout for command results.
 */
export function createLoggerFactory(
  config?: CLILoggerConfig,
  output: NodeJS.WritableStream = process.stderr,
): (name: string) => Logger<ILogObj> {
  return (name: string) => {
    const options: LoggerOptions = { name, output };
    if (config?.logLevel) {
      options.minLevel = LOG_LEVELS[config.logLevel];
    }
    return createLogger(options);
  };
}

/**
 * Creates the default environment from Node.js process globals.
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  return {
    argv: process.argv,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    createLogger: createLoggerFactory(loggerConfig),
    readFile: (path: string) => readFile(path, "utf-8"),
  };
}
