export type { CLIConfig, GlobalConfig } from "./config.js";
export { ConfigError, loadConfig, validateConfig } from "./config.js";
export type { CLIEnvironment, CLILoggerConfig } from "./environment.js";
export { createDefaultEnvironment } from "./environment.js";
export type { RunCLIOptions } from "./program.js";
export { createProgram, runCLI } from "./program.js";
