import { Command } from "commander";
import { registerCheckCommand } from "./check-command.js";
import { type CLIConfig, loadConfig } from "./config.js";
import { registerConfigCommand } from "./config-command.js";
import {
  CLI_DESCRIPTION,
  CLI_NAME,
  CLI_VERSION,
  type CLILogLevel,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import {
  type CLIEnvironment,
  createDefaultEnvironment,
  createLoggerFactory,
} from "./environment.js";
import { registerGetCommand } from "./get-command.js";
import { registerShowCommand } from "./show-command.js";
import { parseLogLevelOption } from "./utils.js";

interface GlobalOptions {
  logLevel?: CLILogLevel;
}

/**
 * Creates the CLI program with all commands registered.
 */
export function createProgram(env: CLIEnvironment, config?: CLIConfig): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(CLI_VERSION)
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .configureOutput({
      writeOut: (str) => env.stdout.write(str),
      writeErr: (str) => env.stderr.write(str),
    });

  registerShowCommand(program, env, config);
  registerGetCommand(program, env, config);
  registerCheckCommand(program, env, config);
  registerConfigCommand(program, env, config);

  return program;
}

export interface RunCLIOptions {
  /** Environment overrides for testing or customization */
  env?: Partial<CLIEnvironment>;
  /** Config override; skips loading from file. Use {} to disable config. */
  config?: CLIConfig;
}

/**
 * Main entry point: loads config, builds the environment and runs the
 * command named in argv.
 */
export async function runCLI(options: RunCLIOptions = {}): Promise<void> {
  const config = options.config ?? loadConfig();
  const envOverrides = options.env ?? {};
  const argv = envOverrides.argv ?? process.argv;

  // Global options first, so command loggers get the right level
  const preParser = new Command();
  preParser
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .allowUnknownOption()
    .allowExcessArguments()
    .helpOption(false);
  preParser.parse(argv);
  const globalOpts = preParser.opts<GlobalOptions>();

  const loggerConfig = { logLevel: globalOpts.logLevel ?? config.global?.["log-level"] };
  const baseEnv: CLIEnvironment = { ...createDefaultEnvironment(loggerConfig), ...envOverrides };
  const env: CLIEnvironment = {
    ...baseEnv,
    createLogger: envOverrides.createLogger ?? createLoggerFactory(loggerConfig, baseEnv.stderr),
  };
  const program = createProgram(env, config);
  await program.parseAsync(env.argv);
}
