import type { Command } from "commander";
import type { CLIConfig } from "./config.js";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS, type OutputFormat } from "./constants.js";
import { type DocumentOptions, loadDocument } from "./document-loader.js";
import type { CLIEnvironment } from "./environment.js";
import { collectDefault, executeAction, parseFormatOption } from "./utils.js";

interface ShowOptions extends DocumentOptions {
  format?: OutputFormat;
}

/**
 * Registers the show command: print a document after defaults and interpolation.
 */
export function registerShowCommand(
  program: Command,
  env: CLIEnvironment,
  config: CLIConfig | undefined,
): void {
  program
    .command(`${COMMANDS.show} <file>`)
    .description("Print a document with defaults applied and references resolved")
    .option(OPTION_FLAGS.commentChars, OPTION_DESCRIPTIONS.commentChars)
    .option(OPTION_FLAGS.defaultValue, OPTION_DESCRIPTIONS.defaultValue, collectDefault)
    .option(OPTION_FLAGS.interpolate, OPTION_DESCRIPTIONS.interpolate)
    .option(OPTION_FLAGS.noInterpolate, OPTION_DESCRIPTIONS.noInterpolate)
    .option(OPTION_FLAGS.format, OPTION_DESCRIPTIONS.format, parseFormatOption)
    .action((file: string, options: ShowOptions) =>
      executeAction(() => executeShowCommand(file, options, config, env), env),
    );
}

async function executeShowCommand(
  file: string,
  options: ShowOptions,
  config: CLIConfig | undefined,
  env: CLIEnvironment,
): Promise<void> {
  const ini = await loadDocument(file, options, config, env, { resolve: true, warn: true });

  if (options.format === "json") {
    env.stdout.write(`${JSON.stringify(ini.toJSON(), null, 2)}\n`);
  } else {
    env.stdout.write(ini.generate());
  }
}
