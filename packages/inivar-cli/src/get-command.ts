import type { Command } from "commander";
import type { ExtractType } from "inivar";
import type { CLIConfig } from "./config.js";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import { type DocumentOptions, loadDocument } from "./document-loader.js";
import type { CLIEnvironment } from "./environment.js";
import { collectDefault, executeAction, parseTypeOption } from "./utils.js";

interface GetOptions extends DocumentOptions {
  type?: ExtractType;
}

/**
 * Registers the get command: print one resolved value, optionally typed.
 */
export function registerGetCommand(
  program: Command,
  env: CLIEnvironment,
  config: CLIConfig | undefined,
): void {
  program
    .command(`${COMMANDS.get} <file> <section> <key>`)
    .description('Print one value; use "" for keys before the first section header')
    .option(OPTION_FLAGS.type, OPTION_DESCRIPTIONS.type, parseTypeOption)
    .option(OPTION_FLAGS.commentChars, OPTION_DESCRIPTIONS.commentChars)
    .option(OPTION_FLAGS.defaultValue, OPTION_DESCRIPTIONS.defaultValue, collectDefault)
    .option(OPTION_FLAGS.interpolate, OPTION_DESCRIPTIONS.interpolate)
    .option(OPTION_FLAGS.noInterpolate, OPTION_DESCRIPTIONS.noInterpolate)
    .action((file: string, section: string, key: string, options: GetOptions) =>
      executeAction(() => executeGetCommand(file, section, key, options, config, env), env),
    );
}

async function executeGetCommand(
  file: string,
  section: string,
  key: string,
  options: GetOptions,
  config: CLIConfig | undefined,
  env: CLIEnvironment,
): Promise<void> {
  const ini = await loadDocument(file, options, config, env, { resolve: true, warn: false });
  const raw = ini.require(section, key);

  const type = options.type ?? "string";
  const result = ini.extract(section, key, type);
  if (!result.success) {
    throw new Error(`[${section}] ${key} is not a valid ${type}: "${raw}"`);
  }
  env.stdout.write(`${String(result.value)}\n`);
}
