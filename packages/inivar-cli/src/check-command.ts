import chalk from "chalk";
import type { Command } from "commander";
import type { CLIConfig } from "./config.js";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import { type DocumentOptions, loadDocument } from "./document-loader.js";
import type { CLIEnvironment } from "./environment.js";
import { executeAction } from "./utils.js";

/**
 * Registers the check command: list rejected lines, exit 1 if there are any.
 */
export function registerCheckCommand(
  program: Command,
  env: CLIEnvironment,
  config: CLIConfig | undefined,
): void {
  program
    .command(`${COMMANDS.check} <file>`)
    .description("Report lines the parser rejects")
    .option(OPTION_FLAGS.commentChars, OPTION_DESCRIPTIONS.commentChars)
    .action((file: string, options: DocumentOptions) =>
      executeAction(() => executeCheckCommand(file, options, config, env), env),
    );
}

async function executeCheckCommand(
  file: string,
  options: DocumentOptions,
  config: CLIConfig | undefined,
  env: CLIEnvironment,
): Promise<void> {
  const ini = await loadDocument(file, options, config, env, { resolve: false, warn: false });

  if (ini.errors.length === 0) {
    env.stdout.write(`${chalk.green("✔")} ${file}: no errors\n`);
    return;
  }

  for (const line of ini.errors) {
    env.stdout.write(`${chalk.red("✖")} ${line}\n`);
  }
  env.stdout.write(`${file}: ${ini.errors.length} rejected line(s)\n`);
  env.setExitCode(1);
}
