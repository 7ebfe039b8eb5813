import type { Command } from "commander";
import type { CLIConfig } from "./config.js";
import { COMMANDS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { getConfigPath } from "./paths.js";
import { executeAction } from "./utils.js";

/**
 * Registers the config command for displaying the resolved configuration.
 */
export function registerConfigCommand(
  program: Command,
  env: CLIEnvironment,
  config: CLIConfig | undefined,
): void {
  program
    .command(COMMANDS.config)
    .description("Display the resolved configuration")
    .action(() => executeAction(async () => showConfig(config, env), env));
}

function showConfig(config: CLIConfig | undefined, env: CLIEnvironment): void {
  const path = getConfigPath();
  if (!config || Object.keys(config).length === 0) {
    env.stdout.write(`No configuration file found at ${path}\n`);
    return;
  }

  const global = config.global ?? {};
  env.stdout.write(`Config file: ${path}\n\n`);
  env.stdout.write(`  Log level:      ${global["log-level"] ?? "(default)"}\n`);
  env.stdout.write(`  Comment chars:  ${global["comment-chars"] ?? "(default)"}\n`);
  env.stdout.write(
    `  Interpolate:    ${global.interpolate !== undefined ? global.interpolate : "(default)"}\n`,
  );

  const defaults = Object.entries(config.defaults ?? {});
  if (defaults.length > 0) {
    env.stdout.write("\nDefaults:\n");
    for (const [key, value] of defaults) {
      env.stdout.write(`  • ${key} = ${value}\n`);
    }
  }
}
