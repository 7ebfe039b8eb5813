import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Expands a leading tilde to the user's home directory.
 *
 * @example
 * expandTildePath("~/.inivar/cli.toml") // "/home/me/.inivar/cli.toml"
 * expandTildePath("/etc/app.ini")       // unchanged
 */
export function expandTildePath(path: string): string {
  if (!path.startsWith("~")) {
    return path;
  }
  return path.replace(/^~/, homedir());
}

/**
 * Config file location: `INIVAR_CONFIG` when set, else ~/.inivar/cli.toml
 */
export function getConfigPath(): string {
  const override = process.env.INIVAR_CONFIG?.trim();
  if (override) {
    return expandTildePath(override);
  }
  return join(homedir(), ".inivar", "cli.toml");
}
