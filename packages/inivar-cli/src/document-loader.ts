import chalk from "chalk";
import { createCommentClassifier, Ini } from "inivar";
import type { CLIConfig } from "./config.js";
import { STDIN_FILENAME } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { readStream } from "./utils.js";

/**
 * Options shared by the commands that read a document.
 */
export interface DocumentOptions {
  commentChars?: string;
  default?: Record<string, string>;
  interpolate?: boolean;
}

export interface LoadDocumentSettings {
  /** Apply defaults and interpolate after parsing */
  resolve: boolean;
  /** Print each rejected line to stderr */
  warn: boolean;
}

/**
 * Reads `file` (or stdin for "-") and parses it with the comment characters,
 * defaults and interpolation setting taken from the options, then the config.
 */
export async function loadDocument(
  file: string,
  options: DocumentOptions,
  config: CLIConfig | undefined,
  env: CLIEnvironment,
  settings: LoadDocumentSettings,
): Promise<Ini> {
  const logger = env.createLogger("inivar");
  const text = file === STDIN_FILENAME ? await readStream(env.stdin) : await env.readFile(file);

  const commentChars = options.commentChars ?? config?.global?.["comment-chars"];
  const ini = new Ini({
    logger,
    isComment: commentChars !== undefined ? createCommentClassifier(commentChars) : undefined,
  });
  ini.parse(text);

  if (settings.warn) {
    for (const line of ini.errors) {
      env.stderr.write(`${chalk.yellow("Warning:")} rejected line: ${line}\n`);
    }
  }

  if (settings.resolve) {
    const defaults = { ...config?.defaults, ...options.default };
    if (Object.keys(defaults).length > 0) {
      ini.defaultSection(defaults);
    }
    if (options.interpolate ?? config?.global?.interpolate ?? true) {
      const passes = ini.interpolate();
      logger.debug(`Interpolated ${file} in ${passes} pass(es)`);
    }
  }

  return ini;
}
