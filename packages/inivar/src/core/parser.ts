import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";
import { type CommentClassifier, defaultCommentClassifier } from "./comments.js";
import { ASSIGN, SECTION_END, SECTION_START } from "./constants.js";
import { ensureSection, type IniDocument } from "./document.js";
import { trim, trimEnd, trimStart } from "./text.js";

export interface ParseOptions {
  /** Comment test applied to the first character of each line */
  isComment?: CommentClassifier;
  logger?: Logger<ILogObj>;
}

/**
 * Split text into physical lines. Only `\n` separates lines; a trailing `\r`
 * is whitespace and disappears when the line is trimmed.
 */
export function splitLines(text: string): string[] {
  return text.split("\n");
}

/**
 * Parse INI lines into `document`, continuing past malformed input.
 *
 * Each non-empty trimmed line is one of:
 * - a comment (skipped),
 * - a `[name]` header, which makes `name` the current section,
 * - a `key=value` pair added to the current section,
 * - anything else, which is appended to `document.errors`.
 *
 * A header missing its `]`, a line without `=` or with `=` first, and a key
 * already present in the current section are all rejected; the first value
 * of a key wins. Parsing starts in the `""` section.
 *
 * @param document - Document to populate (sections and errors are appended to)
 * @param input - Raw text, or lines already split
 */
export function parseInto(
  document: IniDocument,
  input: string | Iterable<string>,
  options: ParseOptions = {},
): void {
  const isComment = options.isComment ?? defaultCommentClassifier;
  const logger = options.logger ?? defaultLogger;
  const lines = typeof input === "string" ? splitLines(input) : input;

  const reject = (line: string, reason: string) => {
    logger.debug(`Rejected line (${reason}): ${line}`);
    document.errors.push(line);
  };

  let sectionName = "";

  for (const rawLine of lines) {
    const line = trim(rawLine);
    if (line.length === 0) {
      continue;
    }

    const first = line[0];
    if (isComment(first)) {
      continue;
    }

    if (first === SECTION_START) {
      if (line.endsWith(SECTION_END)) {
        sectionName = line.slice(1, -1);
        ensureSection(document, sectionName);
      } else {
        reject(line, "unterminated section header");
      }
      continue;
    }

    const assignAt = line.indexOf(ASSIGN);
    if (assignAt <= 0) {
      reject(line, assignAt === 0 ? "empty key" : "missing assignment");
      continue;
    }

    const key = trimEnd(line.slice(0, assignAt));
    const value = trimStart(line.slice(assignAt + 1));
    const section = ensureSection(document, sectionName);
    if (section.has(key)) {
      reject(line, `duplicate key "${key}" in section "${sectionName}"`);
    } else {
      section.set(key, value);
    }
  }
}
