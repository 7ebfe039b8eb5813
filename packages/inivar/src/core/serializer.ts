import { EOL } from "node:os";
import { ASSIGN, SECTION_END, SECTION_START } from "./constants.js";
import type { IniDocument } from "./document.js";

export interface SerializeOptions {
  /**
   * Line terminator.
   * @default os.EOL
   */
  eol?: string;
}

/**
 * Render the document as INI text: a `[name]` header per section, its
 * `key=value` lines, then a blank line. Nothing is escaped, so values
 * containing newlines or structural characters do not survive a re-parse.
 */
export function serialize(document: IniDocument, options: SerializeOptions = {}): string {
  const eol = options.eol ?? EOL;
  let output = "";
  for (const [name, section] of document.sections) {
    output += `${SECTION_START}${name}${SECTION_END}${eol}`;
    for (const [key, value] of section) {
      output += `${key}${ASSIGN}${value}${eol}`;
    }
    output += eol;
  }
  return output;
}
