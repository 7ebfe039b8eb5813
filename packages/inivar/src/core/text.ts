/**
 * Whitespace as the "C" locale classifies it: space, tab, newline, vertical
 * tab, form feed and carriage return. Unicode spaces such as U+00A0 are kept.
 */
const C_WHITESPACE = " \t\n\v\f\r";

export function isSpace(ch: string): boolean {
  return ch.length === 1 && C_WHITESPACE.includes(ch);
}

export function trimStart(text: string): string {
  let start = 0;
  while (start < text.length && isSpace(text[start])) {
    start++;
  }
  return text.slice(start);
}

export function trimEnd(text: string): string {
  let end = text.length;
  while (end > 0 && isSpace(text[end - 1])) {
    end--;
  }
  return text.slice(0, end);
}

export function trim(text: string): string {
  return trimStart(trimEnd(text));
}

/**
 * Replace every literal occurrence of `from` in `text` with `to`, scanning
 * left to right. Scanning resumes after the inserted text, so a replacement
 * that contains `from` is not expanded again.
 *
 * @returns The new text and whether anything was replaced
 *
 * @example
 * ```typescript
 * replaceAll("${a}-${a}", "${a}", "1"); // { text: "1-1", changed: true }
 * replaceAll("abc", "x", "y");          // { text: "abc", changed: false }
 * ```
 */
export function replaceAll(
  text: string,
  from: string,
  to: string,
): { text: string; changed: boolean } {
  if (from === "") {
    return { text, changed: false };
  }

  let result = "";
  let cursor = 0;
  let index = text.indexOf(from);
  while (index !== -1) {
    result += text.slice(cursor, index) + to;
    cursor = index + from.length;
    index = text.indexOf(from, cursor);
  }

  if (cursor === 0) {
    return { text, changed: false };
  }
  return { text: result + text.slice(cursor), changed: true };
}
