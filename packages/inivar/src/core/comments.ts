import { COMMENT } from "./constants.js";

/**
 * Decides whether a line is a comment, given the first character of the
 * trimmed, non-empty line.
 */
export type CommentClassifier = (firstChar: string) => boolean;

/**
 * Only `;` starts a comment.
 */
export const defaultCommentClassifier: CommentClassifier = (firstChar) => firstChar === COMMENT;

/**
 * Build a classifier that accepts any of the given marker characters.
 *
 * @example
 * ```typescript
 * const isComment = createCommentClassifier(";#");
 * isComment("#"); // true
 * isComment("["); // false
 * ```
 */
export function createCommentClassifier(markers: Iterable<string>): CommentClassifier {
  const accepted = new Set<string>();
  for (const marker of markers) {
    if (marker.length !== 1) {
      throw new Error(`Comment marker must be a single character, got "${marker}"`);
    }
    accepted.add(marker);
  }
  return (firstChar) => accepted.has(firstChar);
}

/**
 * Visual Basic style files, where `'` also starts a comment.
 */
export const visualBasicCommentClassifier = createCommentClassifier([COMMENT, "'"]);
