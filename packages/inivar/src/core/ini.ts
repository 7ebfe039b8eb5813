import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";
import { type CommentClassifier, defaultCommentClassifier } from "./comments.js";
import { MAX_INTERPOLATION_DEPTH } from "./constants.js";
import {
  applyDefaults,
  clearDocument,
  ensureSection,
  type IniDocument,
  type KeyValues,
  type Section,
  toRecord,
} from "./document.js";
import { IniLookupError } from "./errors.js";
import { type ExtractResult, type ExtractType, type ExtractTypeMap, extract } from "./extract.js";
import { interpolate } from "./interpolator.js";
import { parseInto } from "./parser.js";
import { type SerializeOptions, serialize } from "./serializer.js";

export interface IniOptions {
  /**
   * Comment test for the first character of a line.
   * @default `;` only
   */
  isComment?: CommentClassifier;

  /**
   * Maximum global passes per {@link Ini.interpolate} call.
   * @default 10
   */
  maxInterpolationDepth?: number;

  logger?: Logger<ILogObj>;
}

/**
 * An INI document with its parser and interpolation settings.
 *
 * @example
 * ```typescript
 * const ini = new Ini();
 * ini.parse("[default]\nip=127.0.0.1\n[net]\naddress=${default:ip}:80\n");
 * ini.interpolate();
 * ini.get("net", "address"); // "127.0.0.1:80"
 * ini.extract("net", "port", "integer"); // { success: false }
 * ```
 */
export class Ini implements IniDocument {
  readonly sections = new Map<string, Section>();
  readonly errors: string[] = [];

  private readonly isComment: CommentClassifier;
  private readonly maxInterpolationDepth: number;
  private readonly logger: Logger<ILogObj>;

  constructor(options: IniOptions = {}) {
    this.isComment = options.isComment ?? defaultCommentClassifier;
    this.maxInterpolationDepth = options.maxInterpolationDepth ?? MAX_INTERPOLATION_DEPTH;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Parse text (or pre-split lines) into this document. Rejected lines are
   * appended to {@link errors}; parsing never throws.
   */
  parse(input: string | Iterable<string>): this {
    const before = this.errors.length;
    parseInto(this, input, { isComment: this.isComment, logger: this.logger });
    const rejected = this.errors.length - before;
    if (rejected > 0) {
      this.logger.info(`Parsed with ${rejected} rejected line(s)`);
    }
    return this;
  }

  /**
   * Resolve placeholders in place.
   *
   * @returns Number of global passes performed
   */
  interpolate(): number {
    return interpolate(this, { maxDepth: this.maxInterpolationDepth, logger: this.logger });
  }

  /**
   * Fill in `defaults` for every existing section that lacks the key.
   */
  defaultSection(defaults: KeyValues): this {
    applyDefaults(this, defaults);
    return this;
  }

  generate(options?: SerializeOptions): string {
    return serialize(this, options);
  }

  clear(): void {
    clearDocument(this);
  }

  get(section: string, key: string): string | undefined {
    return this.sections.get(section)?.get(key);
  }

  /**
   * Like {@link get}, but throws {@link IniLookupError} when missing.
   */
  require(section: string, key: string): string {
    const values = this.sections.get(section);
    if (!values) {
      throw new IniLookupError(section, key, true);
    }
    const value = values.get(key);
    if (value === undefined) {
      throw new IniLookupError(section, key, false);
    }
    return value;
  }

  /**
   * Set a value, creating the section if needed. Unlike parsing, this
   * overwrites an existing key.
   */
  set(section: string, key: string, value: string): this {
    ensureSection(this, section).set(key, value);
    return this;
  }

  /**
   * Read a value as a scalar; a missing entry fails the same way as an
   * unparseable one.
   */
  extract<K extends ExtractType>(
    section: string,
    key: string,
    type: K,
  ): ExtractResult<ExtractTypeMap[K]> {
    const value = this.get(section, key);
    return value === undefined ? { success: false } : extract(value, type);
  }

  toJSON(): Record<string, Record<string, string>> {
    return toRecord(this);
  }

  /**
   * Parse `text` into a new document.
   */
  static parse(text: string, options?: IniOptions): Ini {
    return new Ini(options).parse(text);
  }
}
