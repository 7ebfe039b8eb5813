import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";
import {
  INTERPOLATION_END,
  INTERPOLATION_SEPARATOR,
  INTERPOLATION_START,
  MAX_INTERPOLATION_DEPTH,
} from "./constants.js";
import type { IniDocument, Section } from "./document.js";
import { replaceAll } from "./text.js";

/**
 * A placeholder and the text that replaces it.
 */
export interface InterpolationSymbol {
  pattern: string;
  replacement: string;
}

export interface InterpolateOptions {
  /**
   * Maximum number of global substitution passes.
   * @default 10
   */
  maxDepth?: number;
  logger?: Logger<ILogObj>;
}

/** `${name}` */
export function localSymbol(name: string): string {
  return `${INTERPOLATION_START}${name}${INTERPOLATION_END}`;
}

/** `${section:name}` */
export function globalSymbol(sectionName: string, name: string): string {
  return localSymbol(`${sectionName}${INTERPOLATION_SEPARATOR}${name}`);
}

/**
 * `${key} -> ${section:key}` for every key of one section.
 */
export function localSymbols(sectionName: string, section: Section): InterpolationSymbol[] {
  return [...section.keys()].map((key) => ({
    pattern: localSymbol(key),
    replacement: globalSymbol(sectionName, key),
  }));
}

/**
 * `${section:key} -> value` for every pair in the document, using the values
 * as they currently stand.
 */
export function globalSymbols(document: IniDocument): InterpolationSymbol[] {
  const symbols: InterpolationSymbol[] = [];
  for (const [sectionName, section] of document.sections) {
    for (const [key, value] of section) {
      symbols.push({ pattern: globalSymbol(sectionName, key), replacement: value });
    }
  }
  return symbols;
}

/**
 * Apply every symbol, in order, to every value of the section.
 *
 * @returns Whether any value changed
 */
export function replaceSymbols(symbols: readonly InterpolationSymbol[], section: Section): boolean {
  let changed = false;
  for (const { pattern, replacement } of symbols) {
    for (const [key, value] of section) {
      const result = replaceAll(value, pattern, replacement);
      if (result.changed) {
        section.set(key, result.text);
        changed = true;
      }
    }
  }
  return changed;
}

/**
 * Resolve `${key}` and `${section:key}` placeholders in place.
 *
 * Bare `${key}` references are first rewritten to `${section:key}` using the
 * keys of the section they appear in. Then every `${section:key}` is replaced
 * by that entry's current value, pass after pass, until a pass changes
 * nothing or `maxDepth` passes have run.
 *
 * Substitution is plain substring replacement. Symbols are applied in
 * section then key insertion order, so the number of passes a chain needs
 * depends on that order. Cycles run until the cap and leave placeholders in
 * the text; so do references to entries that do not exist.
 *
 * @returns Number of global passes performed
 *
 * @example
 * ```typescript
 * // [default] ip=127.0.0.1
 * // [net]     address=${default:ip}:80
 * interpolate(document);
 * document.sections.get("net")?.get("address"); // "127.0.0.1:80"
 * ```
 */
export function interpolate(document: IniDocument, options: InterpolateOptions = {}): number {
  const maxDepth = options.maxDepth ?? MAX_INTERPOLATION_DEPTH;
  const logger = options.logger ?? defaultLogger;

  for (const [sectionName, section] of document.sections) {
    replaceSymbols(localSymbols(sectionName, section), section);
  }

  let passes = 0;
  let changed = true;
  while (changed && passes < maxDepth) {
    changed = false;
    const symbols = globalSymbols(document);
    for (const section of document.sections.values()) {
      if (replaceSymbols(symbols, section)) {
        changed = true;
      }
    }
    passes++;
    logger.trace(`Interpolation pass ${passes} ${changed ? "changed values" : "was stable"}`);
  }

  if (changed && passes > 0) {
    logger.warn(`Interpolation stopped after ${passes} passes while values were still changing`);
  }
  return passes;
}
