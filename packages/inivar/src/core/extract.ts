import { trim } from "./text.js";

/**
 * Scalar types a stored value can be read as.
 */
export interface ExtractTypeMap {
  integer: number;
  number: number;
  boolean: boolean;
  string: string;
}

export type ExtractType = keyof ExtractTypeMap;

export const EXTRACT_TYPES: readonly ExtractType[] = ["integer", "number", "boolean", "string"];

export type ExtractResult<T> = { success: true; value: T } | { success: false };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const failure = { success: false } as const;

type Extractors = { [K in ExtractType]: (value: string) => ExtractResult<ExtractTypeMap[K]> };

const extractors: Extractors = {
  integer: (value) => {
    const text = trim(value);
    if (!INTEGER_PATTERN.test(text)) return failure;
    const parsed = Number(text);
    return Number.isSafeInteger(parsed) ? { success: true, value: parsed } : failure;
  },
  number: (value) => {
    const text = trim(value);
    if (!NUMBER_PATTERN.test(text)) return failure;
    const parsed = Number(text);
    return Number.isFinite(parsed) ? { success: true, value: parsed } : failure;
  },
  boolean: (value) => {
    const text = trim(value);
    if (text === "true") return { success: true, value: true };
    if (text === "false") return { success: true, value: false };
    return failure;
  },
  string: (value) => ({ success: true, value }),
};

export function isExtractType(value: string): value is ExtractType {
  return EXTRACT_TYPES.some((type) => type === value);
}

/**
 * Read a stored value as a scalar. Surrounding whitespace is skipped and the
 * rest must parse completely; `"string"` always succeeds with the value as is.
 *
 * @example
 * ```typescript
 * extract("42", "integer");    // { success: true, value: 42 }
 * extract("42x", "integer");   // { success: false }
 * extract(" true ", "boolean"); // { success: true, value: true }
 * extract(" raw ", "string");  // { success: true, value: " raw " }
 * ```
 */
export function extract<K extends ExtractType>(
  value: string,
  type: K,
): ExtractResult<ExtractTypeMap[K]> {
  const extractor: Extractors[K] = extractors[type];
  return extractor(value);
}
