// Document model
export type { IniDocument, KeyValues, Section } from "./core/document.js";
export { applyDefaults, clearDocument, createDocument, ensureSection, toRecord } from "./core/document.js";
export { Ini } from "./core/ini.js";
export type { IniOptions } from "./core/ini.js";
export { IniLookupError } from "./core/errors.js";

// Parsing
export type { CommentClassifier } from "./core/comments.js";
export {
  createCommentClassifier,
  defaultCommentClassifier,
  visualBasicCommentClassifier,
} from "./core/comments.js";
export type { ParseOptions } from "./core/parser.js";
export { parseInto, splitLines } from "./core/parser.js";

// Interpolation
export type { InterpolateOptions, InterpolationSymbol } from "./core/interpolator.js";
export { globalSymbol, interpolate, localSymbol } from "./core/interpolator.js";
export { MAX_INTERPOLATION_DEPTH } from "./core/constants.js";

// Output and typed access
export type { SerializeOptions } from "./core/serializer.js";
export { serialize } from "./core/serializer.js";
export type { ExtractResult, ExtractType, ExtractTypeMap } from "./core/extract.js";
export { EXTRACT_TYPES, extract, isExtractType } from "./core/extract.js";
export { replaceAll, trim, trimEnd, trimStart } from "./core/text.js";

// Logging
export type { ILogObj, Logger } from "tslog";
export type { LoggerOptions, LogLevelName } from "./logging/logger.js";
export { createLogger, defaultLogger, LOG_LEVELS, parseLogLevel } from "./logging/logger.js";
