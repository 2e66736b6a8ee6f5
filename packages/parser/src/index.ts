// @inispan/parser
//
// Span-aware INI parsing: dialects, diagnostics, documents and lazy interpolation.

// Entry points
export { parse, parseOrThrow, type ParseResult } from "./parse.js";

// Dialect configuration
export {
  DEFAULT_DIALECT,
  DEFAULT_COMMENT_PREFIXES,
  DEFAULT_KEY_VALUE_DELIMITERS,
  DEFAULT_MAX_INTERPOLATION_DEPTH,
  DEFAULT_SECTION_NAME,
  DialectError,
  foldName,
  resolveDialect,
  type Dialect,
  type DialectOptions,
  type DialectOverrides,
  type InterpolationMode,
} from "./dialect/options.js";
export { DIALECT_PRESETS, isDialectPreset, type DialectPresetName } from "./dialect/presets.js";

// Document model
export {
  IniDocument,
  IniSection,
  IniValue,
  type GetResult,
  type IniEntry,
  type KeysOptions,
  type LocatedEntry,
} from "./document/document.js";

// Diagnostics
export {
  DiagnosticSink,
  IniError,
  buildDiagnostic,
  specFor,
  type BuildDiagnosticInput,
  type IniDiagnosticOf,
} from "./diagnostics/build.js";
export {
  diagnosticsByCategory,
  diagnosticsCatalog,
  type IniDiagnosticCode,
  type IniDiagnosticDataByCode,
  type IniDiagnosticDataFor,
} from "./diagnostics/catalog.js";
export { formatDiagnostic, formatDiagnostics, type FormatDiagnosticOptions } from "./diagnostics/format.js";
export type { DiagnosticCategory, DiagnosticPolicy, DiagnosticSpec } from "./diagnostics/types.js";
export type {
  DiagnosticRelated,
  DiagnosticSeverity,
  DiagnosticStage,
  IniDiagnostic,
  IniDiagnosticKind,
} from "./model/diagnostics.js";

// Lines and spans
export { EntryKind, type MalformedReason, type PhysicalLine, type RawEntry } from "./model/entries.js";
export {
  coverSpans,
  pickNarrowestContaining,
  sliceSpan,
  spanContains,
  spanContainsOffset,
  spanLength,
  type SourcePosition,
  type SourceSpan,
  type TextSpan,
} from "./model/span.js";
export { LineIndex } from "./model/text.js";

// Pipeline stages (for tooling that wants line-level access)
export { splitLines } from "./parsing/lines.js";
export { classify, INITIAL_CONTEXT, type ClassifyContext } from "./parsing/classify.js";
export { assemble, type AssembledEntry, type AssemblyEvent } from "./parsing/assemble.js";
export { parseTemplate, type TemplatePart } from "./interpolation/placeholders.js";

// Debug channels
export { configureDebug, debug, DEBUG_ENV_VAR, isDebugEnabled, refreshDebugChannels, type DebugConfig } from "./shared/debug.js";
export { findSimilar, formatSuggestion, levenshteinDistance, type FindSimilarOptions } from "./shared/suggestions.js";
