/**
 * Dialect configuration: defaults, normalization and validation.
 *
 * A `Dialect` is the frozen, fully-populated option bundle that flows through
 * every stage. Callers pass `DialectOptions` (any subset, optionally based on a
 * named preset) and `resolveDialect` fills in the rest.
 */

import { DIALECT_PRESETS, type DialectPresetName } from "./presets.js";

export type InterpolationMode = "none" | "basic" | "extended";

export interface Dialect {
  /** Earliest match on a line wins; ties go to the earlier entry here. */
  readonly keyValueDelimiters: readonly string[];
  /** Prefixes that mark a whole line as a comment. */
  readonly commentPrefixes: readonly string[];
  /** Prefixes that end a value when preceded by whitespace. */
  readonly inlineCommentPrefixes: readonly string[];
  /** Indented lines extend the previous value. */
  readonly allowContinuation: boolean;
  /** Blank lines inside an indented multi-line value belong to it. */
  readonly allowEmptyLinesInValues: boolean;
  /** Abort on the first duplicate or malformed line instead of recording it. */
  readonly strict: boolean;
  readonly caseFoldSections: boolean;
  readonly caseFoldKeys: boolean;
  /** Indented comment-prefixed lines inside an open value: value text or dropped comment. */
  readonly indentedComments: "value" | "comment";
  /** An indented line that contains a delimiter still continues the open value. */
  readonly continuationMayContainDelimiters: boolean;
  /** A value ending in an unescaped `\` continues on the next line. */
  readonly backslashContinuation: boolean;
  /** Where key/value pairs before the first header go. */
  readonly keysBeforeSection: "default" | "error";
  /** Header name that addresses the default section, or null for none. */
  readonly defaultSection: string | null;
  readonly allowBracketsInSectionNames: boolean;
  /** Lenient handling of malformed lines: record a warning or ignore silently. */
  readonly malformedLines: "warn" | "comment";
  readonly interpolation: InterpolationMode;
  readonly maxInterpolationDepth: number;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export type DialectOverrides = Partial<Mutable<Dialect>>;

export interface DialectOptions extends DialectOverrides {
  /** Start from a named preset instead of DEFAULT_DIALECT. */
  preset?: DialectPresetName;
}

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_KEY_VALUE_DELIMITERS = ["=", ":"] as const;
export const DEFAULT_COMMENT_PREFIXES = [";", "#"] as const;
export const DEFAULT_SECTION_NAME = "DEFAULT";
export const DEFAULT_MAX_INTERPOLATION_DEPTH = 32;

export const DEFAULT_DIALECT: Dialect = Object.freeze({
  keyValueDelimiters: Object.freeze([...DEFAULT_KEY_VALUE_DELIMITERS]),
  commentPrefixes: Object.freeze([...DEFAULT_COMMENT_PREFIXES]),
  inlineCommentPrefixes: Object.freeze([]),
  allowContinuation: true,
  allowEmptyLinesInValues: true,
  strict: false,
  caseFoldSections: false,
  caseFoldKeys: true,
  indentedComments: "value",
  continuationMayContainDelimiters: false,
  backslashContinuation: false,
  keysBeforeSection: "default",
  defaultSection: DEFAULT_SECTION_NAME,
  allowBracketsInSectionNames: true,
  malformedLines: "warn",
  interpolation: "basic",
  maxInterpolationDepth: DEFAULT_MAX_INTERPOLATION_DEPTH,
});

/** Dialects that went through `resolveDialect`. */
const resolvedDialects = new WeakSet<object>([DEFAULT_DIALECT]);

// ============================================================================
// Normalization
// ============================================================================

/** Invalid dialect options. Raised before any input is read. */
export class DialectError extends Error {
  constructor(
    message: string,
    public readonly option: keyof DialectOptions,
  ) {
    super(message);
    this.name = "DialectError";
  }
}

/**
 * Fill defaults (from the preset when one is named), copy and validate the
 * lists, and freeze the result. A dialect this function produced is returned
 * as-is; anything else is validated, frozen or not.
 */
export function resolveDialect(options?: DialectOptions): Dialect {
  if (options === undefined) return DEFAULT_DIALECT;
  if (isResolvedDialect(options)) return options;

  const { preset, ...overrides } = options;
  let base: Dialect = DEFAULT_DIALECT;
  if (preset !== undefined) {
    const presetOverrides = DIALECT_PRESETS[preset];
    if (!presetOverrides) {
      throw new DialectError(
        `Unknown dialect preset '${String(preset)}'. Expected one of: ${Object.keys(DIALECT_PRESETS).join(", ")}.`,
        "preset",
      );
    }
    base = { ...DEFAULT_DIALECT, ...presetOverrides };
  }

  const merged: Dialect = { ...base, ...overrides };
  const dialect: Dialect = {
    ...merged,
    keyValueDelimiters: normalizePrefixList(merged.keyValueDelimiters, "keyValueDelimiters", false),
    commentPrefixes: normalizePrefixList(merged.commentPrefixes, "commentPrefixes", true),
    inlineCommentPrefixes: normalizePrefixList(merged.inlineCommentPrefixes, "inlineCommentPrefixes", true),
  };
  validateDialect(dialect);
  const resolved = Object.freeze(dialect);
  resolvedDialects.add(resolved);
  return resolved;
}

function normalizePrefixList(
  values: readonly string[],
  option: "keyValueDelimiters" | "commentPrefixes" | "inlineCommentPrefixes",
  allowEmptyList: boolean,
): readonly string[] {
  const unique: string[] = [];
  for (const value of values) {
    if (typeof value !== "string" || value.length === 0) {
      throw new DialectError(`${option} entries must be non-empty strings.`, option);
    }
    if (value.trim().length === 0) {
      throw new DialectError(`${option} entries must contain a non-whitespace character.`, option);
    }
    if (!unique.includes(value)) unique.push(value);
  }
  if (!allowEmptyList && unique.length === 0) {
    throw new DialectError(`${option} must contain at least one entry.`, option);
  }
  return Object.freeze(unique);
}

function validateDialect(dialect: Dialect): void {
  const depth = dialect.maxInterpolationDepth;
  if (!Number.isInteger(depth) || depth < 1) {
    throw new DialectError(
      `maxInterpolationDepth must be a positive integer, got ${String(depth)}.`,
      "maxInterpolationDepth",
    );
  }
  if (dialect.defaultSection !== null && dialect.defaultSection.length === 0) {
    throw new DialectError("defaultSection must be a non-empty string or null.", "defaultSection");
  }
  for (const delimiter of dialect.keyValueDelimiters) {
    if (delimiter.startsWith("[")) {
      throw new DialectError(`Delimiter '${delimiter}' would be read as a section header.`, "keyValueDelimiters");
    }
  }
  if (!isOneOf(dialect.interpolation, ["none", "basic", "extended"])) {
    throw new DialectError(`Unknown interpolation mode '${String(dialect.interpolation)}'.`, "interpolation");
  }
  if (!isOneOf(dialect.indentedComments, ["value", "comment"])) {
    throw new DialectError(`indentedComments must be 'value' or 'comment'.`, "indentedComments");
  }
  if (!isOneOf(dialect.keysBeforeSection, ["default", "error"])) {
    throw new DialectError(`keysBeforeSection must be 'default' or 'error'.`, "keysBeforeSection");
  }
  if (!isOneOf(dialect.malformedLines, ["warn", "comment"])) {
    throw new DialectError(`malformedLines must be 'warn' or 'comment'.`, "malformedLines");
  }
}

function isOneOf(value: string, allowed: readonly string[]): boolean {
  return allowed.includes(value);
}

function isResolvedDialect(value: DialectOptions): value is Dialect {
  return resolvedDialects.has(value);
}

/** Case folding shared by the builder and lookups. */
export function foldName(name: string, enabled: boolean): string {
  return enabled ? name.toLowerCase() : name;
}
