/* =======================================================================================
 * Line classifier
 * ---------------------------------------------------------------------------------------
 * Decides what one physical line is, given the dialect and the little state the
 * assembler carries between lines. Rules, first match wins:
 *   0. pending backslash continuation
 *   1. blank (or an empty line inside an open value)
 *   2. full-line comment
 *   3. section header
 *   4. indented continuation of the open value
 *   5. key/value pair
 *   6. malformed
 * ======================================================================================= */

import type { Dialect } from "../dialect/options.js";
import {
  EntryKind,
  type ContinuationEntry,
  type KeyValueEntry,
  type MalformedEntry,
  type MalformedReason,
  type PhysicalLine,
  type RawEntry,
} from "../model/entries.js";
import { lineSpan } from "../model/span.js";
import { debug } from "../shared/debug.js";

export interface ClassifyContext {
  /** Indentation of the key line whose value is still open; null when none is. */
  readonly openValueIndent: number | null;
  /** Indentation of the open value's first continuation line, once seen. */
  readonly continuationIndent: number | null;
  /** The previous line ended with a backslash continuation marker. */
  readonly pendingBackslash: boolean;
}

export const INITIAL_CONTEXT: ClassifyContext = Object.freeze({
  openValueIndent: null,
  continuationIndent: null,
  pendingBackslash: false,
});

export function classify(line: PhysicalLine, dialect: Dialect, context: ClassifyContext): RawEntry {
  const entry = classifyLine(line, dialect, context);
  debug.classify("line", { line: line.line, kind: entry.kind });
  return entry;
}

function classifyLine(line: PhysicalLine, dialect: Dialect, context: ClassifyContext): RawEntry {
  const { text } = line;
  const indent = leadingWhitespace(text);
  const end = trimmedEnd(text);
  const valueOpen = context.openValueIndent !== null;

  if (context.pendingBackslash) {
    return continuation(line, dialect, indent, indent);
  }

  if (indent >= end) {
    if (valueOpen && dialect.allowEmptyLinesInValues) {
      return continuation(line, dialect, text.length, indent);
    }
    return { kind: EntryKind.Blank, text, line: line.line, span: lineSpan(line.line, line.start, 0, text.length) };
  }

  const indented =
    context.openValueIndent !== null && indent > context.openValueIndent && dialect.allowContinuation;
  const body = text.slice(indent, end);

  const commentPrefix = matchPrefix(body, dialect.commentPrefixes);
  if (commentPrefix !== null) {
    if (indented && dialect.indentedComments === "value") {
      return continuation(line, dialect, stripWidth(indent, context), indent);
    }
    return {
      kind: EntryKind.Comment,
      text,
      line: line.line,
      span: lineSpan(line.line, line.start, indent, end),
      prefix: commentPrefix,
      comment: body.slice(commentPrefix.length).trim(),
    };
  }

  if (body.startsWith("[")) {
    const close = body.lastIndexOf("]");
    if (close === -1) {
      // An open value can still absorb the line; otherwise nothing can.
      if (indented) return continuation(line, dialect, stripWidth(indent, context), indent);
      return malformed(line, indent, end, "unterminated-section", true);
    }
    const name = body.slice(1, close);
    if (name.length === 0) return malformed(line, indent, end, "empty-section-name", false);
    if (!dialect.allowBracketsInSectionNames && name.includes("]")) {
      return malformed(line, indent, end, "bracket-in-section-name", false);
    }
    return {
      kind: EntryKind.Section,
      text,
      line: line.line,
      span: lineSpan(line.line, line.start, indent, end),
      name,
      nameSpan: lineSpan(line.line, line.start, indent + 1, indent + 1 + name.length),
    };
  }

  const delimiter = findDelimiter(text, indent, end, dialect.keyValueDelimiters);

  if (indented && (delimiter === null || dialect.continuationMayContainDelimiters)) {
    return continuation(line, dialect, stripWidth(indent, context), indent);
  }

  if (delimiter !== null) {
    return keyValue(line, dialect, indent, end, delimiter);
  }

  return malformed(line, indent, end, "missing-delimiter", false);
}

function keyValue(
  line: PhysicalLine,
  dialect: Dialect,
  indent: number,
  end: number,
  delimiter: { index: number; token: string },
): KeyValueEntry | MalformedEntry {
  const { text } = line;
  const keyEnd = trimmedEnd(text, delimiter.index);
  if (keyEnd <= indent) return malformed(line, indent, end, "empty-key", false);

  const valueStart = skipWhitespace(text, delimiter.index + delimiter.token.length, end);
  const value = readValue(text, valueStart, end, dialect);
  return {
    kind: EntryKind.KeyValue,
    text,
    line: line.line,
    span: lineSpan(line.line, line.start, indent, Math.max(value.end, delimiter.index + delimiter.token.length)),
    key: text.slice(indent, keyEnd),
    keySpan: lineSpan(line.line, line.start, indent, keyEnd),
    delimiter: delimiter.token,
    value: value.text,
    valueSpan: lineSpan(line.line, line.start, valueStart, Math.max(valueStart, value.end)),
    indent,
    continues: value.continues,
  };
}

function continuation(line: PhysicalLine, dialect: Dialect, from: number, indent: number): ContinuationEntry {
  const { text } = line;
  const value = readValue(text, from, trimmedEnd(text), dialect);
  const start = Math.min(from, value.end);
  return {
    kind: EntryKind.Continuation,
    text,
    line: line.line,
    span: lineSpan(line.line, line.start, start, value.end),
    value: value.text,
    valueSpan: lineSpan(line.line, line.start, start, value.end),
    indent,
    continues: value.continues,
  };
}

function malformed(
  line: PhysicalLine,
  indent: number,
  end: number,
  reason: MalformedReason,
  fatal: boolean,
): MalformedEntry {
  return {
    kind: EntryKind.Malformed,
    text: line.text,
    line: line.line,
    span: lineSpan(line.line, line.start, indent, end),
    reason,
    fatal,
  };
}

// ============================================================================
// Line scanning helpers
// ============================================================================

interface ValueText {
  readonly text: string;
  /** Offset within the line just past the value's last character. */
  readonly end: number;
  readonly continues: boolean;
}

/**
 * Value text in `[from, end)`: cut at the first inline comment preceded by
 * whitespace, trailing whitespace dropped, and a trailing backslash marker
 * removed when the dialect uses backslash continuation.
 */
function readValue(text: string, from: number, end: number, dialect: Dialect): ValueText {
  let stop = end;
  const comment = findInlineComment(text, from, end, dialect.inlineCommentPrefixes);
  if (comment !== null) stop = trimmedEnd(text, comment, from);

  let continues = false;
  if (dialect.backslashContinuation && endsWithMarker(text, from, stop)) {
    continues = true;
    stop = trimmedEnd(text, stop - 1, from);
  }

  return { text: text.slice(from, Math.max(from, stop)), end: Math.max(from, stop), continues };
}

function findInlineComment(text: string, from: number, end: number, prefixes: readonly string[]): number | null {
  let best: number | null = null;
  for (const prefix of prefixes) {
    let index = text.indexOf(prefix, from);
    while (index !== -1 && index < end) {
      if (index === 0 || isWhitespace(text.charCodeAt(index - 1))) {
        if (best === null || index < best) best = index;
        break;
      }
      index = text.indexOf(prefix, index + 1);
    }
  }
  return best;
}

/** Odd number of trailing backslashes: the last one is a marker, not an escaped backslash. */
function endsWithMarker(text: string, from: number, end: number): boolean {
  let count = 0;
  for (let i = end - 1; i >= from && text.charCodeAt(i) === 92 /* \ */; i -= 1) count += 1;
  return count % 2 === 1;
}

/** Leftmost delimiter occurrence in `[from, end)`; ties go to the earlier configured delimiter. */
export function findDelimiter(
  text: string,
  from: number,
  end: number,
  delimiters: readonly string[],
): { index: number; token: string } | null {
  let found: { index: number; token: string } | null = null;
  for (const token of delimiters) {
    const index = text.indexOf(token, from);
    if (index === -1 || index + token.length > end) continue;
    if (found === null || index < found.index) found = { index, token };
  }
  return found;
}

function matchPrefix(body: string, prefixes: readonly string[]): string | null {
  let best: string | null = null;
  for (const prefix of prefixes) {
    if (body.startsWith(prefix) && (best === null || prefix.length > best.length)) best = prefix;
  }
  return best;
}

/** Continuation lines lose only the first level of indentation. */
function stripWidth(indent: number, context: ClassifyContext): number {
  return Math.min(indent, context.continuationIndent ?? indent);
}

/** Space, tab, form feed and vertical tab: the only whitespace the dialect knows. */
export function isWhitespace(ch: number): boolean {
  return ch === 32 /* space */ || ch === 9 /* tab */ || ch === 12 /* form feed */ || ch === 11 /* vtab */;
}

export function leadingWhitespace(text: string): number {
  let i = 0;
  while (i < text.length && isWhitespace(text.charCodeAt(i))) i += 1;
  return i;
}

function trimmedEnd(text: string, end = text.length, floor = 0): number {
  let i = end;
  while (i > floor && isWhitespace(text.charCodeAt(i - 1))) i -= 1;
  return i;
}

function skipWhitespace(text: string, from: number, end: number): number {
  let i = from;
  while (i < end && isWhitespace(text.charCodeAt(i))) i += 1;
  return i;
}
