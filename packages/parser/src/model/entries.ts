import type { SourceSpan } from "./span.js";

/* =======================================================================================
 * Physical lines and their classification
 * ======================================================================================= */

/** One physical line of input, terminator excluded. */
export interface PhysicalLine {
  readonly text: string;
  /** 1-based line number. */
  readonly line: number;
  /** Offset of the first character of the line. */
  readonly start: number;
}

export enum EntryKind {
  Blank = "Blank",
  Comment = "Comment",
  Section = "Section",
  KeyValue = "KeyValue",
  Continuation = "Continuation",
  Malformed = "Malformed",
}

export type MalformedReason =
  | "missing-delimiter"
  | "empty-key"
  | "empty-section-name"
  | "bracket-in-section-name"
  | "unterminated-section";

interface EntryBase {
  /** The physical line, terminator excluded. */
  readonly text: string;
  readonly line: number;
  /** Trimmed content of the line (whole line for blanks). */
  readonly span: SourceSpan;
}

export interface BlankEntry extends EntryBase {
  readonly kind: EntryKind.Blank;
}

export interface CommentEntry extends EntryBase {
  readonly kind: EntryKind.Comment;
  readonly prefix: string;
  /** Comment body after the prefix, trimmed. */
  readonly comment: string;
}

export interface SectionEntry extends EntryBase {
  readonly kind: EntryKind.Section;
  /** Verbatim text between the first `[` and the last `]`. */
  readonly name: string;
  readonly nameSpan: SourceSpan;
}

export interface KeyValueEntry extends EntryBase {
  readonly kind: EntryKind.KeyValue;
  /** Key as written (trimmed, not folded). */
  readonly key: string;
  readonly keySpan: SourceSpan;
  readonly delimiter: string;
  readonly value: string;
  /** Zero-width at the value position when the value is empty. */
  readonly valueSpan: SourceSpan;
  /** Width of the line's leading whitespace. */
  readonly indent: number;
  /** The value ended with a backslash continuation marker. */
  readonly continues: boolean;
}

export interface ContinuationEntry extends EntryBase {
  readonly kind: EntryKind.Continuation;
  /** Text this line contributes to the open value. */
  readonly value: string;
  readonly valueSpan: SourceSpan;
  readonly indent: number;
  readonly continues: boolean;
}

export interface MalformedEntry extends EntryBase {
  readonly kind: EntryKind.Malformed;
  readonly reason: MalformedReason;
  /** No recovery exists; the parse stops in every mode. */
  readonly fatal: boolean;
}

export type RawEntry =
  | BlankEntry
  | CommentEntry
  | SectionEntry
  | KeyValueEntry
  | ContinuationEntry
  | MalformedEntry;
