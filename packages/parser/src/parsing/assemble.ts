import type { Dialect } from "../dialect/options.js";
import {
  EntryKind,
  type ContinuationEntry,
  type KeyValueEntry,
  type MalformedEntry,
  type PhysicalLine,
  type SectionEntry,
} from "../model/entries.js";
import { coverSpans, type SourceSpan } from "../model/span.js";
import { debug } from "../shared/debug.js";
import { classify, INITIAL_CONTEXT, isWhitespace, type ClassifyContext } from "./classify.js";

/** A logical key/value pair with every continuation line folded in. */
export interface AssembledEntry {
  /** Key as written. */
  readonly key: string;
  readonly keySpan: SourceSpan;
  /** Lines joined with "\n", trailing blank lines and dialect whitespace removed. */
  readonly value: string;
  /** First through last contributing line; zero-width at the value position when empty. */
  readonly valueSpan: SourceSpan;
  /** Key through the end of the value. */
  readonly span: SourceSpan;
  readonly lineCount: number;
  /** Input ended while a backslash continuation was pending. */
  readonly unterminated: boolean;
}

export type AssemblyEvent =
  | { readonly kind: "section"; readonly entry: SectionEntry }
  | { readonly kind: "entry"; readonly entry: AssembledEntry }
  /** Key/value pair seen before any section header. */
  | { readonly kind: "orphan-entry"; readonly entry: AssembledEntry }
  | { readonly kind: "malformed"; readonly entry: MalformedEntry };

interface OpenValue {
  readonly head: KeyValueEntry;
  readonly parts: string[];
  readonly spans: SourceSpan[];
  lineCount: number;
  continuationIndent: number | null;
  pendingBackslash: boolean;
}

/**
 * Drive the classifier line by line and yield finalized sections and entries in
 * source order. A value stays open until the next header, key, malformed line,
 * unswallowed blank line, or the end of input. Comments never close it.
 */
export function* assemble(lines: Iterable<PhysicalLine>, dialect: Dialect): Generator<AssemblyEvent, void, undefined> {
  let open: OpenValue | null = null;
  let sectionOpen = false;

  const finish = (value: OpenValue, unterminated: boolean): AssemblyEvent => {
    const entry = closeValue(value, unterminated);
    debug.assemble("value.close", { key: entry.key, lines: entry.lineCount, unterminated });
    return { kind: sectionOpen ? "entry" : "orphan-entry", entry };
  };

  for (const line of lines) {
    const entry = classify(line, dialect, contextFor(open, dialect));

    switch (entry.kind) {
      case EntryKind.Continuation:
        // The classifier only reports continuations while a value is open.
        if (open) appendContinuation(open, entry);
        break;
      case EntryKind.Comment:
        break;
      case EntryKind.Blank:
        if (open) {
          yield finish(open, false);
          open = null;
        }
        break;
      case EntryKind.Section:
        if (open) yield finish(open, false);
        open = null;
        sectionOpen = true;
        debug.assemble("section", { name: entry.name, line: entry.line });
        yield { kind: "section", entry };
        break;
      case EntryKind.KeyValue:
        if (open) yield finish(open, false);
        open = openValue(entry);
        break;
      case EntryKind.Malformed:
        if (open) yield finish(open, false);
        open = null;
        yield { kind: "malformed", entry };
        break;
    }
  }

  if (open) yield finish(open, open.pendingBackslash);
}

function openValue(head: KeyValueEntry): OpenValue {
  return {
    head,
    parts: [head.value],
    spans: head.value.length > 0 ? [head.valueSpan] : [],
    lineCount: 1,
    continuationIndent: null,
    pendingBackslash: head.continues,
  };
}

function appendContinuation(open: OpenValue, entry: ContinuationEntry): void {
  open.parts.push(entry.value);
  open.lineCount += 1;
  if (entry.value.length > 0) {
    open.spans.push(entry.valueSpan);
    if (open.continuationIndent === null && !open.pendingBackslash) open.continuationIndent = entry.indent;
  }
  open.pendingBackslash = entry.continues;
}

function contextFor(open: OpenValue | null, dialect: Dialect): ClassifyContext {
  if (!open) return INITIAL_CONTEXT;
  return {
    // Values without indented continuation stay open only through backslash markers.
    openValueIndent: dialect.allowContinuation ? open.head.indent : null,
    continuationIndent: open.continuationIndent,
    pendingBackslash: open.pendingBackslash,
  };
}

function closeValue(open: OpenValue, unterminated: boolean): AssembledEntry {
  const { head } = open;
  const value = trimValueEnd(open.parts.join("\n"));
  const valueSpan = coverSpans(open.spans) ?? head.valueSpan;
  return {
    key: head.key,
    keySpan: head.keySpan,
    value,
    valueSpan,
    span: coverSpans([head.span, valueSpan]) ?? head.span,
    lineCount: open.lineCount,
    unterminated,
  };
}

/** Drop trailing line breaks and dialect whitespace; other characters (e.g. NBSP) are value text. */
function trimValueEnd(value: string): string {
  let end = value.length;
  while (end > 0) {
    const ch = value.charCodeAt(end - 1);
    if (ch !== 10 /* LF */ && !isWhitespace(ch)) break;
    end -= 1;
  }
  return value.slice(0, end);
}
