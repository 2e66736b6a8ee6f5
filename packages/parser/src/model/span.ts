/* =======================================================================================
 * Span primitives (source ranges)
 * ---------------------------------------------------------------------------------------
 * - Offsets are 0-based UTF-16 code units, [start, end) (end is exclusive)
 * - Lines and columns are 1-based; columns count UTF-16 code units
 * - Helpers for length/coverage/containment/slicing
 * ======================================================================================= */

export interface TextSpan {
  start: number;
  end: number;
}

export interface SourcePosition {
  readonly line: number;
  readonly column: number;
}

export interface SourceSpan extends TextSpan {
  readonly startLine: number;
  readonly startColumn: number;
  readonly endLine: number;
  readonly endColumn: number;
}

export type SpanLike = TextSpan | SourceSpan;

export function spanLength(span: SpanLike | null | undefined): number {
  return span ? Math.max(0, span.end - span.start) : 0;
}

export function isEmptySpan(span: SpanLike | null | undefined): boolean {
  return spanLength(span) === 0;
}

/** Build a span that lies on a single physical line. `from`/`to` are offsets within the line. */
export function lineSpan(line: number, lineStart: number, from: number, to: number): SourceSpan {
  const lo = Math.min(from, to);
  const hi = Math.max(from, to);
  return {
    start: lineStart + lo,
    end: lineStart + hi,
    startLine: line,
    startColumn: lo + 1,
    endLine: line,
    endColumn: hi + 1,
  };
}

export function spanStart(span: SourceSpan): SourcePosition {
  return { line: span.startLine, column: span.startColumn };
}

export function spanEnd(span: SourceSpan): SourcePosition {
  return { line: span.endLine, column: span.endColumn };
}

/**
 * Smallest span covering every input span. Line/column data is taken from the
 * spans that contribute the extreme offsets.
 */
export function coverSpans(spans: Iterable<SourceSpan | null | undefined>): SourceSpan | null {
  let first: SourceSpan | null = null;
  let last: SourceSpan | null = null;

  for (const span of spans) {
    if (!span) continue;
    if (!first || span.start < first.start) first = span;
    if (!last || span.end > last.end) last = span;
  }

  if (!first || !last) return null;
  return {
    start: first.start,
    end: last.end,
    startLine: first.startLine,
    startColumn: first.startColumn,
    endLine: last.endLine,
    endColumn: last.endColumn,
  };
}

export function spanContains(haystack: SpanLike | null | undefined, needle: SpanLike | null | undefined): boolean {
  if (!haystack || !needle) return false;
  return haystack.start <= needle.start && haystack.end >= needle.end;
}

export function spanEquals(a: SpanLike | null | undefined, b: SpanLike | null | undefined): boolean {
  if (!a || !b) return false;
  return a.start === b.start && a.end === b.end;
}

/** True when an offset falls within [start, end) of the given span (null-safe). */
export function spanContainsOffset(span: SpanLike | null | undefined, offset: number): boolean {
  if (!span) return false;
  return offset >= span.start && offset < span.end;
}

/**
 * Find the item whose span most tightly contains the offset.
 * Useful when callers care about the owning object rather than the span itself.
 */
export function pickNarrowestContaining<T>(
  items: Iterable<T>,
  offset: number,
  spanOf: (item: T) => SpanLike | null | undefined,
): T | null {
  let best: { item: T; span: SpanLike } | null = null;
  for (const item of items) {
    const span = spanOf(item);
    if (!span || !spanContainsOffset(span, offset)) continue;
    if (!best || spanLength(span) < spanLength(best.span)) {
      best = { item, span };
    }
  }
  return best?.item ?? null;
}

export function sliceSpan(source: string, span: TextSpan): string {
  return source.slice(span.start, span.end);
}

/** Drop line/column data, e.g. for comparisons in tooling that only deals in offsets. */
export function toTextSpan(span: SpanLike): TextSpan {
  return { start: span.start, end: span.end };
}
