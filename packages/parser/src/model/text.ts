import type { SourcePosition, SourceSpan } from "./span.js";

// Canonical offset <-> line/column helpers so span math stays out of the parser stages.

export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charCodeAt(i);
    if (ch === 13 /* CR */ || ch === 10 /* LF */) {
      if (ch === 13 /* CR */ && text.charCodeAt(i + 1) === 10 /* LF */) i += 1;
      starts.push(i + 1);
    }
  }
  return starts;
}

/** Line table over one source string. Positions are 1-based. */
export class LineIndex {
  readonly lineStarts: readonly number[];

  constructor(readonly text: string) {
    this.lineStarts = computeLineStarts(text);
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  positionAt(offset: number): SourcePosition {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.lineStarts[mid] ?? Number.POSITIVE_INFINITY) <= clamped) lo = mid;
      else hi = mid - 1;
    }
    const lineStart = this.lineStarts[lo] ?? 0;
    return { line: lo + 1, column: clamped - lineStart + 1 };
  }

  offsetAt(position: SourcePosition): number | null {
    if (position.line < 1 || position.column < 1) return null;
    const lineStart = this.lineStarts[position.line - 1];
    if (lineStart === undefined) return null;
    const lineEnd = this.lineStarts[position.line] ?? this.text.length;
    return Math.min(lineEnd, lineStart + position.column - 1);
  }

  spanFromOffsets(start: number, end: number): SourceSpan {
    const lo = Math.min(start, end);
    const hi = Math.max(start, end);
    const from = this.positionAt(lo);
    const to = this.positionAt(hi);
    return {
      start: lo,
      end: hi,
      startLine: from.line,
      startColumn: from.column,
      endLine: to.line,
      endColumn: to.column,
    };
  }

  /** Text of a 1-based line without its terminator. */
  lineText(line: number): string {
    const start = this.lineStarts[line - 1];
    if (start === undefined) return "";
    const next = this.lineStarts[line];
    const raw = this.text.slice(start, next ?? this.text.length);
    return raw.replace(/\r?\n$|\r$/, "");
  }
}
