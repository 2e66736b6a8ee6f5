import { describe, test, expect } from "vitest";
import {
  coverSpans,
  isEmptySpan,
  lineSpan,
  pickNarrowestContaining,
  sliceSpan,
  spanContains,
  spanContainsOffset,
  spanEquals,
  spanLength,
} from "../src/model/span.js";
import { computeLineStarts, LineIndex } from "../src/model/text.js";

describe("span primitives", () => {
  test("lineSpan offsets by the line start and uses 1-based columns", () => {
    expect(lineSpan(2, 10, 3, 6)).toEqual({
      start: 13,
      end: 16,
      startLine: 2,
      startColumn: 4,
      endLine: 2,
      endColumn: 7,
    });
  });

  test("lineSpan normalizes reversed bounds", () => {
    expect(lineSpan(1, 0, 5, 2)).toEqual(lineSpan(1, 0, 2, 5));
  });

  test("coverSpans takes positions from the outermost spans", () => {
    const first = lineSpan(1, 0, 2, 4);
    const second = lineSpan(3, 20, 0, 6);
    expect(coverSpans([second, null, first])).toEqual({
      start: 2,
      end: 26,
      startLine: 1,
      startColumn: 3,
      endLine: 3,
      endColumn: 7,
    });
    expect(coverSpans([])).toBeNull();
  });

  test("length, emptiness, containment and equality", () => {
    const outer = lineSpan(1, 0, 0, 10);
    const inner = lineSpan(1, 0, 2, 4);
    expect(spanLength(outer)).toBe(10);
    expect(isEmptySpan(lineSpan(1, 0, 3, 3))).toBe(true);
    expect(isEmptySpan(null)).toBe(true);
    expect(spanContains(outer, inner)).toBe(true);
    expect(spanContains(inner, outer)).toBe(false);
    expect(spanEquals(inner, { start: 2, end: 4 })).toBe(true);
    expect(spanContainsOffset(inner, 4)).toBe(false);
    expect(spanContainsOffset(inner, 3)).toBe(true);
  });

  test("pickNarrowestContaining prefers the tightest span", () => {
    const items = [
      { id: "section", span: lineSpan(1, 0, 0, 30) },
      { id: "entry", span: lineSpan(1, 0, 5, 12) },
      { id: "elsewhere", span: lineSpan(1, 0, 20, 25) },
    ];
    expect(pickNarrowestContaining(items, 6, (i) => i.span)?.id).toBe("entry");
    expect(pickNarrowestContaining(items, 14, (i) => i.span)?.id).toBe("section");
    expect(pickNarrowestContaining(items, 40, (i) => i.span)).toBeNull();
  });

  test("sliceSpan reads the source text", () => {
    expect(sliceSpan("[a]\nkey = value", { start: 10, end: 15 })).toBe("value");
  });
});

describe("LineIndex", () => {
  const text = "a\r\nbc\rd\n";
  const index = new LineIndex(text);

  test("records line starts for CRLF, CR and LF", () => {
    expect(computeLineStarts(text)).toEqual([0, 3, 6, 8]);
    expect(index.lineCount).toBe(4);
  });

  test("positionAt and offsetAt are inverse on valid positions", () => {
    expect(index.positionAt(4)).toEqual({ line: 2, column: 2 });
    expect(index.offsetAt({ line: 2, column: 2 })).toBe(4);
    expect(index.offsetAt({ line: 3, column: 1 })).toBe(6);
  });

  test("positionAt clamps out-of-range offsets", () => {
    expect(index.positionAt(100)).toEqual({ line: 4, column: 1 });
    expect(index.positionAt(-3)).toEqual({ line: 1, column: 1 });
  });

  test("offsetAt rejects positions outside the text", () => {
    expect(index.offsetAt({ line: 0, column: 1 })).toBeNull();
    expect(index.offsetAt({ line: 9, column: 1 })).toBeNull();
  });

  test("lineText strips terminators", () => {
    expect(index.lineText(1)).toBe("a");
    expect(index.lineText(2)).toBe("bc");
    expect(index.lineText(3)).toBe("d");
    expect(index.lineText(7)).toBe("");
  });

  test("spanFromOffsets matches lineSpan for single-line ranges", () => {
    expect(index.spanFromOffsets(3, 5)).toEqual(lineSpan(2, 3, 0, 2));
  });
});
