import type { PhysicalLine } from "../model/entries.js";

/**
 * Split source text into physical lines. LF, CRLF and lone CR all terminate a
 * line; a terminator at the very end does not open an extra empty line.
 * A leading byte order mark is treated as part of no line.
 */
export function splitLines(source: string): PhysicalLine[] {
  const lines: PhysicalLine[] = [];
  let start = source.charCodeAt(0) === 0xfeff ? 1 : 0;
  let line = 1;

  for (let i = start; i < source.length; i += 1) {
    const ch = source.charCodeAt(i);
    if (ch !== 10 /* LF */ && ch !== 13 /* CR */) continue;
    lines.push({ text: source.slice(start, i), line, start });
    if (ch === 13 /* CR */ && source.charCodeAt(i + 1) === 10 /* LF */) i += 1;
    start = i + 1;
    line += 1;
  }

  if (start < source.length) {
    lines.push({ text: source.slice(start), line, start });
  }
  return lines;
}
