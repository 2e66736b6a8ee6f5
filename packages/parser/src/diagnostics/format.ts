import type { IniDiagnostic } from "../model/diagnostics.js";
import { LineIndex } from "../model/text.js";

export interface FormatDiagnosticOptions {
  /** Shown in the location prefix. Default: "<input>". */
  fileName?: string;
  /** Print the source line with a caret underline. Default: true. */
  excerpt?: boolean;
}

/**
 * Render a diagnostic as plain text:
 *
 * ```text
 * app.ini:3:1: warning[ini/duplicate-key]: Duplicate key 'foo' in section 'a'.
 *   3 | foo = 2
 *     | ^^^
 *   = first defined here (2:1)
 * ```
 */
export function formatDiagnostic(
  diagnostic: IniDiagnostic,
  source: string | LineIndex,
  options: FormatDiagnosticOptions = {},
): string {
  const { fileName = "<input>", excerpt = true } = options;
  const index = typeof source === "string" ? new LineIndex(source) : source;
  const span = diagnostic.span;
  const location = span ? `${fileName}:${span.startLine}:${span.startColumn}` : fileName;
  const lines = [`${location}: ${diagnostic.severity}[${diagnostic.code}]: ${diagnostic.message}`];

  if (span && excerpt) {
    const text = index.lineText(span.startLine);
    const gutter = String(span.startLine);
    const pad = " ".repeat(gutter.length);
    const endColumn = span.endLine === span.startLine ? span.endColumn : text.length + 1;
    const width = Math.max(1, endColumn - span.startColumn);
    lines.push(`  ${gutter} | ${text}`);
    lines.push(`  ${pad} | ${" ".repeat(span.startColumn - 1)}${"^".repeat(width)}`);
  }

  for (const related of diagnostic.related ?? []) {
    const at = related.span ? ` (${related.span.startLine}:${related.span.startColumn})` : "";
    lines.push(`  = ${related.message}${at}`);
  }

  return lines.join("\n");
}

/** Render several diagnostics separated by blank lines. */
export function formatDiagnostics(
  diagnostics: readonly IniDiagnostic[],
  source: string,
  options: FormatDiagnosticOptions = {},
): string {
  const index = new LineIndex(source);
  return diagnostics.map((d) => formatDiagnostic(d, index, options)).join("\n\n");
}
