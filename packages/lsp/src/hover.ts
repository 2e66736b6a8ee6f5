import { debug, type IniDocument } from "@inispan/parser";
import type { TextDocument } from "vscode-languageserver-textdocument";
import type { Hover, Position } from "vscode-languageserver/node.js";
import { spanToRange } from "./ranges.js";

/**
 * Hover for the key/value pair under the cursor: the raw value, and the
 * effective value when interpolation changes it (or the error when it fails).
 */
export function hoverAt(document: IniDocument, doc: TextDocument, position: Position): Hover | null {
  const offset = doc.offsetAt(position);
  const located = document.entryAt(offset);
  if (!located) return null;
  const { section, entry } = located;

  const lines = [`**${entry.name}**${section.name ? ` in \`[${section.name}]\`` : ""}`, "", "```ini", entry.value.raw, "```"];
  const result = document.tryResolve(section, entry.key);
  if (!result.ok) {
    lines.push("", `**Error:** ${result.diagnostic.message}`);
  } else if (result.value !== undefined && result.value !== entry.value.raw) {
    lines.push("", "Effective value:", "", "```ini", result.value, "```");
  }

  debug.lsp("hover", { section: section.name, key: entry.name });
  return {
    contents: { kind: "markdown", value: lines.join("\n") },
    range: spanToRange(doc, entry.span),
  };
}
