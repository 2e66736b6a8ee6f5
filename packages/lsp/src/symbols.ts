import type { IniDocument, IniSection } from "@inispan/parser";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { SymbolKind, type DocumentSymbol } from "vscode-languageserver/node.js";
import { spanToRange } from "./ranges.js";

/** Label for the default section when the dialect gives it no header name. */
export const DEFAULTS_SYMBOL_NAME = "(defaults)";

/**
 * Outline: one namespace per section (the default section first, when it has
 * keys) with its keys as properties. Detail shows the first line of the raw value.
 */
export function documentSymbols(document: IniDocument, doc: TextDocument): DocumentSymbol[] {
  const symbols: DocumentSymbol[] = [];
  for (const section of document.allSections()) {
    const symbol = sectionSymbol(section, doc);
    if (symbol) symbols.push(symbol);
  }
  return symbols;
}

function sectionSymbol(section: IniSection, doc: TextDocument): DocumentSymbol | null {
  const span = section.span;
  if (!span) return null;
  const range = spanToRange(doc, span);
  const nameSpan = section.nameSpan;

  const children: DocumentSymbol[] = section.entries().map((entry) => {
    const [firstLine = ""] = entry.value.raw.split("\n");
    return {
      name: entry.name,
      detail: firstLine,
      kind: SymbolKind.Property,
      range: spanToRange(doc, entry.span),
      selectionRange: spanToRange(doc, entry.keySpan),
    };
  });

  return {
    name: section.name || DEFAULTS_SYMBOL_NAME,
    kind: SymbolKind.Namespace,
    range,
    selectionRange: nameSpan ? spanToRange(doc, nameSpan) : range,
    children,
  };
}
