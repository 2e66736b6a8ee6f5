import type { TextSpan } from "@inispan/parser";
import { TextDocument } from "vscode-languageserver-textdocument";
import type { Range } from "vscode-languageserver/node.js";

export const INI_LANGUAGE_ID = "ini";

export function createIniDocument(uri: string, text: string, version = 0): TextDocument {
  return TextDocument.create(uri, INI_LANGUAGE_ID, version, text);
}

/** Offsets are UTF-16 code units on both sides, so no re-encoding happens here. */
export function spanToRange(doc: TextDocument, span: TextSpan): Range {
  return { start: doc.positionAt(span.start), end: doc.positionAt(span.end) };
}

/** Zero-width range at the start of the document, for diagnostics with no location. */
export function documentStartRange(): Range {
  return { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } };
}
