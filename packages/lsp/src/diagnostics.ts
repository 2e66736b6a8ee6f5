import { debug, type DiagnosticSeverity, type IniDiagnostic } from "@inispan/parser";
import type { TextDocument } from "vscode-languageserver-textdocument";
import {
  DiagnosticSeverity as LspDiagnosticSeverity,
  type Diagnostic,
  type DiagnosticRelatedInformation,
} from "vscode-languageserver/node.js";
import { documentStartRange, spanToRange } from "./ranges.js";

export const DIAGNOSTIC_SOURCE = "inispan";

export function toLspSeverity(severity: DiagnosticSeverity): LspDiagnosticSeverity {
  switch (severity) {
    case "warning":
      return LspDiagnosticSeverity.Warning;
    case "info":
      return LspDiagnosticSeverity.Information;
    default:
      return LspDiagnosticSeverity.Error;
  }
}

export function toLspDiagnostics(diags: readonly IniDiagnostic[], doc: TextDocument): Diagnostic[] {
  const mapped: Diagnostic[] = [];
  for (const diag of diags) {
    const related: DiagnosticRelatedInformation[] = [];
    for (const rel of diag.related ?? []) {
      if (!rel.span) continue;
      related.push({ message: rel.message, location: { uri: doc.uri, range: spanToRange(doc, rel.span) } });
    }

    const base: Diagnostic = {
      range: diag.span ? spanToRange(doc, diag.span) : documentStartRange(),
      message: diag.message,
      severity: toLspSeverity(diag.severity),
      code: diag.code,
      source: DIAGNOSTIC_SOURCE,
    };
    if (related.length) base.relatedInformation = related;
    base.data = { kind: diag.kind };

    mapped.push(base);
  }
  debug.lsp("diagnostics", { uri: doc.uri, count: mapped.length });
  return mapped;
}
