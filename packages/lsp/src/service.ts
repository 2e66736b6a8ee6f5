import {
  debug,
  isDialectPreset,
  parse,
  resolveDialect,
  type Dialect,
  type DialectOptions,
  type IniDiagnostic,
  type IniDocument,
} from "@inispan/parser";
import type { TextDocument } from "vscode-languageserver-textdocument";
import type { Diagnostic, DocumentSymbol, Hover, Position } from "vscode-languageserver/node.js";
import { toLspDiagnostics } from "./diagnostics.js";
import { hoverAt } from "./hover.js";
import { documentSymbols } from "./symbols.js";

export interface LanguageServiceOptions {
  dialect?: DialectOptions;
  /** Resolve every value on each change and report interpolation failures. Default: true. */
  checkInterpolation?: boolean;
}

/** One parse of one document version. */
export interface Analysis {
  readonly uri: string;
  readonly version: number;
  /** Null when the parse aborted. */
  readonly document: IniDocument | null;
  /** Parse diagnostics followed by interpolation failures. */
  readonly diagnostics: readonly IniDiagnostic[];
}

/**
 * Editor-facing queries over open INI documents. Parses are cached per URI and
 * reused while the version is unchanged.
 */
export class IniLanguageService {
  readonly #cache = new Map<string, Analysis>();
  #dialect: Dialect;
  #checkInterpolation: boolean;

  constructor(options: LanguageServiceOptions = {}) {
    this.#dialect = resolveDialect(options.dialect);
    this.#checkInterpolation = options.checkInterpolation ?? true;
  }

  get dialect(): Dialect {
    return this.#dialect;
  }

  /** Replace the options. Throws `DialectError` and keeps the old ones when they are invalid. */
  configure(options: LanguageServiceOptions): void {
    this.#dialect = resolveDialect(options.dialect);
    this.#checkInterpolation = options.checkInterpolation ?? true;
    this.#cache.clear();
  }

  analyze(doc: TextDocument): Analysis {
    const cached = this.#cache.get(doc.uri);
    if (cached && cached.version === doc.version) return cached;

    const result = parse(doc.getText(), this.#dialect);
    const diagnostics = [...result.diagnostics];
    if (result.ok && this.#checkInterpolation) diagnostics.push(...result.document.interpolationDiagnostics());

    const analysis: Analysis = {
      uri: doc.uri,
      version: doc.version,
      document: result.ok ? result.document : null,
      diagnostics,
    };
    this.#cache.set(doc.uri, analysis);
    debug.lsp("analyze", { uri: doc.uri, version: doc.version, ok: result.ok, diagnostics: diagnostics.length });
    return analysis;
  }

  diagnostics(doc: TextDocument): Diagnostic[] {
    return toLspDiagnostics(this.analyze(doc).diagnostics, doc);
  }

  symbols(doc: TextDocument): DocumentSymbol[] {
    const { document } = this.analyze(doc);
    return document ? documentSymbols(document, doc) : [];
  }

  hover(doc: TextDocument, position: Position): Hover | null {
    const { document } = this.analyze(doc);
    return document ? hoverAt(document, doc, position) : null;
  }

  forget(uri: string): void {
    this.#cache.delete(uri);
  }
}

/**
 * Read service options from client-supplied initialization options. Only a
 * known preset name and the interpolation check flag are taken.
 */
export function optionsFromInitialization(value: unknown): LanguageServiceOptions {
  if (typeof value !== "object" || value === null) return {};
  const options: LanguageServiceOptions = {};
  const preset: unknown = Reflect.get(value, "preset");
  if (typeof preset === "string" && isDialectPreset(preset)) options.dialect = { preset };
  const check: unknown = Reflect.get(value, "checkInterpolation");
  if (typeof check === "boolean") options.checkInterpolation = check;
  return options;
}
