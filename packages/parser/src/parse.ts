import { resolveDialect, type DialectOptions } from "./dialect/options.js";
import { DiagnosticSink, IniError } from "./diagnostics/build.js";
import { DocumentBuilder } from "./document/builder.js";
import type { IniDocument } from "./document/document.js";
import type { IniDiagnostic } from "./model/diagnostics.js";
import { assemble } from "./parsing/assemble.js";
import { splitLines } from "./parsing/lines.js";
import { debug } from "./shared/debug.js";

export type ParseResult =
  | {
      readonly ok: true;
      readonly document: IniDocument;
      /** Conditions recorded in lenient mode (always empty in strict mode). */
      readonly diagnostics: readonly IniDiagnostic[];
    }
  | {
      readonly ok: false;
      /** Strict: exactly the fatal diagnostic. Lenient: everything recorded, ending with it. */
      readonly diagnostics: readonly IniDiagnostic[];
    };

/**
 * Parse INI text.
 *
 * Never throws for bad input: failures come back as `{ ok: false }`. Invalid
 * options throw `DialectError` before any input is read.
 */
export function parse(source: string, options?: DialectOptions): ParseResult {
  const dialect = resolveDialect(options);
  const sink = new DiagnosticSink(dialect.strict);
  const builder = new DocumentBuilder(source, dialect, sink);

  try {
    for (const event of assemble(splitLines(source), dialect)) builder.accept(event);
  } catch (error) {
    if (!(error instanceof IniError)) throw error;
    debug.build("abort", { code: error.diagnostic.code, strict: dialect.strict });
    return { ok: false, diagnostics: dialect.strict ? [error.diagnostic] : error.diagnostics };
  }

  return { ok: true, document: builder.build(), diagnostics: sink.diagnostics };
}

/** Parse or throw `IniError` carrying the fatal diagnostic. */
export function parseOrThrow(source: string, options?: DialectOptions): IniDocument {
  const result = parse(source, options);
  if (result.ok) return result.document;
  const fatal = result.diagnostics[result.diagnostics.length - 1];
  if (!fatal) throw new Error("Parse failed without a diagnostic.");
  throw new IniError(fatal, result.diagnostics);
}
