import type { DiagnosticRelated, DiagnosticSeverity, IniDiagnostic } from "../model/diagnostics.js";
import type { SourceSpan } from "../model/span.js";
import { diagnosticsCatalog, type IniDiagnosticCode, type IniDiagnosticDataFor } from "./catalog.js";
import type { DiagnosticSpec } from "./types.js";

export type IniDiagnosticOf<Code extends IniDiagnosticCode> = IniDiagnostic<Code, IniDiagnosticDataFor<Code>>;

export interface BuildDiagnosticInput<Code extends IniDiagnosticCode> {
  message: string;
  span: SourceSpan | null;
  /** Overrides the catalog's default severity. */
  severity?: DiagnosticSeverity;
  related?: readonly DiagnosticRelated[];
  data: IniDiagnosticDataFor<Code>;
}

const catalog: { readonly [K in IniDiagnosticCode]: DiagnosticSpec } = diagnosticsCatalog;

export function specFor(code: IniDiagnosticCode): DiagnosticSpec {
  return catalog[code];
}

/** Centralized diagnostic builder: kind, stage and severity come from the catalog. */
export function buildDiagnostic<Code extends IniDiagnosticCode>(
  code: Code,
  input: BuildDiagnosticInput<Code>,
): IniDiagnosticOf<Code> {
  const spec = catalog[code];
  return {
    code,
    kind: spec.kind,
    message: input.message,
    stage: spec.stages[0] ?? "build",
    severity: input.severity ?? spec.defaultSeverity,
    span: input.span,
    ...(input.related && input.related.length > 0 ? { related: input.related } : {}),
    data: input.data,
  };
}

/** Thrown at API boundaries when a diagnostic stops an operation. */
export class IniError extends Error {
  constructor(
    public readonly diagnostic: IniDiagnostic,
    /** Everything recorded up to and including `diagnostic`. */
    public readonly diagnostics: readonly IniDiagnostic[] = [diagnostic],
  ) {
    super(describe(diagnostic));
    this.name = "IniError";
  }

  get code(): string {
    return this.diagnostic.code;
  }
}

function describe(diag: IniDiagnostic): string {
  const at = diag.span ? ` (line ${diag.span.startLine}, column ${diag.span.startColumn})` : "";
  return `${diag.message}${at}`;
}

/**
 * Collects diagnostics for one parse.
 *
 * Lenient sinks record recoverable conditions and keep going; strict sinks turn
 * the first one into an abort. `abort` stops the parse in both modes.
 */
export class DiagnosticSink {
  readonly #items: IniDiagnostic[] = [];

  constructor(public readonly strict: boolean) {}

  get diagnostics(): readonly IniDiagnostic[] {
    return this.#items;
  }

  recoverable(diag: IniDiagnostic): void {
    if (this.strict) this.abort(diag.severity === "error" ? diag : { ...diag, severity: "error" });
    this.#items.push(diag);
  }

  abort(diag: IniDiagnostic): never {
    this.#items.push(diag);
    throw new IniError(diag, [...this.#items]);
  }
}
