import type { SourceSpan } from "./span.js";

/** Presentation severity. `error` entries in a lenient result did not stop the parse. */
export type DiagnosticSeverity = "error" | "warning" | "info";

/** Pipeline stage that produced a diagnostic. */
export type DiagnosticStage = "classify" | "assemble" | "build" | "interpolate";

/** Taxonomy shared by every diagnostic code. */
export type IniDiagnosticKind =
  | "MalformedLine"
  | "MissingSectionHeader"
  | "DuplicateSection"
  | "DuplicateKey"
  | "UnterminatedContinuation"
  | "InterpolationMissingKey"
  | "InterpolationCycle"
  | "InterpolationDepthExceeded"
  | "InterpolationSyntax";

export interface DiagnosticRelated {
  readonly message: string;
  readonly span?: SourceSpan | null;
}

export interface IniDiagnostic<
  TCode extends string = string,
  TData extends object = Readonly<Record<string, unknown>>,
> {
  readonly code: TCode;
  readonly kind: IniDiagnosticKind;
  readonly message: string;
  readonly stage: DiagnosticStage;
  readonly severity: DiagnosticSeverity;
  /** Null only for conditions with no single source location. */
  readonly span: SourceSpan | null;
  readonly related?: readonly DiagnosticRelated[];
  readonly data?: Readonly<TData>;
}
