import type { DiagnosticSeverity, DiagnosticStage, IniDiagnosticKind } from "../model/diagnostics.js";

/** Category is the primary axis for grouping and reporting. */
export type DiagnosticCategory = "syntax" | "structure" | "interpolation";

/** Status tracks lifecycle of a code. */
export type DiagnosticStatus =
  | "canonical" // Stable, emitted today.
  | "proposed" // Not finalized; may change or be removed.
  | "deprecated"; // Superseded, do not emit.

/**
 * How a condition is handled under each strictness mode.
 * - `recoverable`: lenient records it and continues, strict aborts.
 * - `fatal`: aborts in both modes.
 * - `deferred`: surfaces on first read of the affected value.
 */
export type DiagnosticPolicy = "recoverable" | "fatal" | "deferred";

export type DiagnosticDataBase = {
  /** Set when the diagnostic came from a recovery path (e.g. a dropped line). */
  recovery?: boolean;
};

export type DiagnosticDataRequirement = {
  readonly required?: readonly string[];
  readonly optional?: readonly string[];
};

/** Single source of truth for severity, policy, and presentation metadata. */
export type DiagnosticSpec = {
  readonly kind: IniDiagnosticKind;
  readonly category: DiagnosticCategory;
  readonly status: DiagnosticStatus;
  /** Severity in lenient mode; strict aborts report everything as errors. */
  readonly defaultSeverity: DiagnosticSeverity;
  readonly policy: DiagnosticPolicy;
  readonly stages: readonly DiagnosticStage[];
  readonly description: string;
  readonly data?: DiagnosticDataRequirement;
};

/** Preserves literal types (kind, stages) without boilerplate in callers. */
export function defineDiagnostic<const TSpec extends DiagnosticSpec>(spec: TSpec): TSpec {
  return spec;
}
