import type { MalformedReason } from "../model/entries.js";
import { defineDiagnostic, type DiagnosticDataBase, type DiagnosticSpec } from "./types.js";

export type MalformedLineData = DiagnosticDataBase & {
  reason: MalformedReason;
  text: string;
};

export type MissingSectionHeaderData = DiagnosticDataBase & {
  key: string;
};

export type DuplicateSectionData = DiagnosticSectionData;

export type DuplicateKeyData = DiagnosticSectionData & {
  key: string;
};

export type UnterminatedContinuationData = DiagnosticSectionData & {
  key: string;
};

export type InterpolationMissingKeyData = DiagnosticSectionData & {
  key: string;
  /** Section the reference pointed into, when it differs from `section`. */
  targetSection?: string;
  reference: string;
  suggestions: string[];
};

export type InterpolationCycleData = DiagnosticSectionData & {
  key: string;
  chain: string[];
};

export type InterpolationDepthExceededData = DiagnosticSectionData & {
  key: string;
  limit: number;
};

export type InterpolationSyntaxData = DiagnosticSectionData & {
  key: string;
  /** Offset of the offending character within the raw value. */
  index: number;
};

type DiagnosticSectionData = DiagnosticDataBase & {
  section: string;
};

/** Maps code -> data shape for strongly-typed emission. */
export type IniDiagnosticDataByCode = {
  "ini/malformed-line": MalformedLineData;
  "ini/missing-section-header": MissingSectionHeaderData;
  "ini/duplicate-section": DuplicateSectionData;
  "ini/duplicate-key": DuplicateKeyData;
  "ini/unterminated-continuation": UnterminatedContinuationData;
  "ini/interpolation-missing-key": InterpolationMissingKeyData;
  "ini/interpolation-cycle": InterpolationCycleData;
  "ini/interpolation-depth-exceeded": InterpolationDepthExceededData;
  "ini/interpolation-syntax": InterpolationSyntaxData;
};

export type IniDiagnosticCode = keyof IniDiagnosticDataByCode;

export type IniDiagnosticDataFor<Code extends IniDiagnosticCode> = IniDiagnosticDataByCode[Code];

export const syntaxDiagnostics = {
  "ini/malformed-line": defineDiagnostic({
    kind: "MalformedLine",
    category: "syntax",
    status: "canonical",
    defaultSeverity: "warning",
    policy: "recoverable",
    stages: ["classify"],
    description:
      "Line is neither a section header, a key/value pair, a comment nor a continuation. " +
      "An unterminated section header is fatal in every mode.",
    data: { required: ["reason", "text"] },
  }),
  "ini/unterminated-continuation": defineDiagnostic({
    kind: "UnterminatedContinuation",
    category: "syntax",
    status: "canonical",
    defaultSeverity: "warning",
    policy: "recoverable",
    stages: ["assemble"],
    description: "Input ended while a backslash continuation was pending.",
    data: { required: ["section", "key"] },
  }),
} as const;

export const structureDiagnostics = {
  "ini/missing-section-header": defineDiagnostic({
    kind: "MissingSectionHeader",
    category: "structure",
    status: "canonical",
    defaultSeverity: "error",
    policy: "recoverable",
    stages: ["build"],
    description: "Key/value pair appears before any section header and the dialect has nowhere to put it.",
    data: { required: ["key"] },
  }),
  "ini/duplicate-section": defineDiagnostic({
    kind: "DuplicateSection",
    category: "structure",
    status: "canonical",
    defaultSeverity: "warning",
    policy: "recoverable",
    stages: ["build"],
    description: "Section header repeats an earlier one; lenient parsing merges the two.",
    data: { required: ["section"] },
  }),
  "ini/duplicate-key": defineDiagnostic({
    kind: "DuplicateKey",
    category: "structure",
    status: "canonical",
    defaultSeverity: "warning",
    policy: "recoverable",
    stages: ["build"],
    description: "Key repeats within one section; lenient parsing keeps the last value.",
    data: { required: ["section", "key"] },
  }),
} as const;

export const interpolationDiagnostics = {
  "ini/interpolation-missing-key": defineDiagnostic({
    kind: "InterpolationMissingKey",
    category: "interpolation",
    status: "canonical",
    defaultSeverity: "error",
    policy: "deferred",
    stages: ["interpolate"],
    description: "Placeholder references a key or section that does not exist.",
    data: { required: ["section", "key", "reference", "suggestions"], optional: ["targetSection"] },
  }),
  "ini/interpolation-cycle": defineDiagnostic({
    kind: "InterpolationCycle",
    category: "interpolation",
    status: "canonical",
    defaultSeverity: "error",
    policy: "deferred",
    stages: ["interpolate"],
    description: "Placeholders reference each other in a loop.",
    data: { required: ["section", "key", "chain"] },
  }),
  "ini/interpolation-depth-exceeded": defineDiagnostic({
    kind: "InterpolationDepthExceeded",
    category: "interpolation",
    status: "canonical",
    defaultSeverity: "error",
    policy: "deferred",
    stages: ["interpolate"],
    description: "Placeholder expansion nested deeper than the dialect allows.",
    data: { required: ["section", "key", "limit"] },
  }),
  "ini/interpolation-syntax": defineDiagnostic({
    kind: "InterpolationSyntax",
    category: "interpolation",
    status: "canonical",
    defaultSeverity: "error",
    policy: "deferred",
    stages: ["interpolate"],
    description: "Value uses the placeholder marker in a form the interpolation mode does not accept.",
    data: { required: ["section", "key", "index"] },
  }),
} as const;

export const diagnosticsCatalog = {
  ...syntaxDiagnostics,
  ...structureDiagnostics,
  ...interpolationDiagnostics,
} as const satisfies { readonly [K in IniDiagnosticCode]: DiagnosticSpec };

export const diagnosticsByCategory = {
  syntax: syntaxDiagnostics,
  structure: structureDiagnostics,
  interpolation: interpolationDiagnostics,
} as const;
