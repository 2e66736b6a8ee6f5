import { foldName, type Dialect } from "../dialect/options.js";
import { buildDiagnostic, type DiagnosticSink } from "../diagnostics/build.js";
import type { MalformedEntry, MalformedReason, SectionEntry } from "../model/entries.js";
import { coverSpans, type SourceSpan } from "../model/span.js";
import type { AssembledEntry, AssemblyEvent } from "../parsing/assemble.js";
import { debug } from "../shared/debug.js";
import { IniDocument, IniSection, IniValue, type IniEntry } from "./document.js";

interface SectionDraft {
  readonly name: string;
  readonly key: string;
  readonly headerSpans: SourceSpan[];
  readonly entries: Map<string, EntryDraft>;
}

interface EntryDraft {
  readonly name: string;
  readonly key: string;
  readonly keySpan: SourceSpan;
  raw: string;
  valueSpan: SourceSpan;
  span: SourceSpan;
  readonly occurrences: SourceSpan[];
}

/**
 * Folds assembler events into a document, applying the dialect's duplicate,
 * malformed-line and orphan-key policies. Every policy decision goes through
 * the sink, which aborts in strict mode.
 */
export class DocumentBuilder {
  readonly #sections = new Map<string, SectionDraft>();
  readonly #defaults: SectionDraft;
  #current: SectionDraft | null = null;

  constructor(
    private readonly source: string,
    private readonly dialect: Dialect,
    private readonly sink: DiagnosticSink,
  ) {
    const name = dialect.defaultSection ?? "";
    this.#defaults = { name, key: foldName(name, dialect.caseFoldSections), headerSpans: [], entries: new Map() };
  }

  accept(event: AssemblyEvent): void {
    switch (event.kind) {
      case "section":
        this.section(event.entry);
        break;
      case "entry":
        this.entry(this.#current ?? this.#defaults, event.entry);
        break;
      case "orphan-entry":
        this.orphan(event.entry);
        break;
      case "malformed":
        this.malformed(event.entry);
        break;
    }
  }

  build(): IniDocument {
    const sections = new Map<string, IniSection>();
    for (const [key, draft] of this.#sections) sections.set(key, this.freeze(draft, false));
    debug.build("document", { sections: sections.size, defaults: this.#defaults.entries.size });
    return new IniDocument(this.source, this.dialect, sections, this.freeze(this.#defaults, true));
  }

  private section(header: SectionEntry): void {
    const { defaultSection, caseFoldSections } = this.dialect;
    const key = foldName(header.name, caseFoldSections);

    if (defaultSection !== null && key === foldName(defaultSection, caseFoldSections)) {
      this.#defaults.headerSpans.push(header.span);
      this.#current = this.#defaults;
      return;
    }

    const existing = this.#sections.get(key);
    if (existing) {
      const first = existing.headerSpans[0];
      this.sink.recoverable(
        buildDiagnostic("ini/duplicate-section", {
          message: `Duplicate section '${header.name}'.`,
          span: header.span,
          related: first ? [{ message: "first defined here", span: first }] : [],
          data: { section: existing.name },
        }),
      );
      debug.build("section.merge", { name: header.name, line: header.line });
      existing.headerSpans.push(header.span);
      this.#current = existing;
      return;
    }

    const draft: SectionDraft = { name: header.name, key, headerSpans: [header.span], entries: new Map() };
    this.#sections.set(key, draft);
    this.#current = draft;
  }

  private entry(section: SectionDraft, entry: AssembledEntry): void {
    const key = foldName(entry.key, this.dialect.caseFoldKeys);

    if (entry.unterminated) {
      this.sink.recoverable(
        buildDiagnostic("ini/unterminated-continuation", {
          message: `Value of '${entry.key}' ends with a line continuation but the input ends.`,
          span: entry.valueSpan,
          data: { section: section.name, key: entry.key },
        }),
      );
    }

    const existing = section.entries.get(key);
    if (!existing) {
      section.entries.set(key, {
        name: entry.key,
        key,
        keySpan: entry.keySpan,
        raw: entry.value,
        valueSpan: entry.valueSpan,
        span: entry.span,
        occurrences: [entry.span],
      });
      return;
    }

    this.sink.recoverable(
      buildDiagnostic("ini/duplicate-key", {
        message: `Duplicate key '${entry.key}' in section '${section.name}'.`,
        span: entry.keySpan,
        related: [{ message: "first defined here", span: existing.keySpan }],
        data: { section: section.name, key: entry.key },
      }),
    );
    debug.build("key.replace", { section: section.name, key: entry.key, occurrences: existing.occurrences.length + 1 });
    existing.raw = entry.value;
    existing.valueSpan = coverSpans([existing.valueSpan, entry.valueSpan]) ?? entry.valueSpan;
    existing.span = coverSpans([existing.span, entry.span]) ?? entry.span;
    existing.occurrences.push(entry.span);
  }

  private orphan(entry: AssembledEntry): void {
    if (this.dialect.keysBeforeSection === "default") {
      this.entry(this.#defaults, entry);
      return;
    }
    this.sink.recoverable(
      buildDiagnostic("ini/missing-section-header", {
        message: `Key '${entry.key}' appears before any section header.`,
        span: entry.span,
        data: { key: entry.key, recovery: true },
      }),
    );
    debug.build("orphan.drop", { key: entry.key });
  }

  private malformed(entry: MalformedEntry): void {
    const diagnostic = buildDiagnostic("ini/malformed-line", {
      message: this.describe(entry.reason, entry.text.trim()),
      span: entry.span,
      ...(entry.fatal ? { severity: "error" as const } : {}),
      data: { reason: entry.reason, text: entry.text },
    });
    if (entry.fatal) this.sink.abort(diagnostic);
    if (!this.sink.strict && this.dialect.malformedLines === "comment") {
      debug.build("malformed.ignore", { line: entry.line, reason: entry.reason });
      return;
    }
    this.sink.recoverable(diagnostic);
  }

  private describe(reason: MalformedReason, text: string): string {
    switch (reason) {
      case "missing-delimiter":
        return `Variable assignment missing one of: ${this.dialect.keyValueDelimiters.map((d) => `\`${d}\``).join(", ")}.`;
      case "empty-key":
        return "Empty option name.";
      case "empty-section-name":
        return "Empty section name.";
      case "bracket-in-section-name":
        return `Section name in '${text}' contains ']'.`;
      case "unterminated-section":
        return `Section header '${text}' is missing its closing ']'.`;
    }
  }

  private freeze(draft: SectionDraft, isDefault: boolean): IniSection {
    const entries = new Map<string, IniEntry>();
    for (const [key, e] of draft.entries) {
      entries.set(key, {
        name: e.name,
        key,
        keySpan: e.keySpan,
        value: new IniValue(e.raw, e.valueSpan),
        span: e.span,
        occurrences: [...e.occurrences],
      });
    }
    return new IniSection(draft.name, draft.key, [...draft.headerSpans], entries, {
      foldKeys: this.dialect.caseFoldKeys,
      isDefault,
    });
  }
}
