import { foldName, type Dialect } from "../dialect/options.js";
import type { IniDiagnostic } from "../model/diagnostics.js";
import { coverSpans, pickNarrowestContaining, type SourceSpan } from "../model/span.js";
import { IniError } from "../diagnostics/build.js";
import { InterpolationResolver } from "../interpolation/resolver.js";

/** A raw value plus the lazily computed effective (interpolated) string. */
export class IniValue {
  #effective: string | undefined;

  constructor(
    /** Text as written, continuation lines joined with "\n". */
    public readonly raw: string,
    /** First through last contributing line; for a duplicated key, every definition's value. */
    public readonly span: SourceSpan,
  ) {}

  /** Effective string, once something has resolved it. */
  get cached(): string | undefined {
    return this.#effective;
  }

  /** Record the effective string. Later calls keep the first result. */
  remember(effective: string): string {
    this.#effective ??= effective;
    return this.#effective;
  }
}

export interface IniEntry {
  /** Key as first written. */
  readonly name: string;
  /** Lookup key (folded when the dialect folds keys). */
  readonly key: string;
  /** Key span of the first definition. */
  readonly keySpan: SourceSpan;
  readonly value: IniValue;
  /** Key through value; the union of every definition for a duplicated key. */
  readonly span: SourceSpan;
  /** Span of each definition in source order (more than one only for duplicates). */
  readonly occurrences: readonly SourceSpan[];
}

export class IniSection {
  readonly #entries: ReadonlyMap<string, IniEntry>;
  readonly #foldKeys: boolean;
  /** Effective values of default-section keys resolved in this section's context. */
  readonly #inherited = new Map<string, string>();

  constructor(
    /** Name as first written. */
    public readonly name: string,
    /** Lookup key (folded when the dialect folds section names). */
    public readonly key: string,
    /** One span per header line (several when the section was merged). */
    public readonly headerSpans: readonly SourceSpan[],
    entries: ReadonlyMap<string, IniEntry>,
    options: { readonly foldKeys: boolean; readonly isDefault: boolean },
  ) {
    this.#entries = entries;
    this.#foldKeys = options.foldKeys;
    this.isDefault = options.isDefault;
  }

  readonly isDefault: boolean;

  get headerSpan(): SourceSpan | null {
    return this.headerSpans[0] ?? null;
  }

  get nameSpan(): SourceSpan | null {
    const header = this.headerSpan;
    if (!header) return null;
    return {
      start: header.start + 1,
      end: header.start + 1 + this.name.length,
      startLine: header.startLine,
      startColumn: header.startColumn + 1,
      endLine: header.startLine,
      endColumn: header.startColumn + 1 + this.name.length,
    };
  }

  /** Every header and entry of the section; null for an empty implicit default section. */
  get span(): SourceSpan | null {
    return coverSpans([...this.headerSpans, ...[...this.#entries.values()].map((e) => e.span)]);
  }

  get size(): number {
    return this.#entries.size;
  }

  entry(name: string): IniEntry | undefined {
    return this.#entries.get(foldName(name, this.#foldKeys));
  }

  has(name: string): boolean {
    return this.#entries.has(foldName(name, this.#foldKeys));
  }

  /** Written key names in file order. */
  keys(): string[] {
    return [...this.#entries.values()].map((e) => e.name);
  }

  entries(): IniEntry[] {
    return [...this.#entries.values()];
  }

  inheritedValue(key: string): string | undefined {
    return this.#inherited.get(key);
  }

  rememberInherited(key: string, effective: string): string {
    const existing = this.#inherited.get(key);
    if (existing !== undefined) return existing;
    this.#inherited.set(key, effective);
    return effective;
  }
}

export type GetResult =
  | { readonly ok: true; readonly value: string | undefined }
  | { readonly ok: false; readonly diagnostic: IniDiagnostic };

export interface KeysOptions {
  /** Include keys inherited from the default section. Default: false. */
  inherited?: boolean;
}

/** An entry together with the section that owns it. */
export interface LocatedEntry {
  readonly section: IniSection;
  readonly entry: IniEntry;
}

/**
 * Parsed configuration. Immutable apart from the effective-value cache.
 *
 * Lookups fold names the way the dialect says and fall back to the default
 * section for keys a section does not define.
 */
export class IniDocument {
  readonly #sections: ReadonlyMap<string, IniSection>;
  readonly #resolver: InterpolationResolver;

  constructor(
    public readonly source: string,
    public readonly dialect: Dialect,
    sections: ReadonlyMap<string, IniSection>,
    /** Keys before the first header and under the default-section header. */
    public readonly defaults: IniSection,
  ) {
    this.#sections = sections;
    this.#resolver = new InterpolationResolver(dialect, this);
  }

  /** Section names as first written, in file order. The default section is not listed. */
  sections(): string[] {
    return [...this.#sections.values()].map((s) => s.name);
  }

  /** Section by name; the default-section name returns `defaults`. */
  section(name: string): IniSection | undefined {
    const { defaultSection, caseFoldSections } = this.dialect;
    if (defaultSection !== null && foldName(name, caseFoldSections) === foldName(defaultSection, caseFoldSections)) {
      return this.defaults;
    }
    return this.#sections.get(foldName(name, caseFoldSections));
  }

  hasSection(name: string): boolean {
    return this.#sections.has(foldName(name, this.dialect.caseFoldSections));
  }

  /** True when the key is defined in the section or inherited from the default section. */
  has(section: string, key: string): boolean {
    return this.entry(section, key) !== undefined;
  }

  /** The defining entry, local first, then the default section. */
  entry(section: string, key: string): IniEntry | undefined {
    return this.locate(section, key)?.entry;
  }

  /** Like `entry`, also reporting which section owns the definition. */
  locate(section: string, key: string): LocatedEntry | undefined {
    const target = this.section(section);
    if (!target) return undefined;
    const local = target.entry(key);
    if (local) return { section: target, entry: local };
    const inherited = target === this.defaults ? undefined : this.defaults.entry(key);
    return inherited ? { section: this.defaults, entry: inherited } : undefined;
  }

  keys(section: string, options: KeysOptions = {}): string[] {
    const target = this.section(section);
    if (!target) return [];
    const local = target.keys();
    if (!options.inherited || target === this.defaults) return local;
    const seen = new Set(local.map((k) => foldName(k, this.dialect.caseFoldKeys)));
    return [...local, ...this.defaults.keys().filter((k) => !seen.has(foldName(k, this.dialect.caseFoldKeys)))];
  }

  getRaw(section: string, key: string): string | undefined {
    return this.entry(section, key)?.value.raw;
  }

  /** Effective value; throws `IniError` when interpolation fails. */
  get(section: string, key: string): string | undefined {
    const result = this.tryGet(section, key);
    if (!result.ok) throw new IniError(result.diagnostic);
    return result.value;
  }

  tryGet(section: string, key: string): GetResult {
    const target = this.section(section);
    if (!target) return { ok: true, value: undefined };
    return this.tryResolve(target, key);
  }

  /** `tryGet` for a section object already in hand (including an unnamed default section). */
  tryResolve(section: IniSection, key: string): GetResult {
    try {
      return { ok: true, value: this.#resolver.effective(section, key) };
    } catch (error) {
      if (error instanceof IniError) return { ok: false, diagnostic: error.diagnostic };
      throw error;
    }
  }

  /**
   * Resolve every value in its own section and collect the failures. Reads
   * stay lazy; this is for tooling that wants all problems up front.
   */
  interpolationDiagnostics(): IniDiagnostic[] {
    const found: IniDiagnostic[] = [];
    for (const section of this.allSections()) {
      for (const entry of section.entries()) {
        const result = this.tryResolve(section, entry.key);
        if (!result.ok) found.push(result.diagnostic);
      }
    }
    return found;
  }

  /**
   * Locale-suffixed lookup: `key[tag]` first, then shorter forms of the tag
   * (`lang_COUNTRY@MODIFIER`, `lang_COUNTRY`, `lang@MODIFIER`, `lang`), then `key`.
   */
  getLocalized(section: string, key: string, tag: string): string | undefined {
    for (const candidate of localeFallbacks(tag)) {
      const localized = `${key}[${candidate}]`;
      if (this.has(section, localized)) return this.get(section, localized);
    }
    return this.get(section, key);
  }

  sectionSpan(section: string): SourceSpan | null {
    return this.section(section)?.span ?? null;
  }

  keySpan(section: string, key: string): SourceSpan | null {
    return this.entry(section, key)?.keySpan ?? null;
  }

  valueSpan(section: string, key: string): SourceSpan | null {
    return this.entry(section, key)?.value.span ?? null;
  }

  /** The entry whose span most tightly contains a source offset. */
  entryAt(offset: number): LocatedEntry | null {
    const candidates: LocatedEntry[] = [];
    for (const section of [this.defaults, ...this.#sections.values()]) {
      for (const entry of section.entries()) candidates.push({ section, entry });
    }
    return pickNarrowestContaining(candidates, offset, (c) => c.entry.span);
  }

  /** The section whose header or body contains a source offset. */
  sectionAt(offset: number): IniSection | null {
    return pickNarrowestContaining([this.defaults, ...this.#sections.values()], offset, (s) => s.span);
  }

  /** The default section followed by every named section, in file order. */
  allSections(): IniSection[] {
    return [this.defaults, ...this.#sections.values()];
  }
}

function localeFallbacks(tag: string): string[] {
  const match = /^([^_@.]+)(?:_([^@.]+))?(?:\.[^@]+)?(?:@(.+))?$/.exec(tag);
  if (!match) return [tag];
  const [, lang = tag, country, modifier] = match;
  const candidates: string[] = [tag];
  if (country !== undefined && modifier !== undefined) candidates.push(`${lang}_${country}@${modifier}`);
  if (country !== undefined) candidates.push(`${lang}_${country}`);
  if (modifier !== undefined) candidates.push(`${lang}@${modifier}`);
  candidates.push(lang);
  return [...new Set(candidates)];
}
