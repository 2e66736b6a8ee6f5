import type { Dialect } from "../dialect/options.js";
import type { IniEntry, IniSection } from "../document/document.js";
import { buildDiagnostic, IniError } from "../diagnostics/build.js";
import type { IniDiagnosticDataFor } from "../diagnostics/catalog.js";
import type { DiagnosticRelated } from "../model/diagnostics.js";
import type { SourceSpan } from "../model/span.js";
import { debug } from "../shared/debug.js";
import { findSimilar, formatSuggestion } from "../shared/suggestions.js";
import { isPlainValue, parseTemplate } from "./placeholders.js";

/** What the resolver needs from a document. */
export interface InterpolationScope {
  readonly defaults: IniSection;
  section(name: string): IniSection | undefined;
}

interface Located {
  /** Section that defines the entry (the context section or the defaults). */
  readonly owner: IniSection;
  readonly entry: IniEntry;
}

interface Frame {
  /** Section whose context the value is resolved in. */
  readonly context: IniSection;
  readonly entry: IniEntry;
}

/**
 * Lazy placeholder expansion.
 *
 * References resolve in the requesting section's context with fallback to the
 * default section; `${section:name}` switches context. Results are cached on
 * the value (or per section for inherited values), so repeated reads are
 * constant time and always agree.
 */
export class InterpolationResolver {
  constructor(
    private readonly dialect: Dialect,
    private readonly scope: InterpolationScope,
  ) {}

  /** Effective value of `name` in `section`; undefined when not defined. Throws `IniError`. */
  effective(section: IniSection, name: string): string | undefined {
    const located = this.locate(section, name);
    if (!located) return undefined;
    return this.resolve(section, located, []);
  }

  private locate(section: IniSection, name: string): Located | undefined {
    const local = section.entry(name);
    if (local) return { owner: section, entry: local };
    if (section === this.scope.defaults) return undefined;
    const inherited = this.scope.defaults.entry(name);
    return inherited ? { owner: this.scope.defaults, entry: inherited } : undefined;
  }

  private resolve(context: IniSection, located: Located, chain: readonly Frame[]): string {
    const { owner, entry } = located;
    const cached = owner === context ? entry.value.cached : context.inheritedValue(entry.key);
    if (cached !== undefined) return cached;

    const mode = this.dialect.interpolation;
    if (mode === "none" || isPlainValue(entry.value.raw, mode)) {
      return this.remember(context, located, entry.value.raw);
    }

    const frame: Frame = { context, entry };
    if (chain.some((f) => f.context === context && f.entry === entry)) {
      throw this.cycle([...chain, frame]);
    }
    if (chain.length >= this.dialect.maxInterpolationDepth) {
      throw this.fail("ini/interpolation-depth-exceeded", chain, frame, {
        message: `Interpolation of '${label(chain, frame)}' exceeds the maximum depth of ${this.dialect.maxInterpolationDepth}.`,
        data: { section: context.name, key: entry.name, limit: this.dialect.maxInterpolationDepth },
      });
    }

    const parsed = parseTemplate(entry.value.raw, mode);
    if (!parsed.ok) {
      throw this.fail("ini/interpolation-syntax", chain, frame, {
        message: `${parsed.message} in '${label(chain, frame)}'.`,
        data: { section: context.name, key: entry.name, index: parsed.index },
      });
    }

    const next = [...chain, frame];
    let out = "";
    for (const part of parsed.parts) {
      if (part.kind === "text") {
        out += part.text;
        continue;
      }
      const target = part.section === null ? context : this.scope.section(part.section);
      const found = target ? this.locate(target, part.key) : undefined;
      if (!target || !found) {
        const candidates = target ? [...target.keys(), ...this.scope.defaults.keys()] : [];
        const suggestions = target ? findSimilar(part.key, candidates) : [];
        const missing = target ? `key '${part.key}'` : `section '${part.section ?? ""}'`;
        throw this.fail("ini/interpolation-missing-key", chain, frame, {
          message: `Interpolation reference ${part.source} in '${label(chain, frame)}' names ${missing}, which does not exist.${formatSuggestion(suggestions)}`,
          data: {
            section: context.name,
            key: entry.name,
            ...(part.section !== null ? { targetSection: part.section } : {}),
            reference: part.source,
            suggestions,
          },
        });
      }
      out += this.resolve(target, found, next);
    }

    debug.interpolate("resolve", { section: context.name, key: entry.name, depth: chain.length });
    return this.remember(context, located, out);
  }

  private remember(context: IniSection, located: Located, effective: string): string {
    if (located.owner === context) return located.entry.value.remember(effective);
    return context.rememberInherited(located.entry.key, effective);
  }

  private cycle(frames: readonly Frame[]): IniError {
    const origin = frames[0];
    const names = frames.map((f) => frameLabel(origin?.context, f));
    // The reference that closes the loop sits in the value before the repeated one.
    const site = frames[frames.length - 2] ?? frames[frames.length - 1];
    const closing = frames[frames.length - 1];
    const diagnostic = buildDiagnostic("ini/interpolation-cycle", {
      message: `Interpolation cycle: ${names.join(" → ")}.`,
      span: site?.entry.value.span ?? null,
      related: frames.slice(0, -1).map((f) => ({
        message: `'${frameLabel(origin?.context, f)}' is defined here`,
        span: f.entry.value.span,
      })),
      data: {
        section: closing?.context.name ?? "",
        key: closing?.entry.name ?? "",
        chain: names,
      },
    });
    debug.interpolate("cycle", { chain: names });
    return new IniError(diagnostic);
  }

  private fail<Code extends "ini/interpolation-depth-exceeded" | "ini/interpolation-syntax" | "ini/interpolation-missing-key">(
    code: Code,
    chain: readonly Frame[],
    frame: Frame,
    input: { message: string; data: IniDiagnosticDataFor<Code> },
  ): IniError {
    const origin = chain[0];
    const related: DiagnosticRelated[] = origin
      ? [{ message: `while resolving '${frameLabel(origin.context, origin)}'`, span: origin.entry.value.span }]
      : [];
    const span: SourceSpan = frame.entry.value.span;
    debug.interpolate("fail", { code, section: frame.context.name, key: frame.entry.name });
    return new IniError(buildDiagnostic(code, { message: input.message, span, related, data: input.data }));
  }
}

function label(chain: readonly Frame[], frame: Frame): string {
  return frameLabel(chain[0]?.context ?? frame.context, frame);
}

function frameLabel(origin: IniSection | undefined, frame: Frame): string {
  return origin === undefined || frame.context === origin
    ? frame.entry.name
    : `${frame.context.name}:${frame.entry.name}`;
}
