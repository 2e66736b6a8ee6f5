import { debug, type IniDocument, type SourceSpan } from "@inispan/parser";
import { FALSE_LITERALS, TRUE_LITERALS, toBoolean, toFloat, toInteger, toList, type ListOptions } from "./coerce.js";

export type ValueKind = "boolean" | "integer" | "float" | "list" | "string";

/** A coerced value and where its text came from. */
export interface Typed<T> {
  readonly value: T;
  readonly span: SourceSpan;
}

/** An effective value did not match the literals of the requested kind. */
export class CoercionError extends Error {
  constructor(
    message: string,
    public readonly expected: ValueKind,
    public readonly text: string,
    public readonly section: string,
    public readonly key: string,
    public readonly span: SourceSpan,
  ) {
    super(message);
    this.name = "CoercionError";
  }
}

const EXPECTED: Record<Exclude<ValueKind, "list" | "string">, string> = {
  boolean: `one of ${[...TRUE_LITERALS, ...FALSE_LITERALS].join(", ")}`,
  integer: "an integer",
  float: "a number",
};

/**
 * Typed reads over a parsed document. Each accessor returns undefined when the
 * key is absent and throws `CoercionError` (with the value span) when the
 * effective text is not a valid literal. Interpolation failures surface as the
 * parser's `IniError`.
 */
export class TypedReader {
  constructor(public readonly document: IniDocument) {}

  string(section: string, key: string): Typed<string> | undefined {
    return this.read(section, key, (text) => text);
  }

  boolean(section: string, key: string): Typed<boolean> | undefined {
    return this.coerce(section, key, "boolean", toBoolean);
  }

  integer(section: string, key: string): Typed<number> | undefined {
    return this.coerce(section, key, "integer", toInteger);
  }

  float(section: string, key: string): Typed<number> | undefined {
    return this.coerce(section, key, "float", toFloat);
  }

  list(section: string, key: string, options?: ListOptions): Typed<string[]> | undefined {
    return this.read(section, key, (text) => toList(text, options));
  }

  /** Like `boolean`, with a fallback for absent keys. Invalid literals still throw. */
  booleanOr(section: string, key: string, fallback: boolean): boolean {
    return this.boolean(section, key)?.value ?? fallback;
  }

  integerOr(section: string, key: string, fallback: number): number {
    return this.integer(section, key)?.value ?? fallback;
  }

  floatOr(section: string, key: string, fallback: number): number {
    return this.float(section, key)?.value ?? fallback;
  }

  private coerce<T>(
    section: string,
    key: string,
    kind: Exclude<ValueKind, "list" | "string">,
    convert: (text: string) => T | null,
  ): Typed<T> | undefined {
    return this.read(section, key, (text, span) => {
      const value = convert(text);
      if (value === null) {
        debug.typed("coerce.fail", { section, key, kind });
        throw new CoercionError(
          `Value of '${key}' in section '${section}' is not ${EXPECTED[kind]}: '${text}'.`,
          kind,
          text,
          section,
          key,
          span,
        );
      }
      return value;
    });
  }

  private read<T>(section: string, key: string, convert: (text: string, span: SourceSpan) => T): Typed<T> | undefined {
    const text = this.document.get(section, key);
    const span = this.document.valueSpan(section, key);
    if (text === undefined || span === null) return undefined;
    return { value: convert(text, span), span };
  }
}
