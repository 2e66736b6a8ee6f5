/**
 * Literal recognition for typed reads. Every function returns null for text it
 * does not recognize; callers decide whether that is an error.
 */

export const TRUE_LITERALS = ["1", "yes", "true", "on"] as const;
export const FALSE_LITERALS = ["0", "no", "false", "off"] as const;

const TRUE_SET: ReadonlySet<string> = new Set(TRUE_LITERALS);
const FALSE_SET: ReadonlySet<string> = new Set(FALSE_LITERALS);

const INTEGER = /^[+-]?\d+$/;
const HEX_INTEGER = /^[+-]?0x[0-9a-f]+$/i;
const FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i;

/** `1/yes/true/on` and `0/no/false/off`, case-insensitive, surrounding whitespace ignored. */
export function toBoolean(text: string): boolean | null {
  const normalized = text.trim().toLowerCase();
  if (TRUE_SET.has(normalized)) return true;
  if (FALSE_SET.has(normalized)) return false;
  return null;
}

/** Decimal or `0x` hexadecimal integers within the safe integer range. */
export function toInteger(text: string): number | null {
  const trimmed = text.trim();
  let value: number;
  if (INTEGER.test(trimmed)) {
    value = Number(trimmed);
  } else if (HEX_INTEGER.test(trimmed)) {
    const negative = trimmed.startsWith("-");
    const digits = trimmed.replace(/^[+-]?0x/i, "");
    value = Number.parseInt(digits, 16) * (negative ? -1 : 1);
  } else {
    return null;
  }
  return Number.isSafeInteger(value) ? value : null;
}

/** Decimal and exponent notation plus `inf`, `infinity` and `nan` (any case, optional sign). */
export function toFloat(text: string): number | null {
  const trimmed = text.trim();
  if (FLOAT.test(trimmed)) return Number(trimmed);
  const special = SPECIAL_FLOAT.exec(trimmed);
  if (!special) return null;
  const [, sign = "", word = ""] = special;
  if (word.toLowerCase() === "nan") return Number.NaN;
  return sign === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}

export interface ListOptions {
  /**
   * Item separator. Default: newlines for multi-line values, otherwise commas.
   */
  separator?: string | RegExp;
}

/** Split a value into trimmed, non-empty items. */
export function toList(text: string, options: ListOptions = {}): string[] {
  const separator = options.separator ?? (text.includes("\n") ? "\n" : ",");
  return text
    .split(separator)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
