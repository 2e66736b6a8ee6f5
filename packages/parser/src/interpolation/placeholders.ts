/**
 * Placeholder syntax for the two interpolation modes.
 *
 * - basic:    `%(name)s` references, `%%` is a literal percent sign
 * - extended: `${name}` and `${section:name}` references, `$$` is a literal dollar sign
 */

export type TemplatePart =
  | { readonly kind: "text"; readonly text: string }
  | {
      readonly kind: "reference";
      /** Explicit section (extended `${section:name}` only). */
      readonly section: string | null;
      readonly key: string;
      /** The placeholder as written, e.g. `%(home)s`. */
      readonly source: string;
      /** Offset of the placeholder within the raw value. */
      readonly index: number;
    };

export type TemplateParse =
  | { readonly ok: true; readonly parts: readonly TemplatePart[] }
  | { readonly ok: false; readonly index: number; readonly message: string };

const BASIC_REFERENCE = /%\(([^)]+)\)s/y;
const EXTENDED_REFERENCE = /\$\{([^}]+)\}/y;

export function parseTemplate(raw: string, mode: "basic" | "extended"): TemplateParse {
  return mode === "basic" ? parseBasic(raw) : parseExtended(raw);
}

/** True when the raw value has no placeholder marker at all. */
export function isPlainValue(raw: string, mode: "basic" | "extended"): boolean {
  return !raw.includes(mode === "basic" ? "%" : "$");
}

function parseBasic(raw: string): TemplateParse {
  const parts: TemplatePart[] = [];
  let text = "";
  let i = 0;

  while (i < raw.length) {
    const marker = raw.indexOf("%", i);
    if (marker === -1) {
      text += raw.slice(i);
      break;
    }
    text += raw.slice(i, marker);
    const next = raw[marker + 1];

    if (next === "%") {
      text += "%";
      i = marker + 2;
      continue;
    }
    if (next === "(") {
      BASIC_REFERENCE.lastIndex = marker;
      const match = BASIC_REFERENCE.exec(raw);
      if (!match) {
        return { ok: false, index: marker, message: `Bad interpolation variable reference '${raw.slice(marker)}'` };
      }
      if (text) parts.push({ kind: "text", text });
      text = "";
      parts.push({ kind: "reference", section: null, key: match[1] ?? "", source: match[0], index: marker });
      i = marker + match[0].length;
      continue;
    }
    return {
      ok: false,
      index: marker,
      message: `'%' must be followed by '%' or '(', found '${raw.slice(marker)}'`,
    };
  }

  if (text) parts.push({ kind: "text", text });
  return { ok: true, parts };
}

function parseExtended(raw: string): TemplateParse {
  const parts: TemplatePart[] = [];
  let text = "";
  let i = 0;

  while (i < raw.length) {
    const marker = raw.indexOf("$", i);
    if (marker === -1) {
      text += raw.slice(i);
      break;
    }
    text += raw.slice(i, marker);
    const next = raw[marker + 1];

    if (next === "$") {
      text += "$";
      i = marker + 2;
      continue;
    }
    if (next === "{") {
      EXTENDED_REFERENCE.lastIndex = marker;
      const match = EXTENDED_REFERENCE.exec(raw);
      if (!match) {
        return { ok: false, index: marker, message: `Bad interpolation variable reference '${raw.slice(marker)}'` };
      }
      const path = (match[1] ?? "").split(":");
      if (path.length > 2) {
        return { ok: false, index: marker, message: `More than one ':' found in '${match[0]}'` };
      }
      const [first = "", second] = path;
      if (text) parts.push({ kind: "text", text });
      text = "";
      parts.push({
        kind: "reference",
        section: second === undefined ? null : first,
        key: second ?? first,
        source: match[0],
        index: marker,
      });
      i = marker + match[0].length;
      continue;
    }
    return {
      ok: false,
      index: marker,
      message: `'$' must be followed by '$' or '{', found '${raw.slice(marker)}'`,
    };
  }

  if (text) parts.push({ kind: "text", text });
  return { ok: true, parts };
}
