import type { DialectOverrides } from "./options.js";

/**
 * Named starting points for well-known INI flavours. Each preset lists only
 * the options that differ from DEFAULT_DIALECT.
 */
export const DIALECT_PRESETS = {
  /** Strict configparser behaviour with `%(name)s` interpolation. */
  configparser: {
    strict: true,
    interpolation: "basic",
  },

  /** configparser with `${section:name}` interpolation. */
  "configparser-extended": {
    strict: true,
    interpolation: "extended",
  },

  /** Lenient, uninterpreted values; indented lines always continue. */
  raw: {
    strict: false,
    interpolation: "none",
    continuationMayContainDelimiters: true,
  },

  /** freedesktop.org desktop entries: `Name[de]=...`, `#` comments, no continuation. */
  "desktop-entry": {
    strict: true,
    keyValueDelimiters: ["="],
    commentPrefixes: ["#"],
    allowContinuation: false,
    allowEmptyLinesInValues: false,
    caseFoldKeys: false,
    caseFoldSections: false,
    keysBeforeSection: "error",
    defaultSection: null,
    interpolation: "none",
  },

  /** systemd unit files: backslash continuation; lenient, so a repeated key warns and the last value wins. */
  systemd: {
    strict: false,
    keyValueDelimiters: ["="],
    commentPrefixes: ["#", ";"],
    allowContinuation: false,
    allowEmptyLinesInValues: false,
    backslashContinuation: true,
    caseFoldKeys: false,
    caseFoldSections: false,
    keysBeforeSection: "error",
    defaultSection: null,
    interpolation: "none",
  },
} as const satisfies Record<string, DialectOverrides>;

export type DialectPresetName = keyof typeof DIALECT_PRESETS;

export function isDialectPreset(name: string): name is DialectPresetName {
  return Object.hasOwn(DIALECT_PRESETS, name);
}
