import { describe, test, expect } from "vitest";
import { DialectError } from "../src/dialect/options.js";
import { IniError } from "../src/diagnostics/build.js";
import { parse, parseOrThrow } from "../src/parse.js";
import { parseDoc, parseFailure } from "./_helpers/parse.js";

describe("parse", () => {
  test("sections come back in file order", () => {
    const names = ["zeta", "alpha", "Mid Section", "x.y"];
    const source = names.map((name, i) => `[${name}]\nk${i} = ${i}\n`).join("\n");
    const { document, diagnostics } = parseDoc(source);
    expect(diagnostics).toEqual([]);
    expect(document.sections()).toEqual(names);
  });

  test.each(["plain", "bar\nbaz", "one\n\nthree", "%(x)s literal", ""])(
    "raw value %j survives a re-parse as a single-key document",
    (raw) => {
      const source = `[s]\nk = ${raw.split("\n").join("\n  ")}\n`;
      const { document } = parseDoc(source);
      expect(document.getRaw("s", "k")).toBe(raw);
    },
  );

  test("resolving twice yields the same string", () => {
    const { document } = parseDoc("[a]\nbase = /x\npath = %(base)s/y\n");
    const first = document.get("a", "path");
    expect(first).toBe("/x/y");
    expect(document.get("a", "path")).toBe(first);
  });

  test("continuation lines join with newlines", () => {
    const { document } = parseDoc("[a]\nfoo = bar\n  baz");
    expect(document.getRaw("a", "foo")).toBe("bar\nbaz");
  });

  test("locale-suffixed keys", () => {
    const { document } = parseDoc("[s]\nfoo[en]=English\nfoo=Default\n");
    expect(document.getLocalized("s", "foo", "en")).toBe("English");
    expect(document.getLocalized("s", "foo", "fr")).toBe("Default");
  });

  test("inline comments and their leading whitespace are dropped", () => {
    const { document } = parseDoc("[s]\nfoo= bar // note\n", {
      keyValueDelimiters: ["="],
      inlineCommentPrefixes: ["//"],
    });
    expect(document.getRaw("s", "foo")).toBe("bar");
  });

  test("CRLF input", () => {
    const { document } = parseDoc("[a]\r\nk = v\r\n  w\r\n");
    expect(document.getRaw("a", "k")).toBe("v\nw");
    expect(document.keySpan("a", "k")).toMatchObject({ start: 5, end: 6, startLine: 2 });
  });

  test("lenient mode returns the document with every recorded condition", () => {
    const result = parse("[a]\nx=1\nx=2\n[a]\n");
    expect(result.ok).toBe(true);
    expect(result.diagnostics.map((d) => d.kind)).toEqual(["DuplicateKey", "DuplicateSection"]);
  });

  test("strict mode returns only the first fatal condition", () => {
    const diagnostics = parseFailure("[a]\nx=1\nx=2\n[a]\n", { strict: true });
    expect(diagnostics.map((d) => d.kind)).toEqual(["DuplicateKey"]);
  });

  test("invalid options throw before parsing", () => {
    expect(() => parse("[a]\n", { maxInterpolationDepth: 0 })).toThrow(DialectError);
  });

  test("empty input is an empty document", () => {
    const { document, diagnostics } = parseDoc("");
    expect(document.sections()).toEqual([]);
    expect(document.defaults.size).toBe(0);
    expect(diagnostics).toEqual([]);
  });
});

describe("parseOrThrow", () => {
  test("returns the document", () => {
    expect(parseOrThrow("[a]\nk = v\n").get("a", "k")).toBe("v");
  });

  test("throws the fatal diagnostic", () => {
    try {
      parseOrThrow("[a]\nfoo=1\nfoo=2\n", { preset: "configparser" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IniError);
      if (error instanceof IniError) {
        expect(error.diagnostic).toMatchObject({ kind: "DuplicateKey", severity: "error" });
        expect(error.diagnostics).toHaveLength(1);
      }
    }
  });

  test("error message names the location", () => {
    expect(() => parseOrThrow("[a]\nfoo=1\nfoo=2\n", { strict: true })).toThrow(
      "Duplicate key 'foo' in section 'a'. (line 3, column 1)",
    );
  });
});
