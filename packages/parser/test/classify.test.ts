import { describe, test, expect } from "vitest";
import { DEFAULT_DIALECT, resolveDialect } from "../src/dialect/options.js";
import { EntryKind, type PhysicalLine, type RawEntry } from "../src/model/entries.js";
import { classify, INITIAL_CONTEXT, type ClassifyContext } from "../src/parsing/classify.js";

const line = (text: string, n = 1, start = 0): PhysicalLine => ({ text, line: n, start });

const IN_VALUE: ClassifyContext = { openValueIndent: 0, continuationIndent: null, pendingBackslash: false };

function kv(entry: RawEntry) {
  if (entry.kind !== EntryKind.KeyValue) throw new Error(`expected KeyValue, got ${entry.kind}`);
  return entry;
}

function cont(entry: RawEntry) {
  if (entry.kind !== EntryKind.Continuation) throw new Error(`expected Continuation, got ${entry.kind}`);
  return entry;
}

describe("blank and comment lines", () => {
  test("whitespace-only lines are blank outside a value", () => {
    expect(classify(line("   "), DEFAULT_DIALECT, INITIAL_CONTEXT).kind).toBe(EntryKind.Blank);
    expect(classify(line(""), DEFAULT_DIALECT, INITIAL_CONTEXT).kind).toBe(EntryKind.Blank);
  });

  test("blank lines inside an open value carry an empty string", () => {
    expect(cont(classify(line(""), DEFAULT_DIALECT, IN_VALUE)).value).toBe("");
  });

  test("blank lines end the value when empty lines are not allowed", () => {
    const dialect = resolveDialect({ allowEmptyLinesInValues: false });
    expect(classify(line(""), dialect, IN_VALUE).kind).toBe(EntryKind.Blank);
  });

  test("full-line comments record prefix and body", () => {
    const entry = classify(line("; hello there"), DEFAULT_DIALECT, INITIAL_CONTEXT);
    expect(entry).toMatchObject({ kind: EntryKind.Comment, prefix: ";", comment: "hello there" });
  });

  test("indented comments inside a value are value text by default", () => {
    expect(cont(classify(line("  # not a comment"), DEFAULT_DIALECT, IN_VALUE)).value).toBe("# not a comment");
  });

  test("indented comments can be dropped instead", () => {
    const dialect = resolveDialect({ indentedComments: "comment" });
    expect(classify(line("  # note"), dialect, IN_VALUE).kind).toBe(EntryKind.Comment);
  });
});

describe("section headers", () => {
  test("name is the text between the first [ and the last ]", () => {
    const entry = classify(line("[section one]"), DEFAULT_DIALECT, INITIAL_CONTEXT);
    expect(entry).toMatchObject({ kind: EntryKind.Section, name: "section one" });
    if (entry.kind !== EntryKind.Section) return;
    expect(entry.nameSpan).toMatchObject({ start: 1, end: 12 });
  });

  test("text after the closing bracket is ignored", () => {
    expect(classify(line("  [a] trailing"), DEFAULT_DIALECT, INITIAL_CONTEXT)).toMatchObject({
      kind: EntryKind.Section,
      name: "a",
    });
  });

  test("brackets inside the name are kept when allowed", () => {
    expect(classify(line("[a]b]"), DEFAULT_DIALECT, INITIAL_CONTEXT)).toMatchObject({
      kind: EntryKind.Section,
      name: "a]b",
    });
  });

  test("brackets inside the name are malformed when disallowed", () => {
    const dialect = resolveDialect({ allowBracketsInSectionNames: false });
    expect(classify(line("[a]b]"), dialect, INITIAL_CONTEXT)).toMatchObject({
      kind: EntryKind.Malformed,
      reason: "bracket-in-section-name",
      fatal: false,
    });
  });

  test("an empty name is a recoverable malformed line", () => {
    expect(classify(line("[]"), DEFAULT_DIALECT, INITIAL_CONTEXT)).toMatchObject({
      kind: EntryKind.Malformed,
      reason: "empty-section-name",
      fatal: false,
    });
  });

  test("a header without ] is fatal", () => {
    expect(classify(line("[oops"), DEFAULT_DIALECT, INITIAL_CONTEXT)).toMatchObject({
      kind: EntryKind.Malformed,
      reason: "unterminated-section",
      fatal: true,
    });
  });

  test("an indented unclosed bracket continues an open value", () => {
    expect(cont(classify(line("  [oops"), DEFAULT_DIALECT, IN_VALUE)).value).toBe("[oops");
  });
});

describe("key/value pairs", () => {
  test("key and value are trimmed, with spans for each", () => {
    const entry = kv(classify(line("key = value", 2, 4), DEFAULT_DIALECT, INITIAL_CONTEXT));
    expect(entry.key).toBe("key");
    expect(entry.value).toBe("value");
    expect(entry.delimiter).toBe("=");
    expect(entry.keySpan).toEqual({ start: 4, end: 7, startLine: 2, startColumn: 1, endLine: 2, endColumn: 4 });
    expect(entry.valueSpan).toEqual({ start: 10, end: 15, startLine: 2, startColumn: 7, endLine: 2, endColumn: 12 });
  });

  test("the earliest delimiter on the line wins", () => {
    expect(kv(classify(line("a: b = c"), DEFAULT_DIALECT, INITIAL_CONTEXT))).toMatchObject({ key: "a", value: "b = c" });
    expect(kv(classify(line("a=b:c"), DEFAULT_DIALECT, INITIAL_CONTEXT))).toMatchObject({ key: "a", value: "b:c" });
  });

  test("ties go to the earlier configured delimiter", () => {
    const dialect = resolveDialect({ keyValueDelimiters: ["==", "="] });
    expect(kv(classify(line("a == b"), dialect, INITIAL_CONTEXT))).toMatchObject({ key: "a", delimiter: "==", value: "b" });
  });

  test("an empty value keeps a zero-width span at the value position", () => {
    const entry = kv(classify(line("exclude ="), DEFAULT_DIALECT, INITIAL_CONTEXT));
    expect(entry.value).toBe("");
    expect(entry.valueSpan).toMatchObject({ start: 9, end: 9 });
  });

  test("an empty key is malformed", () => {
    expect(classify(line(" = value"), DEFAULT_DIALECT, INITIAL_CONTEXT)).toMatchObject({
      kind: EntryKind.Malformed,
      reason: "empty-key",
    });
  });

  test("a line without delimiter is malformed", () => {
    expect(classify(line("novalue"), DEFAULT_DIALECT, INITIAL_CONTEXT)).toMatchObject({
      kind: EntryKind.Malformed,
      reason: "missing-delimiter",
      fatal: false,
    });
  });

  test("locale-suffixed keys are plain keys", () => {
    expect(kv(classify(line("Name[de]=Dateien"), DEFAULT_DIALECT, INITIAL_CONTEXT)).key).toBe("Name[de]");
  });
});

describe("inline comments", () => {
  const dialect = resolveDialect({ inlineCommentPrefixes: ["//", ";"] });

  test("a prefix preceded by whitespace ends the value", () => {
    expect(kv(classify(line("foo = bar // comment"), dialect, INITIAL_CONTEXT)).value).toBe("bar");
    expect(kv(classify(line("foo = bar ; comment"), dialect, INITIAL_CONTEXT)).value).toBe("bar");
  });

  test("a prefix glued to other text is value text", () => {
    expect(kv(classify(line("url = http://x"), dialect, INITIAL_CONTEXT)).value).toBe("http://x");
    expect(kv(classify(line("list = a;b"), dialect, INITIAL_CONTEXT)).value).toBe("a;b");
  });

  test("the dialect default has no inline comments", () => {
    expect(kv(classify(line("foo = bar ; still value"), DEFAULT_DIALECT, INITIAL_CONTEXT)).value).toBe(
      "bar ; still value",
    );
  });
});

describe("continuation lines", () => {
  test("an indented line without delimiter continues the value", () => {
    const entry = cont(classify(line("  baz"), DEFAULT_DIALECT, IN_VALUE));
    expect(entry.value).toBe("baz");
    expect(entry.indent).toBe(2);
  });

  test("an indented line with a delimiter is a new key", () => {
    expect(kv(classify(line("  a = b"), DEFAULT_DIALECT, IN_VALUE)).key).toBe("a");
  });

  test("delimiters may be allowed in continuations", () => {
    const dialect = resolveDialect({ continuationMayContainDelimiters: true });
    expect(cont(classify(line("  a = b"), dialect, IN_VALUE)).value).toBe("a = b");
  });

  test("only the first level of indentation is stripped", () => {
    const context: ClassifyContext = { ...IN_VALUE, continuationIndent: 2 };
    expect(cont(classify(line("    deeper"), DEFAULT_DIALECT, context)).value).toBe("  deeper");
  });

  test("same-indent lines do not continue", () => {
    const context: ClassifyContext = { ...IN_VALUE, openValueIndent: 2 };
    expect(classify(line("  word"), DEFAULT_DIALECT, context).kind).toBe(EntryKind.Malformed);
  });
});

describe("backslash continuation", () => {
  const dialect = resolveDialect({ preset: "systemd" });

  test("a trailing backslash is removed and marks the value as continuing", () => {
    const entry = kv(classify(line("ExecStart=/bin/foo \\"), dialect, INITIAL_CONTEXT));
    expect(entry.value).toBe("/bin/foo");
    expect(entry.continues).toBe(true);
  });

  test("an escaped backslash does not continue", () => {
    const entry = kv(classify(line("Path=C:\\\\"), dialect, INITIAL_CONTEXT));
    expect(entry.value).toBe("C:\\\\");
    expect(entry.continues).toBe(false);
  });

  test("the line after a marker is a continuation regardless of indentation", () => {
    const context: ClassifyContext = { openValueIndent: null, continuationIndent: null, pendingBackslash: true };
    const entry = cont(classify(line("   --flag=1"), dialect, context));
    expect(entry.value).toBe("--flag=1");
    expect(entry.continues).toBe(false);
  });
});
