import { describe, test, expect } from "vitest";
import { parseDoc } from "./_helpers/parse.js";

const SERVER = "[server]\nhost = example.test\nport = 8080\n\n[client]\nretries = 3\n";

describe("IniDocument lookups", () => {
  const { document } = parseDoc(SERVER);

  test("sections come back in file order", () => {
    expect(document.sections()).toEqual(["server", "client"]);
    expect(document.allSections().map((s) => s.isDefault)).toEqual([true, false, false]);
  });

  test("raw and effective values", () => {
    expect(document.getRaw("server", "port")).toBe("8080");
    expect(document.get("server", "host")).toBe("example.test");
    expect(document.get("server", "missing")).toBeUndefined();
    expect(document.get("nowhere", "host")).toBeUndefined();
    expect(document.tryGet("nowhere", "host")).toEqual({ ok: true, value: undefined });
  });

  test("has and hasSection", () => {
    expect(document.has("server", "HOST")).toBe(true);
    expect(document.has("client", "host")).toBe(false);
    expect(document.hasSection("client")).toBe(true);
    expect(document.hasSection("Client")).toBe(false);
  });
});

describe("spans", () => {
  const { document } = parseDoc(SERVER);

  test("key and value spans", () => {
    expect(document.keySpan("server", "port")).toEqual({
      start: 29,
      end: 33,
      startLine: 3,
      startColumn: 1,
      endLine: 3,
      endColumn: 5,
    });
    expect(document.valueSpan("server", "host")).toEqual({
      start: 16,
      end: 28,
      startLine: 2,
      startColumn: 8,
      endLine: 2,
      endColumn: 20,
    });
    expect(document.source.slice(16, 28)).toBe("example.test");
  });

  test("a section span runs from its header through its last entry", () => {
    expect(document.sectionSpan("server")).toMatchObject({ start: 0, end: 40, startLine: 1, endLine: 3 });
    expect(document.section("server")?.nameSpan).toMatchObject({ start: 1, end: 7, startColumn: 2, endColumn: 8 });
    expect(document.sectionSpan("nowhere")).toBeNull();
    expect(document.keySpan("server", "nothing")).toBeNull();
  });

  test("entryAt finds the entry under an offset", () => {
    const found = document.entryAt(30);
    expect(found?.section.name).toBe("server");
    expect(found?.entry.name).toBe("port");
    expect(document.entryAt(3)).toBeNull();
  });

  test("sectionAt finds the enclosing section", () => {
    expect(document.sectionAt(3)?.name).toBe("server");
    expect(document.sectionAt(45)?.name).toBe("client");
  });

  test("multi-line values span every contributing line", () => {
    const { document: doc } = parseDoc("[a]\nlist = one\n  two\n\n  three\n");
    expect(doc.get("a", "list")).toBe("one\ntwo\n\nthree");
    expect(doc.valueSpan("a", "list")).toMatchObject({ startLine: 2, endLine: 5 });
    expect(doc.entry("a", "list")?.span).toMatchObject({ start: 4, startLine: 2, endLine: 5 });
  });
});

describe("default section inheritance", () => {
  const source = "[DEFAULT]\nuser = root\nshell = sh\n[a]\nshell = zsh\nhome = /a\n";

  test("local keys shadow defaults", () => {
    const { document } = parseDoc(source);
    expect(document.get("a", "shell")).toBe("zsh");
    expect(document.get("a", "user")).toBe("root");
    expect(document.locate("a", "user")?.section).toBe(document.defaults);
    expect(document.locate("a", "shell")?.section.name).toBe("a");
  });

  test("keys lists local keys unless inherited ones are asked for", () => {
    const { document } = parseDoc(source);
    expect(document.keys("a")).toEqual(["shell", "home"]);
    expect(document.keys("a", { inherited: true })).toEqual(["shell", "home", "user"]);
    expect(document.keys("DEFAULT")).toEqual(["user", "shell"]);
    expect(document.keys("nowhere")).toEqual([]);
  });
});

describe("effective value cache", () => {
  test("local values cache on the value itself", () => {
    const { document } = parseDoc("[a]\nx = 1\ny = %(x)s2\n");
    const y = document.entry("a", "y");
    expect(y?.value.cached).toBeUndefined();
    expect(document.get("a", "y")).toBe("12");
    expect(y?.value.cached).toBe("12");
    expect(document.entry("a", "x")?.value.cached).toBe("1");
  });

  test("inherited values cache per section", () => {
    const { document } = parseDoc("[DEFAULT]\nbase = b\n[a]\nk = v\n");
    expect(document.get("a", "base")).toBe("b");
    expect(document.section("a")?.inheritedValue("base")).toBe("b");
    expect(document.defaults.entry("base")?.value.cached).toBeUndefined();
  });

  test("remember keeps the first result", () => {
    const { document } = parseDoc("[a]\nk = v\n");
    const value = document.entry("a", "k")?.value;
    expect(value?.remember("first")).toBe("first");
    expect(value?.remember("second")).toBe("first");
  });
});

describe("getLocalized", () => {
  const source = [
    "[Desktop Entry]",
    "Name=Files",
    "Name[de]=Dateien",
    "Name[sr_RS@latin]=Fajlovi",
    "",
  ].join("\n");

  test.each([
    ["de", "Dateien"],
    ["de_DE.UTF-8", "Dateien"],
    ["sr_RS@latin", "Fajlovi"],
    ["sr_RS", "Files"],
    ["fr", "Files"],
  ])("%s resolves to %s", (tag, expected) => {
    const { document } = parseDoc(source, { preset: "desktop-entry" });
    expect(document.getLocalized("Desktop Entry", "Name", tag)).toBe(expected);
  });

  test("localized keys are ordinary case-sensitive keys", () => {
    const { document } = parseDoc(source, { preset: "desktop-entry" });
    expect(document.keys("Desktop Entry")).toEqual(["Name", "Name[de]", "Name[sr_RS@latin]"]);
    expect(document.get("Desktop Entry", "name")).toBeUndefined();
  });
});
