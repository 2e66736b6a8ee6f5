import { describe, it, expect } from "vitest";
import { findSimilar, formatSuggestion, levenshteinDistance } from "../../src/shared/suggestions.js";

describe("levenshteinDistance", () => {
  it("returns 0 for identical strings", () => {
    expect(levenshteinDistance("", "")).toBe(0);
    expect(levenshteinDistance("port", "port")).toBe(0);
  });

  it("returns the other length for empty comparisons", () => {
    expect(levenshteinDistance("", "host")).toBe(4);
    expect(levenshteinDistance("host", "")).toBe(4);
  });

  it("counts single edits", () => {
    expect(levenshteinDistance("prt", "port")).toBe(1);
    expect(levenshteinDistance("portt", "port")).toBe(1);
    expect(levenshteinDistance("part", "port")).toBe(1);
  });

  it("counts a transposition as two edits", () => {
    expect(levenshteinDistance("prot", "port")).toBe(2);
  });

  it("is symmetric", () => {
    expect(levenshteinDistance("kitten", "sitting")).toBe(3);
    expect(levenshteinDistance("sitting", "kitten")).toBe(3);
  });
});

describe("findSimilar", () => {
  it("finds close keys", () => {
    expect(findSimilar("prot", ["port", "host", "user"])).toEqual(["port"]);
  });

  it("orders ties alphabetically and applies the limit", () => {
    expect(findSimilar("ab", ["ac", "aa", "abc"])).toEqual(["aa", "abc", "ac"]);
    expect(findSimilar("ab", ["ac", "aa", "abc"], { limit: 2 })).toEqual(["aa", "abc"]);
  });

  it("ignores case unless asked not to", () => {
    expect(findSimilar("PORT", ["port"])).toEqual(["port"]);
    expect(findSimilar("PORT", ["port"], { caseSensitive: true })).toEqual([]);
  });

  it("lists each candidate once", () => {
    expect(findSimilar("dir", ["dir", "dir"])).toEqual(["dir"]);
  });

  it("respects maxDistance", () => {
    expect(findSimilar("prot", ["port"], { maxDistance: 1 })).toEqual([]);
  });
});

describe("formatSuggestion", () => {
  it("formats zero, one and several suggestions", () => {
    expect(formatSuggestion([])).toBe("");
    expect(formatSuggestion(["port"])).toBe(" Did you mean 'port'?");
    expect(formatSuggestion(["aa", "ab"])).toBe(" Did you mean one of: 'aa', 'ab'?");
  });
});
