/**
 * Tests for command-parser.ts
 */

import { describe, test, expect } from "vitest";
import {
  tokenize,
  parsePositional,
  parseQuoteId,
  parseCount,
  parseTerm,
  parseTagName,
  parsePreference,
  formatParseError,
  FAV_USAGE,
  SEARCH_USAGE,
  SUBSCRIBE_USAGE,
  TAG_USAGE,
} from "../command-parser.ts";

describe("tokenize", () => {
  test("splits simple space-separated tokens", () => {
    expect(tokenize("a b c")).toEqual(["a", "b", "c"]);
  });

  test("handles double and single quotes", () => {
    expect(tokenize('"deep work" habits')).toEqual(["deep work", "habits"]);
    expect(tokenize("'deep work'")).toEqual(["deep work"]);
  });

  test("handles escaped quotes inside strings", () => {
    expect(tokenize('"say \\"hello\\""')).toEqual(['say "hello"']);
  });

  test("handles multiple spaces and empty input", () => {
    expect(tokenize("a   b    c")).toEqual(["a", "b", "c"]);
    expect(tokenize("")).toEqual([]);
    expect(tokenize("   ")).toEqual([]);
  });
});

describe("parsePositional", () => {
  test("returns the token and the rest", () => {
    expect(parsePositional(["a", "b", "c"], 1)).toEqual({ value: "b", remaining: ["a", "c"] });
  });

  test("returns null out of range", () => {
    expect(parsePositional(["a"], 1)).toBeNull();
    expect(parsePositional([], 0)).toBeNull();
  });
});

describe("parseQuoteId", () => {
  test("accepts plain and #-prefixed ids", () => {
    expect(parseQuoteId("12", FAV_USAGE)).toEqual({ success: true, data: 12, remaining: "" });
    expect(parseQuoteId("#7 extra", FAV_USAGE)).toEqual({ success: true, data: 7, remaining: "extra" });
  });

  test("rejects missing ids with usage", () => {
    expect(parseQuoteId("", FAV_USAGE)).toEqual({
      success: false,
      error: "Missing quote ID",
      usage: FAV_USAGE,
    });
  });

  test("rejects non-numeric and zero ids", () => {
    for (const input of ["abc", "0", "-3", "1.5"]) {
      const result = parseQuoteId(input, FAV_USAGE);
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error).toBe("Invalid quote ID. Use a number.");
    }
  });
});

describe("parseCount", () => {
  const options = { defaultValue: 5, max: 10 };

  test("uses the default when absent or not a number", () => {
    expect(parseCount("", options).data).toBe(5);
    expect(parseCount("lots", options).data).toBe(5);
  });

  test("clamps to 1..max", () => {
    expect(parseCount("3", options).data).toBe(3);
    expect(parseCount("50", options).data).toBe(10);
    expect(parseCount("0", options).data).toBe(1);
    expect(parseCount("-4", options).data).toBe(1);
  });
});

describe("parseTerm", () => {
  test("collapses whitespace", () => {
    expect(parseTerm("  deep   work ", SEARCH_USAGE)).toEqual({ success: true, data: "deep work", remaining: "" });
  });

  test("rejects blank input", () => {
    expect(parseTerm("  ", SEARCH_USAGE)).toEqual({ success: false, error: "Missing argument", usage: SEARCH_USAGE });
  });
});

describe("parseTagName", () => {
  test("strips a leading #", () => {
    expect(parseTagName("#wisdom")).toEqual({ success: true, data: "wisdom", remaining: "" });
    expect(parseTagName("life more")).toEqual({ success: true, data: "life", remaining: "more" });
  });

  test("rejects a bare #", () => {
    expect(parseTagName("#")).toEqual({ success: false, error: "Missing tag", usage: TAG_USAGE });
  });
});

describe("parsePreference", () => {
  test("maps names and aliases", () => {
    expect(parsePreference("digest", SUBSCRIBE_USAGE)).toMatchObject({ success: true, data: "digest" });
    expect(parsePreference("Daily", SUBSCRIBE_USAGE)).toMatchObject({ success: true, data: "daily_quote" });
  });

  test("rejects unknown names", () => {
    expect(parsePreference("constructor", SUBSCRIBE_USAGE)).toEqual({
      success: false,
      error: 'Unknown subscription "constructor"',
      usage: SUBSCRIBE_USAGE,
    });
  });
});

describe("formatParseError", () => {
  test("appends the usage line", () => {
    expect(formatParseError({ success: false, error: "Missing tag", usage: TAG_USAGE })).toBe(
      "Missing tag\nUsage: /tag <tagname>"
    );
    expect(formatParseError({ success: false, error: "Oops" })).toBe("Oops");
  });
});
