import { describe, expect, test } from "vitest";

import { isAnyUrlPattern, isHostnameAnchored, parsePatternDomain, patternToRegex } from "../src/pattern.js";

describe("patternToRegex", () => {
  test("converts hostname anchors and separators", () => {
    expect(patternToRegex("||example.com^")).toBe("^[htpsw]+:\\/\\/([a-z0-9-]+\\.)?example\\.com[/:&?]?");
  });

  test("converts start and end anchors", () => {
    expect(patternToRegex("|https://ads.")).toBe("^https:\\/\\/ads\\.");
    expect(patternToRegex("/banner/*.gif|")).toBe("\\/banner\\/.*\\.gif$");
  });

  test("escapes regex metacharacters", () => {
    expect(patternToRegex("ad(s)?x=1+2")).toBe("ad\\(s\\)\\?x=1\\+2");
  });
});

describe("parsePatternDomain", () => {
  test("extracts the anchored host and the rest of the pattern", () => {
    expect(parsePatternDomain("||example.org^")).toEqual({ domain: "example.org", path: "^" });
    expect(parsePatternDomain("||Example.ORG/path")).toEqual({ domain: "example.org", path: "/path" });
    expect(parsePatternDomain("|https://sub.example.org:8080/")).toEqual({
      domain: "sub.example.org",
      path: ":8080/"
    });
    expect(parsePatternDomain("||example.org")).toEqual({ domain: "example.org", path: "" });
  });

  test("returns null for patterns without a plain host", () => {
    expect(parsePatternDomain("/ads/")).toBeNull();
    expect(parsePatternDomain("||localhost^")).toBeNull();
    expect(parsePatternDomain("||*")).toBeNull();
  });
});

describe("pattern predicates", () => {
  test("detects patterns matching any url", () => {
    expect(["", "*", "||*", "|*"].every(isAnyUrlPattern)).toBe(true);
    expect(isAnyUrlPattern("||a")).toBe(false);
  });

  test("detects hostname anchors", () => {
    expect(isHostnameAnchored("||example.org")).toBe(true);
    expect(isHostnameAnchored("|example.org")).toBe(false);
  });
});
