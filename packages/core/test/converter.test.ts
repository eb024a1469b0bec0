import { describe, expect, test } from "vitest";

import { convertRuleList, convertRules, createEmptyResult, EMPTY_RESULT_JSON } from "../src/converter.js";
import { ConversionError } from "../src/errors.js";
import { createNetworkRule } from "../src/rules.js";
import type { WireEntry } from "../src/types.js";

function parseEntries(json: string | undefined): WireEntry[] {
  const entries: WireEntry[] = JSON.parse(json ?? "[]");
  return entries;
}

describe("convertRules", () => {
  test("orders blocking, allowlist and document allowlist entries", () => {
    const result = convertRules([
      "@@||trusted.org^$document",
      "@@||example.org/allowed^",
      "||example.org^",
      "example.com##.banner"
    ]);

    const entries = parseEntries(result.converted);
    expect(entries.map((entry) => entry.action.type)).toEqual([
      "block",
      "css-display-none",
      "ignore-previous-rules",
      "ignore-previous-rules"
    ]);
    expect(entries[0]?.trigger).toEqual({
      "url-filter": "^[htpsw]+:\\/\\/([a-z0-9-]+\\.)?example\\.org[/:&?]?"
    });
    expect(entries[3]?.trigger).toEqual({ "url-filter": ".*", "if-domain": ["trusted.org"] });
    expect(result.convertedCount).toBe(4);
    expect(result.totalConvertedCount).toBe(4);
    expect(result.errorsCount).toBe(0);
    expect(result.overLimit).toBe(false);
    expect(result).not.toHaveProperty("advancedBlocking");
  });

  test("returns the placeholder entry for empty input", () => {
    const result = convertRules(["! nothing here", ""]);

    expect(result.converted).toBe(EMPTY_RESULT_JSON);
    expect(result.convertedCount).toBe(0);
    expect(EMPTY_RESULT_JSON).toBe(
      '[{"trigger":{"url-filter":".*","if-domain":["domain.com"]},"action":{"type":"ignore-previous-rules"}}]'
    );
    expect(createEmptyResult().converted).toBe(EMPTY_RESULT_JSON);
  });

  test("caps the output at the entry limit", () => {
    const result = convertRules(["||a.com^", "||b.com^", "||c.com^"], { limit: 2 });

    expect(parseEntries(result.converted)).toHaveLength(2);
    expect(result.convertedCount).toBe(2);
    expect(result.totalConvertedCount).toBe(3);
    expect(result.overLimit).toBe(true);
  });

  test("drops document allowlist entries first when over the limit", () => {
    const result = convertRules(["@@||c.example^$document", "@@||b.example^", "||a.example^"], { limit: 2 });

    const entries = parseEntries(result.converted);
    expect(entries.map((entry) => entry.action.type)).toEqual(["block", "ignore-previous-rules"]);
    expect(entries.some((entry) => entry.trigger["if-domain"]?.includes("c.example"))).toBe(false);
    expect(result.overLimit).toBe(true);
  });

  test("rejects an invalid limit", () => {
    expect(() => convertRules([], { limit: -1 })).toThrow(ConversionError);
    expect(() => convertRules([], { limit: 1.5 })).toThrow("invalid entry limit: 1.5");
  });

  test("routes advanced rules to a separate output", () => {
    const lines = ["example.com#%#window.x = 1;", "example.com#?#.ad:has(> img)", "||ads.example^"];

    const enabled = convertRules(lines, { advancedBlocking: true });
    expect(enabled.convertedCount).toBe(1);
    expect(enabled.advancedBlockingConvertedCount).toBe(2);
    expect(parseEntries(enabled.advancedBlocking)).toEqual([
      {
        trigger: { "url-filter": ".*", "if-domain": ["example.com"] },
        action: { type: "script", script: "window.x = 1;" }
      },
      {
        trigger: { "url-filter": ".*", "if-domain": ["example.com"] },
        action: { type: "css", css: ".ad:has(> img)" }
      }
    ]);

    const disabled = convertRules(lines);
    expect(disabled.convertedCount).toBe(1);
    expect(disabled.advancedBlockingConvertedCount).toBe(0);
    expect(disabled.errorsCount).toBe(2);
    expect(disabled.report.stats.rejections["advanced-blocking-disabled"]).toBe(2);
  });

  test("reports rejected rules and parse issues", () => {
    const result = convertRules(["||example.org^$object", "/(ads|track)/", "||example.org^$popup"]);

    expect(result.errorsCount).toBe(3);
    expect(result.report.rejected.map((item) => [item.ruleText, item.reason])).toEqual([
      ["||example.org^$object", "unsupported-content-type"],
      ["/(ads|track)/", "unsupported-regex"]
    ]);
    expect(result.report.issues).toEqual([
      { line: 3, ruleText: "||example.org^$popup", message: 'unsupported modifier: "popup"' }
    ]);
    expect(result.converted).toBe(EMPTY_RESULT_JSON);
  });

  test("rejects regex rules that rewrite the response body", () => {
    const result = convertRules(["/ads/$replace=/x/y/"]);

    expect(result.converted).toBe(EMPTY_RESULT_JSON);
    expect(result.report.issues).toEqual([]);
    expect(result.report.rejected).toEqual([
      {
        ruleText: "/ads/$replace=/x/y/",
        reason: "replace-rule",
        message: "Rules rewriting the response body ($replace) cannot be converted."
      }
    ]);
  });

  test("blocks frames and documents of a host", () => {
    const result = convertRules(["||ads.example^$subdocument", "||ads.example^$document"]);

    expect(result.errorsCount).toBe(0);
    expect(parseEntries(result.converted).map((entry) => entry.trigger["resource-type"])).toEqual([
      ["document"],
      ["document"]
    ]);
  });

  test("throws on the first failure in error mode", () => {
    expect(() => convertRules(["||a.com^", "/(a|b)/"], { onRejected: "error" })).toThrow(
      'cannot convert rule "/(a|b)/": Alternation \'|\' is not supported in url-filter. ((a|b))'
    );
    expect(() => convertRules(["||a.com^$popup"], { onRejected: "error" })).toThrow(ConversionError);
  });

  test("counts rule and action types", () => {
    const result = convertRules(["||a.com^", "@@||b.com^$document", "example.com##.ad", "##.x { background: url(a) }"]);

    expect(result.report.stats.rules).toEqual({
      network: 2,
      "css-hide": 2,
      "extended-css-hide": 0,
      "script-inject": 0,
      "scriptlet-inject": 0,
      allowlist: 1
    });
    expect(result.report.stats.actions).toMatchObject({
      block: 1,
      "css-display-none": 1,
      "ignore-previous-rules": 1
    });
    expect(result.report.stats.rejections["unsafe-css"]).toBe(1);
  });
});

describe("convertRuleList", () => {
  test("converts rules built in code", () => {
    const result = convertRuleList([createNetworkRule({ urlPattern: "||example.com/path", permittedDomains: ["test.com"] })]);

    expect(parseEntries(result.converted)).toEqual([
      { trigger: { "url-filter": "^[htpsw]+:\\/\\/", "if-domain": ["test.com"] }, action: { type: "block" } }
    ]);
  });
});
