import { describe, expect, test } from "vitest";

import {
  addAllowlistRule,
  addInvertedAllowlistRule,
  allowlistContains,
  convertRuleToJson,
  createAllowlistRule,
  createInvertedAllowlistRule,
  invertedAllowlistContains,
  removeAllowlistRule,
  removeInvertedAllowlistRule,
  replaceRule,
  userRuleIsAssociated
} from "../src/clipper.js";
import { convertRules, createEmptyResult, EMPTY_RESULT_JSON } from "../src/converter.js";
import { AllowlistClipperError } from "../src/errors.js";

const INVERTED_JSON =
  '{"trigger":{"url-filter":".*","unless-domain":["example.org"]},"action":{"type":"ignore-previous-rules"}}';

describe("allowlist rule builders", () => {
  test("builds allowlist rule text", () => {
    expect(createAllowlistRule("example.org")).toBe("@@||example.org$document");
    expect(createInvertedAllowlistRule("example.org")).toBe("@@||*$document,domain=~example.org");
  });

  test("converts a single rule to its entry text", () => {
    expect(convertRuleToJson(createInvertedAllowlistRule("example.org"))).toBe(INVERTED_JSON);
    expect(() => convertRuleToJson("example.com#%#window.x = 1;")).toThrow(AllowlistClipperError);
  });
});

describe("addAllowlistRule", () => {
  test("replaces the placeholder of an empty result", () => {
    const result = addInvertedAllowlistRule("example.org", createEmptyResult());

    expect(result.converted).toBe(`[${INVERTED_JSON}]`);
    expect(result.convertedCount).toBe(1);
    expect(result.totalConvertedCount).toBe(1);
    expect(result.errorsCount).toBe(0);
  });

  test("appends to an existing result", () => {
    const base = convertRules(["||ads.example^"]);
    const result = addAllowlistRule("example.org", base);

    expect(result.converted).toBe(
      `${base.converted.slice(0, -1)},${convertRuleToJson(createAllowlistRule("example.org"))}]`
    );
    expect(JSON.parse(result.converted)).toHaveLength(2);
    expect(result.convertedCount).toBe(2);
    expect(result.totalConvertedCount).toBe(2);
  });

  test("refuses to add a rule twice", () => {
    const once = addAllowlistRule("example.org", convertRules(["||ads.example^"]));

    expect(() => addAllowlistRule("example.org", once)).toThrow(AllowlistClipperError);
  });
});

describe("removeAllowlistRule", () => {
  test("restores the result it was added to", () => {
    const base = convertRules(["||ads.example^"]);
    const added = addAllowlistRule("example.org", base);
    const removed = removeAllowlistRule("example.org", added);

    expect(removed.converted).toBe(base.converted);
    expect(removed.convertedCount).toBe(1);
    expect(removed.totalConvertedCount).toBe(1);
  });

  test("removes the first of several entries", () => {
    const base = convertRules(["||ads.example^"]);
    const withRule = {
      ...base,
      converted: `[${INVERTED_JSON},${base.converted.slice(1)}`,
      convertedCount: 2,
      totalConvertedCount: 2
    };

    const removed = removeInvertedAllowlistRule("example.org", withRule);

    expect(removed.converted).toBe(base.converted);
    expect(removed.convertedCount).toBe(1);
  });

  test("falls back to the placeholder when nothing is left", () => {
    const added = addInvertedAllowlistRule("example.org", createEmptyResult());
    const removed = removeInvertedAllowlistRule("example.org", added);

    expect(removed.converted).toBe(EMPTY_RESULT_JSON);
    expect(removed.convertedCount).toBe(0);
    expect(removed.totalConvertedCount).toBe(0);
  });

  test("refuses to remove a missing rule", () => {
    expect(() => removeAllowlistRule("example.org", convertRules(["||ads.example^"]))).toThrow(
      "conversion result does not contain rule: @@||example.org$document"
    );
  });
});

describe("replaceRule", () => {
  test("swaps one entry for another", () => {
    const added = addAllowlistRule("a.example", convertRules(["||ads.example^"]));
    const replaced = replaceRule(createAllowlistRule("a.example"), createAllowlistRule("b.example"), added);

    expect(replaced.converted).not.toContain(convertRuleToJson(createAllowlistRule("a.example")));
    expect(replaced.converted).toContain(convertRuleToJson(createAllowlistRule("b.example")));
    expect(replaced.convertedCount).toBe(2);
  });

  test("refuses to replace a missing rule", () => {
    expect(() =>
      replaceRule(createAllowlistRule("a.example"), createAllowlistRule("b.example"), createEmptyResult())
    ).toThrow(AllowlistClipperError);
  });
});

describe("allowlist lookups", () => {
  test("finds allowlist rules with or without a separator", () => {
    expect(allowlistContains("example.org", ["@@||example.org$document"])).toBe(true);
    expect(allowlistContains("example.org", ["@@||example.org^$document"])).toBe(true);
    expect(allowlistContains("example.org", ["@@||other.org$document"])).toBe(false);
  });

  test("finds inverted allowlist rules", () => {
    expect(invertedAllowlistContains("example.org", ["@@||*$document,domain=~example.org"])).toBe(true);
    expect(invertedAllowlistContains("example.org", ["@@||example.org$document"])).toBe(false);
  });

  test("associates user rules with the domains they mention", () => {
    expect(userRuleIsAssociated("example.org", "||example.org^$script")).toBe(true);
    expect(userRuleIsAssociated("example.org", "example.org,test.com##.ad")).toBe(true);
    expect(userRuleIsAssociated("example.org", "||ads.example^$domain=~example.org")).toBe(true);
    expect(userRuleIsAssociated("example.org", "test.com##.ad")).toBe(false);
    expect(userRuleIsAssociated("example.org", "||example.org^$popup")).toBe(false);
  });
});
