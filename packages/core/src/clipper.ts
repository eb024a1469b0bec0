import { convertRules, EMPTY_RESULT_JSON } from "./converter.js";
import { AllowlistClipperError, RuleParseError } from "./errors.js";
import { parseRuleText } from "./parser.js";
import { parsePatternDomain } from "./pattern.js";
import type { ConversionResult } from "./types.js";

/**
 * The parts of a conversion result the clipper edits. Entries are located by their
 * serialized text, so edits never recompile the rest of the array.
 */
export type ClippableResult = Pick<ConversionResult, "converted" | "convertedCount" | "totalConvertedCount">;

export function createAllowlistRule(domain: string): string {
  return `@@||${domain}$document`;
}

export function createInvertedAllowlistRule(domain: string): string {
  return `@@||*$document,domain=~${domain}`;
}

export function convertRuleToJson(ruleText: string): string {
  const result = convertRules([ruleText]);
  if (result.convertedCount === 0) {
    const reason = result.report.rejected[0]?.message ?? result.report.issues[0]?.message ?? "no entry produced";
    throw new AllowlistClipperError(`rule cannot be converted: ${ruleText} (${reason})`);
  }
  return result.converted.slice(1, -1);
}

export function replaceRule<T extends ClippableResult>(rule: string, newRule: string, result: T): T {
  const ruleJson = convertRuleToJson(rule);
  if (!result.converted.includes(ruleJson)) {
    throw new AllowlistClipperError(`conversion result does not contain rule: ${rule}`);
  }

  const newRuleJson = convertRuleToJson(newRule);
  return {
    ...result,
    converted: result.converted.split(ruleJson).join(newRuleJson)
  };
}

export function addAllowlistRule<T extends ClippableResult>(domain: string, result: T): T {
  return addRule(createAllowlistRule(domain), result);
}

export function addInvertedAllowlistRule<T extends ClippableResult>(domain: string, result: T): T {
  return addRule(createInvertedAllowlistRule(domain), result);
}

export function removeAllowlistRule<T extends ClippableResult>(domain: string, result: T): T {
  return removeRule(createAllowlistRule(domain), result);
}

export function removeInvertedAllowlistRule<T extends ClippableResult>(domain: string, result: T): T {
  return removeRule(createInvertedAllowlistRule(domain), result);
}

export function allowlistContains(domain: string, allowlistRules: readonly string[]): boolean {
  const plain = createAllowlistRule(domain);
  const withSeparator = createAllowlistRule(`${domain}^`);
  return allowlistRules.some((rule) => rule === plain || rule === withSeparator);
}

export function invertedAllowlistContains(domain: string, invertedAllowlistRules: readonly string[]): boolean {
  return invertedAllowlistRules.includes(createInvertedAllowlistRule(domain));
}

export function userRuleIsAssociated(domain: string, userRule: string): boolean {
  return parseRuleDomains(userRule).includes(domain);
}

function addRule<T extends ClippableResult>(rule: string, result: T): T {
  const ruleJson = convertRuleToJson(rule);
  if (result.converted.includes(ruleJson)) {
    throw new AllowlistClipperError(`conversion result already contains rule: ${rule}`);
  }

  const isEmpty = result.convertedCount === 0 || result.converted === EMPTY_RESULT_JSON;
  const converted = isEmpty ? `[${ruleJson}]` : `${result.converted.slice(0, -1)},${ruleJson}]`;

  return {
    ...result,
    converted,
    convertedCount: isEmpty ? 1 : result.convertedCount + 1,
    totalConvertedCount: result.totalConvertedCount + 1
  };
}

function removeRule<T extends ClippableResult>(rule: string, result: T): T {
  const ruleJson = convertRuleToJson(rule);
  if (!result.converted.includes(ruleJson)) {
    throw new AllowlistClipperError(`conversion result does not contain rule: ${rule}`);
  }

  const parts = result.converted.split(ruleJson);
  const delta = parts.length - 1;

  let converted = parts.join("");
  if (converted.startsWith("[,{")) {
    converted = `[{${converted.slice(3)}`;
  }
  if (converted.endsWith("},]")) {
    converted = `${converted.slice(0, -3)}}]`;
  }
  while (converted.includes(",,")) {
    converted = converted.split(",,").join(",");
  }

  if (converted === "[]") {
    return {
      ...result,
      converted: EMPTY_RESULT_JSON,
      convertedCount: 0,
      totalConvertedCount: Math.max(0, result.totalConvertedCount - delta)
    };
  }

  return {
    ...result,
    converted,
    convertedCount: result.convertedCount - delta,
    totalConvertedCount: result.totalConvertedCount - delta
  };
}

function parseRuleDomains(ruleText: string): string[] {
  let rule;
  try {
    rule = parseRuleText(ruleText);
  } catch (error) {
    if (error instanceof RuleParseError) {
      return [];
    }
    throw error;
  }

  if (!rule) {
    return [];
  }

  const domains = [...rule.permittedDomains, ...rule.restrictedDomains];
  if (rule.type === "network") {
    const anchored = parsePatternDomain(rule.urlPattern);
    if (anchored) {
      domains.push(anchored.domain);
    }
  }
  return domains;
}
