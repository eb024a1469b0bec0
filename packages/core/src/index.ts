export * from "./types.js";
export * from "./errors.js";
export { checkRegex, isValidRegex, type RegexCheck, type UnsupportedConstruct } from "./regex.js";
export { ANY_URL_PATTERNS, isAnyUrlPattern, parsePatternDomain, patternToRegex, type PatternDomain } from "./pattern.js";
export { buildDomainConstraints, resolveDomains, TLD_WILDCARD, TOP_DOMAINS, type DomainConstraints } from "./domains.js";
export { mapResourceTypes } from "./resource-types.js";
export { isValidCssSelector } from "./css.js";
export { buildTrigger, URL_FILTER_ANY_URL, URL_FILTER_REGEXP_START_URL, URL_FILTER_WS_ANY_URL } from "./trigger.js";
export { buildAction } from "./action.js";
export { compileRule, createBlockerEntryFactory, type BlockerEntryFactory } from "./factory.js";
export { createCssRule, createNetworkRule, createScriptletRule, createScriptRule } from "./rules.js";
export { parseRulesFromText, parseRuleText } from "./parser.js";
export { serializeEntries, serializeEntry, toWireEntry } from "./serializer.js";
export { countActionTypes, countRejections, countRuleTypes } from "./stats.js";
export { convertRuleList, convertRules, createEmptyResult, DEFAULT_MAX_ENTRIES, EMPTY_RESULT_JSON } from "./converter.js";
export {
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
  userRuleIsAssociated,
  type ClippableResult
} from "./clipper.js";
