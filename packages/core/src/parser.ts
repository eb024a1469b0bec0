import { RuleParseError } from "./errors.js";
import { isAnyUrlPattern, patternToRegex } from "./pattern.js";
import { createCssRule, createNetworkRule, createScriptletRule, createScriptRule } from "./rules.js";
import type { ContentType, CosmeticRule, NetworkRule, ParsedRules, ParseIssue, Rule } from "./types.js";

const COSMETIC_RULE_PATTERN = /^([^#]*?)(#@?(?:\?|%|\$\??)?#)(.*)$/;
const VALID_DOMAIN = /^[a-z0-9*.-]+$/;
const SCRIPTLET_PREFIX = "//scriptlet(";

type CosmeticMarker = {
  kind: "css" | "extended-css" | "script";
  allowlist: boolean;
};

const COSMETIC_MARKERS: Record<string, CosmeticMarker> = {
  "##": { kind: "css", allowlist: false },
  "#@#": { kind: "css", allowlist: true },
  "#?#": { kind: "extended-css", allowlist: false },
  "#@?#": { kind: "extended-css", allowlist: true },
  "#%#": { kind: "script", allowlist: false },
  "#@%#": { kind: "script", allowlist: true }
};

const EXTENDED_CSS_MARKERS = [
  ":has(",
  ":has-text(",
  ":contains(",
  ":-abp-has(",
  ":-abp-contains(",
  ":matches-css(",
  ":matches-css-before(",
  ":matches-css-after(",
  ":matches-attr(",
  ":matches-property(",
  ":xpath(",
  ":nth-ancestor(",
  ":upward(",
  ":remove(",
  ":if(",
  ":if-not(",
  "[-ext-"
];

const CONTENT_TYPE_MODIFIERS: Record<string, ContentType> = {
  all: "all",
  image: "image",
  stylesheet: "stylesheet",
  css: "stylesheet",
  script: "script",
  media: "media",
  xmlhttprequest: "xmlhttprequest",
  xhr: "xmlhttprequest",
  other: "other",
  websocket: "websocket",
  ping: "ping",
  font: "font",
  subdocument: "subdocument",
  frame: "subdocument",
  object: "object",
  "object-subrequest": "object-subrequest",
  webrtc: "webrtc"
};

export function parseRulesFromText(content: string): ParsedRules {
  const rules: Rule[] = [];
  const issues: ParseIssue[] = [];
  const lines = content.split(/\r?\n/);

  for (let index = 0; index < lines.length; index += 1) {
    const text = (lines[index] ?? "").trim();

    try {
      const rule = parseRuleText(text);
      if (rule) {
        rules.push(rule);
      }
    } catch (error) {
      if (!(error instanceof RuleParseError)) {
        throw error;
      }
      issues.push({ line: index + 1, ruleText: text, message: error.message });
    }
  }

  return { rules, issues };
}

/**
 * Parses one filter-list line. Blank lines, `!` comments and `[Adblock Plus 2.0]`
 * style headers yield null.
 */
export function parseRuleText(input: string): Rule | null {
  const text = input.trim();
  if (text.length === 0 || text.startsWith("!") || (text.startsWith("[") && text.endsWith("]"))) {
    return null;
  }

  const cosmetic = text.match(COSMETIC_RULE_PATTERN);
  if (cosmetic) {
    return parseCosmeticRule(text, cosmetic[1] ?? "", cosmetic[2] ?? "", cosmetic[3] ?? "");
  }

  return parseNetworkRule(text);
}

function parseCosmeticRule(ruleText: string, domainPart: string, markerText: string, content: string): CosmeticRule {
  const marker = COSMETIC_MARKERS[markerText];
  if (!marker) {
    throw new RuleParseError(`unsupported cosmetic marker: ${JSON.stringify(markerText)}`);
  }

  const body = content.trim();
  if (body.length === 0) {
    throw new RuleParseError(`empty cosmetic rule: ${JSON.stringify(ruleText)}`);
  }

  const domains = parseDomainList(domainPart, ",");
  const base = {
    ruleText,
    permittedDomains: domains.permitted,
    restrictedDomains: domains.restricted,
    isAllowlist: marker.allowlist
  };

  switch (marker.kind) {
    case "css":
      return createCssRule({ ...base, cssSelector: body, extended: isExtendedCss(body) });
    case "extended-css":
      return createCssRule({ ...base, cssSelector: body, extended: true });
    case "script":
      if (body.startsWith(SCRIPTLET_PREFIX)) {
        const call = parseScriptletCall(body);
        return createScriptletRule({
          ...base,
          scriptlet: call.name,
          scriptletParam: JSON.stringify({ name: call.name, args: call.args })
        });
      }
      return createScriptRule({ ...base, script: body });
  }
}

function parseNetworkRule(ruleText: string): NetworkRule {
  const isAllowlist = ruleText.startsWith("@@");
  const body = isAllowlist ? ruleText.slice(2) : ruleText;
  const { pattern, options } = splitModifiers(body);

  const rule = createNetworkRule({ ruleText, isAllowlist, urlPattern: pattern });
  for (const option of options) {
    applyModifier(rule, option);
  }

  if (isRegexLiteral(pattern)) {
    rule.urlRegExpSource = pattern.slice(1, -1);
  } else if (!isAnyUrlPattern(pattern)) {
    rule.urlRegExpSource = patternToRegex(pattern);
  }

  return rule;
}

function splitModifiers(body: string): { pattern: string; options: string[] } {
  const dollarIndex = body.startsWith("/") ? findRegexModifierSeparator(body) : body.indexOf("$");

  if (dollarIndex === -1) {
    return { pattern: body, options: [] };
  }

  const options = body
    .slice(dollarIndex + 1)
    .split(",")
    .map((option) => option.trim())
    .filter((option) => option.length > 0);

  return { pattern: body.slice(0, dollarIndex), options };
}

/**
 * Index of the `$` that follows the closing slash of a `/regex/` body. Modifier
 * values such as `replace=/x/y/` may contain slashes of their own, so the scan
 * runs from the left and skips escaped characters.
 */
function findRegexModifierSeparator(body: string): number {
  for (let index = 1; index < body.length; index += 1) {
    const char = body.charAt(index);
    if (char === "\\") {
      index += 1;
      continue;
    }
    if (char === "/" && body.charAt(index + 1) === "$") {
      return index + 1;
    }
  }
  return -1;
}

function applyModifier(rule: NetworkRule, option: string): void {
  const negated = option.startsWith("~");
  const raw = negated ? option.slice(1) : option;
  const eqIndex = raw.indexOf("=");
  const name = (eqIndex === -1 ? raw : raw.slice(0, eqIndex)).toLowerCase();
  const value = eqIndex === -1 ? "" : raw.slice(eqIndex + 1);

  switch (name) {
    case "domain": {
      if (negated || value.length === 0) {
        throw new RuleParseError(`invalid domain modifier: ${JSON.stringify(option)}`);
      }
      const domains = parseDomainList(value, "|");
      rule.permittedDomains.push(...domains.permitted);
      rule.restrictedDomains.push(...domains.restricted);
      return;
    }
    case "third-party":
    case "3p":
      rule.isCheckThirdParty = true;
      rule.isThirdParty = !negated;
      return;
    case "first-party":
    case "1p":
      rule.isCheckThirdParty = true;
      rule.isThirdParty = negated;
      return;
    case "match-case":
      rule.isMatchCase = !negated;
      return;
    case "document":
    case "doc":
      if (negated) {
        rule.restrictedContentTypes.push("document");
      } else if (rule.isAllowlist) {
        rule.isDocumentAllowlist = true;
      } else {
        rule.permittedContentTypes.push("document");
      }
      return;
    case "replace":
      if (negated) {
        throw new RuleParseError(`invalid replace modifier: ${JSON.stringify(option)}`);
      }
      rule.isReplace = true;
      return;
    default:
      break;
  }

  const contentType = CONTENT_TYPE_MODIFIERS[name];
  if (!contentType || (negated && contentType === "all")) {
    throw new RuleParseError(`unsupported modifier: ${JSON.stringify(option)}`);
  }

  if (negated) {
    rule.restrictedContentTypes.push(contentType);
  } else {
    rule.permittedContentTypes.push(contentType);
  }
}

function parseDomainList(input: string, separator: string): { permitted: string[]; restricted: string[] } {
  const permitted: string[] = [];
  const restricted: string[] = [];

  for (const part of input.split(separator)) {
    const trimmed = part.trim();
    if (trimmed.length === 0) {
      continue;
    }

    const isRestricted = trimmed.startsWith("~");
    const domain = (isRestricted ? trimmed.slice(1) : trimmed).toLowerCase();
    if (!VALID_DOMAIN.test(domain)) {
      throw new RuleParseError(`invalid domain: ${JSON.stringify(domain)}`);
    }

    (isRestricted ? restricted : permitted).push(domain);
  }

  return { permitted, restricted };
}

function parseScriptletCall(content: string): { name: string; args: string[] } {
  if (!content.endsWith(")")) {
    throw new RuleParseError(`invalid scriptlet call: ${JSON.stringify(content)}`);
  }

  const inner = content.slice(SCRIPTLET_PREFIX.length, -1);
  const values: string[] = [];
  let index = 0;

  while (index < inner.length) {
    const quote = inner.charAt(index);
    if (quote === " " || quote === ",") {
      index += 1;
      continue;
    }

    if (quote !== "'" && quote !== '"') {
      throw new RuleParseError(`scriptlet arguments must be quoted: ${JSON.stringify(content)}`);
    }

    let value = "";
    let closed = false;
    index += 1;

    while (index < inner.length) {
      const char = inner.charAt(index);
      if (char === "\\") {
        value += inner.charAt(index + 1);
        index += 2;
        continue;
      }
      index += 1;
      if (char === quote) {
        closed = true;
        break;
      }
      value += char;
    }

    if (!closed) {
      throw new RuleParseError(`unterminated scriptlet argument: ${JSON.stringify(content)}`);
    }
    values.push(value);
  }

  const [name, ...args] = values;
  if (!name) {
    throw new RuleParseError(`scriptlet name is missing: ${JSON.stringify(content)}`);
  }

  return { name, args };
}

function isExtendedCss(selector: string): boolean {
  return EXTENDED_CSS_MARKERS.some((marker) => selector.includes(marker));
}

function isRegexLiteral(pattern: string): boolean {
  return pattern.length > 2 && pattern.startsWith("/") && pattern.endsWith("/");
}
