export const ANY_URL_PATTERNS: readonly string[] = ["", "*", "||*", "|*"];

const REGEX_DOMAIN_START = "^[htpsw]+:\\/\\/([a-z0-9-]+\\.)?";
const REGEX_SEPARATOR = "[/:&?]?";
const REGEX_ANY_CHARS = ".*";
const REGEX_SPECIAL_CHARS = new Set([".", "+", "?", "$", "{", "}", "(", ")", "[", "]", "/", "\\", "|"]);

const DOMAIN_PREFIXES = ["||", "|https://", "|http://", "https://", "http://"];
const DOMAIN_TERMINATORS = new Set(["/", "^", ":", "?", "*", "|"]);
const VALID_HOST = /^[a-z0-9-]+(?:\.[a-z0-9-]+)+$/i;

export interface PatternDomain {
  domain: string;
  path: string;
}

export function isAnyUrlPattern(pattern: string): boolean {
  return ANY_URL_PATTERNS.includes(pattern);
}

export function isHostnameAnchored(pattern: string): boolean {
  return pattern.startsWith("||");
}

/**
 * Extracts the host a network pattern is anchored to, e.g. `||example.org^` gives
 * `{ domain: "example.org", path: "^" }`. Patterns that are not anchored to a plain
 * host yield null.
 */
export function parsePatternDomain(pattern: string): PatternDomain | null {
  const prefix = DOMAIN_PREFIXES.find((candidate) => pattern.startsWith(candidate));
  if (!prefix) {
    return null;
  }

  const rest = pattern.slice(prefix.length);
  let end = 0;
  while (end < rest.length && !DOMAIN_TERMINATORS.has(rest[end] ?? "")) {
    end += 1;
  }

  const domain = rest.slice(0, end).toLowerCase();
  if (!VALID_HOST.test(domain)) {
    return null;
  }

  return {
    domain,
    path: rest.slice(end)
  };
}

export function patternToRegex(pattern: string): string {
  let body = pattern;
  let out = "";

  if (body.startsWith("||")) {
    out += REGEX_DOMAIN_START;
    body = body.slice(2);
  } else if (body.startsWith("|")) {
    out += "^";
    body = body.slice(1);
  }

  let tail = "";
  if (body.endsWith("|")) {
    tail = "$";
    body = body.slice(0, -1);
  }

  for (const char of body) {
    if (char === "*") {
      out += REGEX_ANY_CHARS;
      continue;
    }

    if (char === "^") {
      out += REGEX_SEPARATOR;
      continue;
    }

    if (REGEX_SPECIAL_CHARS.has(char)) {
      out += `\\${char}`;
      continue;
    }

    out += char;
  }

  return out + tail;
}
