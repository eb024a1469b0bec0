import regjsparser from "regjsparser";
import type { RootNode } from "regjsparser";

type ParserFeatures = {
  lookbehind: true;
  namedGroups: true;
};

const PARSER_FEATURES: ParserFeatures = {
  lookbehind: true,
  namedGroups: true
};

const NON_ASCII_PATTERN = /[^\x00-\x7f]/;
const BRACED_QUANTIFIER_PATTERN = /\{\d*,?\d*\}\??$/;
const LOOKAROUND_BEHAVIORS = new Set<string>(["lookahead", "negativeLookahead", "lookbehind", "negativeLookbehind"]);
const BOUNDARY_KINDS = new Set<string>(["boundary", "not-boundary"]);

export type UnsupportedConstruct =
  | "syntax"
  | "non-ascii"
  | "bounded-repetition"
  | "alternation"
  | "lookaround"
  | "word-boundary"
  | "backreference";

export type RegexCheck = { valid: true } | { valid: false; construct: UnsupportedConstruct; reason: string };

const REASONS: Record<UnsupportedConstruct, string> = {
  syntax: "Pattern is not a valid regular expression.",
  "non-ascii": "Non-ASCII characters are not supported in url-filter.",
  "bounded-repetition": "Bounded repetition {m,n} is not supported in url-filter.",
  alternation: "Alternation '|' is not supported in url-filter.",
  lookaround: "Lookahead and lookbehind groups are not supported in url-filter.",
  "word-boundary": "Word boundaries \\b and \\B are not supported in url-filter.",
  backreference: "Back-references are not supported in url-filter."
};

export function isValidRegex(source: string): boolean {
  return checkRegex(source).valid;
}

export function checkRegex(source: string): RegexCheck {
  if (NON_ASCII_PATTERN.test(source)) {
    return unsupported("non-ascii");
  }

  let ast: RootNode<ParserFeatures>;
  try {
    ast = regjsparser.parse(source, "", PARSER_FEATURES);
  } catch {
    return unsupported("syntax");
  }

  const construct = findUnsupportedConstruct(ast);
  return construct ? unsupported(construct) : { valid: true };
}

function findUnsupportedConstruct(node: RootNode<ParserFeatures>): UnsupportedConstruct | null {
  switch (node.type) {
    case "alternative":
      return firstUnsupported(node.body);
    case "disjunction":
      return "alternation";
    case "group":
      if (LOOKAROUND_BEHAVIORS.has(node.behavior)) {
        return "lookaround";
      }
      return firstUnsupported(node.body);
    case "quantifier":
      // `{m}`, `{m,}` and `{m,n}` only differ from `?`, `*` and `+` in the raw text
      if (BRACED_QUANTIFIER_PATTERN.test(node.raw)) {
        return "bounded-repetition";
      }
      return findUnsupportedConstruct(node.body[0]);
    case "anchor":
      return BOUNDARY_KINDS.has(node.kind) ? "word-boundary" : null;
    case "reference":
      return "backreference";
    default:
      return null;
  }
}

function firstUnsupported(nodes: RootNode<ParserFeatures>[]): UnsupportedConstruct | null {
  for (const child of nodes) {
    const construct = findUnsupportedConstruct(child);
    if (construct) {
      return construct;
    }
  }
  return null;
}

function unsupported(construct: UnsupportedConstruct): RegexCheck {
  return { valid: false, construct, reason: REASONS[construct] };
}
