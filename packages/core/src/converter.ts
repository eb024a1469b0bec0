import { ConversionError } from "./errors.js";
import { createBlockerEntryFactory } from "./factory.js";
import { parseRulesFromText } from "./parser.js";
import { reject } from "./rules.js";
import { serializeEntries } from "./serializer.js";
import { countActionTypes, countRejections, countRuleTypes } from "./stats.js";
import type {
  BlockerEntry,
  ConversionOptions,
  ConversionResult,
  ParsedRules,
  RejectedRule,
  Rejection,
  Rule
} from "./types.js";

/** Safari refuses content blockers with more entries than this. */
export const DEFAULT_MAX_ENTRIES = 50000;

type EntryGroup = "blocking" | "allowlist" | "document";

/** Safari refuses to load an empty rule array, so empty output carries one no-op entry. */
const EMPTY_RESULT_ENTRY: BlockerEntry = {
  trigger: { urlFilter: ".*", ifDomain: ["domain.com"] },
  action: { type: "ignore-previous-rules" }
};

export const EMPTY_RESULT_JSON = serializeEntries([EMPTY_RESULT_ENTRY]);

export function createEmptyResult(): ConversionResult {
  return {
    converted: EMPTY_RESULT_JSON,
    convertedCount: 0,
    totalConvertedCount: 0,
    errorsCount: 0,
    overLimit: false,
    advancedBlockingConvertedCount: 0,
    report: {
      rejected: [],
      issues: [],
      stats: {
        rules: countRuleTypes([]),
        actions: countActionTypes([]),
        rejections: countRejections([])
      }
    }
  };
}

export function convertRules(lines: readonly string[], options: ConversionOptions = {}): ConversionResult {
  return convertParsedRules(parseRulesFromText(lines.join("\n")), options);
}

export function convertRuleList(rules: readonly Rule[], options: ConversionOptions = {}): ConversionResult {
  return convertParsedRules({ rules: [...rules], issues: [] }, options);
}

function convertParsedRules(parsed: ParsedRules, options: ConversionOptions): ConversionResult {
  const limit = options.limit ?? DEFAULT_MAX_ENTRIES;
  const advancedBlocking = options.advancedBlocking ?? false;
  const onRejected = options.onRejected ?? "skip";

  if (!Number.isInteger(limit) || limit < 0) {
    throw new ConversionError(`invalid entry limit: ${limit}`);
  }

  const firstIssue = parsed.issues[0];
  if (onRejected === "error" && firstIssue) {
    throw new ConversionError(`cannot parse rule at line ${firstIssue.line}: ${firstIssue.ruleText} (${firstIssue.message})`);
  }

  const factory = createBlockerEntryFactory({ advancedBlocking });
  const groups: Record<EntryGroup, BlockerEntry[]> = {
    blocking: [],
    allowlist: [],
    document: []
  };
  const advanced: BlockerEntry[] = [];
  const rejected: RejectedRule[] = [];

  const recordRejection = (rule: Rule, rejection: Rejection): void => {
    rejected.push({ ruleText: rule.ruleText, reason: rejection.reason, message: rejection.message });
    if (onRejected === "error") {
      throw new ConversionError(`cannot convert rule ${JSON.stringify(rule.ruleText)}: ${rejection.message}`);
    }
  };

  for (const rule of parsed.rules) {
    const result = factory.compileRule(rule);
    if (result.status === "rejected") {
      recordRejection(rule, result);
      continue;
    }

    if (isAdvancedRule(rule)) {
      if (advancedBlocking) {
        advanced.push(result.value);
      } else {
        recordRejection(
          rule,
          reject("advanced-blocking-disabled", "Extended CSS rules require advanced blocking to be enabled.")
        );
      }
      continue;
    }

    groups[entryGroup(rule)].push(result.value);
  }

  const entries = [...groups.blocking, ...groups.allowlist, ...groups.document];
  const limited = entries.slice(0, limit);

  const result: ConversionResult = {
    converted: limited.length > 0 ? serializeEntries(limited) : EMPTY_RESULT_JSON,
    convertedCount: limited.length,
    totalConvertedCount: entries.length,
    errorsCount: parsed.issues.length + rejected.length,
    overLimit: entries.length > limit,
    advancedBlockingConvertedCount: advanced.length,
    report: {
      rejected,
      issues: parsed.issues,
      stats: {
        rules: countRuleTypes(parsed.rules),
        actions: countActionTypes([...limited, ...advanced]),
        rejections: countRejections(rejected)
      }
    }
  };

  if (advancedBlocking) {
    result.advancedBlocking = serializeEntries(advanced);
  }

  return result;
}

function isAdvancedRule(rule: Rule): boolean {
  return rule.type === "extended-css-hide" || rule.type === "script-inject" || rule.type === "scriptlet-inject";
}

function entryGroup(rule: Rule): EntryGroup {
  if (!rule.isAllowlist) {
    return "blocking";
  }
  return rule.type === "network" && rule.isDocumentAllowlist ? "document" : "allowlist";
}
