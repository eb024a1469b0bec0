import type { ActionType, BlockerEntry, RejectedRule, RejectReason, Rule, RuleTypeCounts } from "./types.js";

export function countRuleTypes(rules: readonly Rule[]): RuleTypeCounts {
  const counts = makeEmptyRuleTypeCounts();

  for (const rule of rules) {
    counts[rule.type] += 1;
    if (rule.isAllowlist) {
      counts.allowlist += 1;
    }
  }

  return counts;
}

export function countActionTypes(entries: readonly BlockerEntry[]): Record<ActionType, number> {
  const counts: Record<ActionType, number> = {
    block: 0,
    "css-display-none": 0,
    css: 0,
    script: 0,
    scriptlet: 0,
    "ignore-previous-rules": 0
  };

  for (const entry of entries) {
    counts[entry.action.type] += 1;
  }

  return counts;
}

export function countRejections(rejected: readonly RejectedRule[]): Record<RejectReason, number> {
  const counts: Record<RejectReason, number> = {
    "unsupported-regex": 0,
    "conflicting-domains": 0,
    "unsupported-content-type": 0,
    "replace-rule": 0,
    "unsafe-css": 0,
    "advanced-blocking-disabled": 0,
    "unscoped-document-block": 0
  };

  for (const item of rejected) {
    counts[item.reason] += 1;
  }

  return counts;
}

function makeEmptyRuleTypeCounts(): RuleTypeCounts {
  return {
    network: 0,
    "css-hide": 0,
    "extended-css-hide": 0,
    "script-inject": 0,
    "scriptlet-inject": 0,
    allowlist: 0
  };
}
