import { buildAction } from "./action.js";
import { ok, reject } from "./rules.js";
import { buildTrigger } from "./trigger.js";
import type { BlockerEntry, BlockerEntryFactoryOptions, Outcome, Rejection, Rule } from "./types.js";

export interface BlockerEntryFactory {
  compileRule(rule: Rule): Outcome<BlockerEntry>;
  createBlockerEntry(rule: Rule): BlockerEntry | null;
}

export function createBlockerEntryFactory(options: BlockerEntryFactoryOptions = {}): BlockerEntryFactory {
  const advancedBlocking = options.advancedBlocking ?? false;

  return {
    compileRule(rule: Rule): Outcome<BlockerEntry> {
      return compileRule(rule, advancedBlocking);
    },

    createBlockerEntry(rule: Rule): BlockerEntry | null {
      const result = compileRule(rule, advancedBlocking);
      return result.status === "ok" ? result.value : null;
    }
  };
}

export function compileRule(rule: Rule, advancedBlocking: boolean): Outcome<BlockerEntry> {
  const gate = checkRuleGates(rule);
  if (gate) {
    return gate;
  }

  const trigger = buildTrigger(rule);
  if (trigger.status === "rejected") {
    return trigger;
  }

  const action = buildAction(rule, advancedBlocking);
  if (action.status === "rejected") {
    return action;
  }

  const entry: BlockerEntry = {
    trigger: trigger.value,
    action: action.value
  };

  const validation = validateEntry(rule, entry);
  if (validation) {
    return validation;
  }

  return ok(entry);
}

function checkRuleGates(rule: Rule): Rejection | null {
  if (rule.permittedDomains.length > 0 && rule.restrictedDomains.length > 0) {
    return reject(
      "conflicting-domains",
      "Permitted and restricted domains cannot be combined in one entry."
    );
  }

  if (rule.type === "network" && rule.isReplace) {
    return reject("replace-rule", "Rules rewriting the response body ($replace) cannot be converted.");
  }

  return null;
}

function validateEntry(rule: Rule, entry: BlockerEntry): Rejection | null {
  if (rule.type !== "network" || entry.action.type !== "block") {
    return null;
  }

  // third-party frames load as "document", which also matches every top-level page
  const blocksThirdPartyFrames =
    rule.isCheckThirdParty && rule.isThirdParty && rule.permittedContentTypes.includes("subdocument");
  if (blocksThirdPartyFrames && rule.permittedDomains.length === 0) {
    return reject(
      "unscoped-document-block",
      "Blocking third-party frames requires a permitted domain."
    );
  }

  return null;
}
