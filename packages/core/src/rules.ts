import type { CssRule, NetworkRule, Outcome, RejectReason, Rejection, ScriptletRule, ScriptRule } from "./types.js";

type RuleInit<T extends { type: string }> = Partial<Omit<T, "type">>;

export function createNetworkRule(init: RuleInit<NetworkRule> = {}): NetworkRule {
  const rule: NetworkRule = {
    type: "network",
    ruleText: init.ruleText ?? "",
    permittedDomains: init.permittedDomains ?? [],
    restrictedDomains: init.restrictedDomains ?? [],
    isAllowlist: init.isAllowlist ?? false,
    urlPattern: init.urlPattern ?? "",
    permittedContentTypes: init.permittedContentTypes ?? [],
    restrictedContentTypes: init.restrictedContentTypes ?? [],
    isCheckThirdParty: init.isCheckThirdParty ?? false,
    isThirdParty: init.isThirdParty ?? false,
    isMatchCase: init.isMatchCase ?? false,
    isDocumentAllowlist: init.isDocumentAllowlist ?? false,
    isReplace: init.isReplace ?? false
  };

  if (init.urlRegExpSource !== undefined) {
    rule.urlRegExpSource = init.urlRegExpSource;
  }

  return rule;
}

export function createCssRule(init: RuleInit<CssRule> & { extended?: boolean } = {}): CssRule {
  return {
    type: init.extended ? "extended-css-hide" : "css-hide",
    ruleText: init.ruleText ?? "",
    permittedDomains: init.permittedDomains ?? [],
    restrictedDomains: init.restrictedDomains ?? [],
    isAllowlist: init.isAllowlist ?? false,
    cssSelector: init.cssSelector ?? ""
  };
}

export function createScriptRule(init: RuleInit<ScriptRule> = {}): ScriptRule {
  return {
    type: "script-inject",
    ruleText: init.ruleText ?? "",
    permittedDomains: init.permittedDomains ?? [],
    restrictedDomains: init.restrictedDomains ?? [],
    isAllowlist: init.isAllowlist ?? false,
    script: init.script ?? ""
  };
}

export function createScriptletRule(init: RuleInit<ScriptletRule> = {}): ScriptletRule {
  return {
    type: "scriptlet-inject",
    ruleText: init.ruleText ?? "",
    permittedDomains: init.permittedDomains ?? [],
    restrictedDomains: init.restrictedDomains ?? [],
    isAllowlist: init.isAllowlist ?? false,
    scriptlet: init.scriptlet ?? "",
    scriptletParam: init.scriptletParam ?? ""
  };
}

export function ok<T>(value: T): Outcome<T> {
  return { status: "ok", value };
}

export function reject(reason: RejectReason, message: string): Rejection {
  return { status: "rejected", reason, message };
}
