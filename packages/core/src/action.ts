import { isValidCssSelector } from "./css.js";
import { ok, reject } from "./rules.js";
import type { Action, CssRule, Outcome, Rule } from "./types.js";

export function buildAction(rule: Rule, advancedBlocking: boolean): Outcome<Action> {
  switch (rule.type) {
    case "network":
      return ok<Action>(rule.isAllowlist ? { type: "ignore-previous-rules" } : { type: "block" });
    case "css-hide":
    case "extended-css-hide":
      return buildCssAction(rule);
    case "script-inject":
      if (!advancedBlocking) {
        return advancedBlockingDisabled("Script");
      }
      return ok<Action>({
        type: rule.isAllowlist ? "ignore-previous-rules" : "script",
        script: rule.script
      });
    case "scriptlet-inject":
      if (!advancedBlocking) {
        return advancedBlockingDisabled("Scriptlet");
      }
      return ok<Action>({
        type: rule.isAllowlist ? "ignore-previous-rules" : "scriptlet",
        scriptlet: rule.scriptlet,
        scriptletParam: rule.scriptletParam
      });
  }
}

function buildCssAction(rule: CssRule): Outcome<Action> {
  if (!isValidCssSelector(rule.cssSelector)) {
    return reject("unsafe-css", `Selector loads remote resources: ${rule.cssSelector}`);
  }

  if (rule.isAllowlist) {
    return ok<Action>({ type: "ignore-previous-rules" });
  }

  if (rule.type === "extended-css-hide") {
    return ok<Action>({ type: "css", css: rule.cssSelector });
  }

  return ok<Action>({ type: "css-display-none", selector: rule.cssSelector });
}

function advancedBlockingDisabled(kind: string): Outcome<Action> {
  return reject("advanced-blocking-disabled", `${kind} rules require advanced blocking to be enabled.`);
}
