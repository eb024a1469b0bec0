import type { BlockerEntry, WireAction, WireEntry, WireTrigger } from "./types.js";

export function toWireEntry(entry: BlockerEntry): WireEntry {
  const { trigger, action } = entry;

  const wireTrigger: WireTrigger = {
    "url-filter": trigger.urlFilter
  };
  if (trigger.caseSensitive !== undefined) {
    wireTrigger["url-filter-is-case-sensitive"] = trigger.caseSensitive;
  }
  if (trigger.ifDomain) {
    wireTrigger["if-domain"] = [...trigger.ifDomain];
  }
  if (trigger.unlessDomain) {
    wireTrigger["unless-domain"] = [...trigger.unlessDomain];
  }
  if (trigger.resourceType) {
    wireTrigger["resource-type"] = [...trigger.resourceType];
  }
  if (trigger.loadType) {
    wireTrigger["load-type"] = [...trigger.loadType];
  }

  const wireAction: WireAction = {
    type: action.type
  };
  if (action.selector !== undefined) {
    wireAction.selector = action.selector;
  }
  if (action.css !== undefined) {
    wireAction.css = action.css;
  }
  if (action.script !== undefined) {
    wireAction.script = action.script;
  }
  if (action.scriptlet !== undefined) {
    wireAction.scriptlet = action.scriptlet;
  }
  if (action.scriptletParam !== undefined) {
    wireAction.scriptletParam = action.scriptletParam;
  }

  return {
    trigger: wireTrigger,
    action: wireAction
  };
}

export function serializeEntry(entry: BlockerEntry): string {
  return JSON.stringify(toWireEntry(entry));
}

export function serializeEntries(entries: readonly BlockerEntry[]): string {
  return `[${entries.map(serializeEntry).join(",")}]`;
}
