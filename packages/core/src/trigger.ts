import { buildDomainConstraints } from "./domains.js";
import { isAnyUrlPattern, isHostnameAnchored, parsePatternDomain, patternToRegex } from "./pattern.js";
import { checkRegex } from "./regex.js";
import { mapResourceTypes } from "./resource-types.js";
import { ok, reject } from "./rules.js";
import type { NetworkRule, Outcome, Rule, Trigger } from "./types.js";

export const URL_FILTER_ANY_URL = ".*";
export const URL_FILTER_WS_ANY_URL = "^wss?:\\/\\/";
/**
 * Matches any http, https, ws or wss URL. Hostname-anchored rules rely on the
 * domain constraint to narrow it down, so the literal stays as it is.
 */
export const URL_FILTER_REGEXP_START_URL = "^[htpsw]+:\\/\\/";

const DOCUMENT_WIDE_PATHS = new Set(["^", "/"]);

export function buildTrigger(rule: Rule): Outcome<Trigger> {
  if (rule.type !== "network") {
    const domains = buildDomainConstraints(rule.permittedDomains, rule.restrictedDomains);
    if (domains.status === "rejected") {
      return domains;
    }
    return ok({ urlFilter: URL_FILTER_ANY_URL, ...domains.value });
  }

  return buildNetworkTrigger(rule);
}

function buildNetworkTrigger(rule: NetworkRule): Outcome<Trigger> {
  const urlFilter = resolveUrlFilter(rule);
  if (urlFilter.status === "rejected") {
    return urlFilter;
  }

  let permittedDomains = rule.permittedDomains;
  let filter = urlFilter.value;

  if (rule.isDocumentAllowlist) {
    const anchored = parsePatternDomain(rule.urlPattern);
    if (anchored) {
      if (permittedDomains.length === 0) {
        permittedDomains = [anchored.domain];
      }
      if (DOCUMENT_WIDE_PATHS.has(anchored.path)) {
        filter = URL_FILTER_ANY_URL;
      }
    }
  }

  const domains = buildDomainConstraints(permittedDomains, rule.restrictedDomains);
  if (domains.status === "rejected") {
    return domains;
  }

  const resourceTypes = mapResourceTypes(rule.permittedContentTypes, rule.restrictedContentTypes, rule.isReplace);
  if (resourceTypes.status === "rejected") {
    return resourceTypes;
  }

  const trigger: Trigger = { urlFilter: filter, ...domains.value };

  if (resourceTypes.value) {
    trigger.resourceType = resourceTypes.value;
  }

  if (rule.isCheckThirdParty) {
    trigger.loadType = [rule.isThirdParty ? "third-party" : "first-party"];
  }

  if (rule.isMatchCase) {
    trigger.caseSensitive = true;
  }

  return ok(trigger);
}

function resolveUrlFilter(rule: NetworkRule): Outcome<string> {
  if (rule.urlRegExpSource !== undefined && rule.urlRegExpSource.length > 0) {
    return validatedUrlFilter(rule.urlRegExpSource);
  }

  if (isAnyUrlPattern(rule.urlPattern)) {
    return ok(isWebSocketOnly(rule) ? URL_FILTER_WS_ANY_URL : URL_FILTER_ANY_URL);
  }

  if (isHostnameAnchored(rule.urlPattern)) {
    return ok(URL_FILTER_REGEXP_START_URL);
  }

  return validatedUrlFilter(patternToRegex(rule.urlPattern));
}

function validatedUrlFilter(source: string): Outcome<string> {
  const check = checkRegex(source);
  if (!check.valid) {
    return reject("unsupported-regex", `${check.reason} (${source})`);
  }
  return ok(source);
}

function isWebSocketOnly(rule: NetworkRule): boolean {
  return rule.permittedContentTypes.length === 1 && rule.permittedContentTypes[0] === "websocket";
}
