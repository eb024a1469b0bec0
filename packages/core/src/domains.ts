import topDomains from "./data/top-domains.json" with { type: "json" };

import { ok, reject } from "./rules.js";
import type { Outcome, Trigger } from "./types.js";

export const TLD_WILDCARD = ".*";

export const TOP_DOMAINS: readonly string[] = Object.freeze([...topDomains]);

export type DomainConstraints = Pick<Trigger, "ifDomain" | "unlessDomain">;

export function buildDomainConstraints(
  permitted: readonly string[],
  restricted: readonly string[]
): Outcome<DomainConstraints> {
  if (permitted.length > 0 && restricted.length > 0) {
    return reject(
      "conflicting-domains",
      "Permitted and restricted domains cannot be combined in one entry."
    );
  }

  if (permitted.length > 0) {
    return ok({ ifDomain: resolveDomains(permitted) });
  }

  if (restricted.length > 0) {
    return ok({ unlessDomain: resolveDomains(restricted) });
  }

  return ok({});
}

export function resolveDomains(domains: readonly string[]): string[] {
  const resolved = new Set<string>();

  for (const raw of domains) {
    const domain = raw.trim().toLowerCase();
    if (domain.length === 0) {
      continue;
    }

    if (domain === TLD_WILDCARD) {
      for (const suffix of TOP_DOMAINS) {
        resolved.add(suffix);
      }
      continue;
    }

    if (domain.endsWith(TLD_WILDCARD)) {
      const base = domain.slice(0, -TLD_WILDCARD.length);
      for (const suffix of TOP_DOMAINS) {
        resolved.add(`${base}.${suffix}`);
      }
      continue;
    }

    resolved.add(domain);
  }

  return Array.from(resolved);
}
