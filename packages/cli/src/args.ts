export type CliFlags = Record<string, string | boolean>;

export interface CliArgs {
  command: string;
  flags: CliFlags;
  positionals: string[];
}

export interface ConvertFlags {
  input: string;
  out?: string;
  advancedOut?: string;
  report?: string;
  limit?: number;
  advancedBlocking: boolean;
}

export interface AllowlistFlags {
  converted: string;
  domain: string;
  remove: boolean;
  inverted: boolean;
}

export type FlagsResult<T> = { ok: true; flags: T } | { ok: false; error: string };

/** Switches that never take a value, so a following positional is not consumed. */
const SWITCHES = new Set(["advanced-blocking", "remove", "inverted"]);

export function parseCliArgs(argv: string[]): CliArgs {
  const [command = "help", ...rest] = argv;
  const flags: CliFlags = {};
  const positionals: string[] = [];

  for (let i = 0; i < rest.length; i += 1) {
    const token = rest[i];
    if (token === undefined) {
      continue;
    }

    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }

    const name = token.slice(2);
    const eq = name.indexOf("=");
    if (eq !== -1) {
      flags[name.slice(0, eq)] = name.slice(eq + 1);
      continue;
    }

    const next = rest[i + 1];
    if (!SWITCHES.has(name) && next !== undefined && !next.startsWith("--")) {
      flags[name] = next;
      i += 1;
    } else {
      flags[name] = true;
    }
  }

  return { command, flags, positionals };
}

export function readConvertFlags(flags: CliFlags): FlagsResult<ConvertFlags> {
  const input = getStringFlag(flags, "input");
  if (!input) {
    return { ok: false, error: "missing required flag: --input" };
  }

  const limit = getStringFlag(flags, "limit");
  const parsedLimit = limit === undefined ? undefined : Number(limit);
  if (parsedLimit !== undefined && (!Number.isInteger(parsedLimit) || parsedLimit < 0)) {
    return { ok: false, error: `--limit expects a non-negative integer, got ${JSON.stringify(limit)}` };
  }

  const result: ConvertFlags = {
    input,
    out: getStringFlag(flags, "out"),
    advancedOut: getStringFlag(flags, "advanced-out"),
    report: getStringFlag(flags, "report"),
    limit: parsedLimit,
    advancedBlocking: getBooleanFlag(flags, "advanced-blocking")
  };

  return { ok: true, flags: result };
}

export function readAllowlistFlags(flags: CliFlags): FlagsResult<AllowlistFlags> {
  const converted = getStringFlag(flags, "converted");
  if (!converted) {
    return { ok: false, error: "missing required flag: --converted" };
  }

  const domain = getStringFlag(flags, "domain")?.trim().toLowerCase();
  if (!domain) {
    return { ok: false, error: "missing required flag: --domain" };
  }

  return {
    ok: true,
    flags: {
      converted,
      domain,
      remove: getBooleanFlag(flags, "remove"),
      inverted: getBooleanFlag(flags, "inverted")
    }
  };
}

export function getStringFlag(flags: CliFlags, key: string): string | undefined {
  const value = flags[key];
  return typeof value === "string" ? value : undefined;
}

export function getBooleanFlag(flags: CliFlags, key: string): boolean {
  return flags[key] === true;
}

