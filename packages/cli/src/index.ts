#!/usr/bin/env node

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import {
  addAllowlistRule,
  addInvertedAllowlistRule,
  AllowlistClipperError,
  convertRules,
  EMPTY_RESULT_JSON,
  removeAllowlistRule,
  removeInvertedAllowlistRule,
  type ClippableResult,
  type ConversionResult
} from "@webkit-blocker/core";

import { parseCliArgs, readAllowlistFlags, readConvertFlags, type CliFlags } from "./args.js";
import { loadFilterLists } from "./fs-loader.js";

const DEFAULT_OUT_FILE = "content-blocker.json";
const DEFAULT_ADVANCED_OUT_FILE = "advanced-blocking.json";

interface ConversionReportFile {
  generatedAt: string;
  inputs: string[];
  convertedCount: number;
  totalConvertedCount: number;
  errorsCount: number;
  overLimit: boolean;
  advancedBlockingConvertedCount: number;
  report: ConversionResult["report"];
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);

  switch (parsed.command) {
    case "convert":
      return runConvert(parsed.flags);
    case "allowlist":
      return runAllowlist(parsed.flags);
    case "help":
    default:
      printHelp();
      return parsed.command === "help" ? 0 : 1;
  }
}

async function runConvert(rawFlags: CliFlags): Promise<number> {
  const parsed = readConvertFlags(rawFlags);
  if (!parsed.ok) {
    console.error(parsed.error);
    return 1;
  }

  const { input, limit, advancedBlocking } = parsed.flags;
  const cwd = process.cwd();
  const outFile = path.resolve(cwd, parsed.flags.out ?? DEFAULT_OUT_FILE);
  const advancedOutFile = path.resolve(cwd, parsed.flags.advancedOut ?? DEFAULT_ADVANCED_OUT_FILE);
  const reportArg = parsed.flags.report;

  const loaded = await loadFilterLists(path.resolve(cwd, input));
  if (loaded.files.length === 0) {
    console.error(`no filter lists found in: ${input}`);
    return 1;
  }

  const result = convertRules(loaded.lines, { advancedBlocking, limit });

  await writeOutput(outFile, result.converted);
  if (result.advancedBlocking !== undefined) {
    await writeOutput(advancedOutFile, result.advancedBlocking);
  }

  if (reportArg) {
    const reportFile: ConversionReportFile = {
      generatedAt: new Date().toISOString(),
      inputs: loaded.files,
      convertedCount: result.convertedCount,
      totalConvertedCount: result.totalConvertedCount,
      errorsCount: result.errorsCount,
      overLimit: result.overLimit,
      advancedBlockingConvertedCount: result.advancedBlockingConvertedCount,
      report: result.report
    };
    await writeOutput(path.resolve(cwd, reportArg), JSON.stringify(reportFile, null, 2));
  }

  console.log(
    `converted=${result.convertedCount} total=${result.totalConvertedCount} errors=${result.errorsCount} ` +
      `advanced=${result.advancedBlockingConvertedCount} overLimit=${result.overLimit} output=${outFile}`
  );

  if (result.overLimit) {
    console.error(`entry limit reached: ${result.totalConvertedCount - result.convertedCount} entries dropped`);
  }
  return 0;
}

async function runAllowlist(rawFlags: CliFlags): Promise<number> {
  const parsed = readAllowlistFlags(rawFlags);
  if (!parsed.ok) {
    console.error(parsed.error);
    return 1;
  }

  const { domain, remove, inverted } = parsed.flags;
  const convertedFile = path.resolve(process.cwd(), parsed.flags.converted);
  const current = await readConverted(convertedFile);

  let updated: ClippableResult;
  try {
    if (remove) {
      updated = inverted ? removeInvertedAllowlistRule(domain, current) : removeAllowlistRule(domain, current);
    } else {
      updated = inverted ? addInvertedAllowlistRule(domain, current) : addAllowlistRule(domain, current);
    }
  } catch (error) {
    if (error instanceof AllowlistClipperError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  await writeFile(convertedFile, updated.converted, "utf8");
  console.log(`${remove ? "removed" : "added"} ${domain} entries=${updated.convertedCount} output=${convertedFile}`);
  return 0;
}

async function readConverted(file: string): Promise<ClippableResult> {
  const converted = (await readFile(file, "utf8")).trim();
  const parsed: unknown = JSON.parse(converted);
  if (!Array.isArray(parsed)) {
    throw new Error(`not a content-blocker rule array: ${file}`);
  }

  const count = converted === EMPTY_RESULT_JSON ? 0 : parsed.length;
  return {
    converted,
    convertedCount: count,
    totalConvertedCount: count
  };
}

async function writeOutput(file: string, content: string): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, content, "utf8");
}

function printHelp(): void {
  console.log(`webkit-blocker commands:
  convert --input <file|dir> [--out <file>] [--advanced-blocking] [--advanced-out <file>]
          [--limit <n>] [--report <file>]
  allowlist --converted <file> --domain <domain> [--remove] [--inverted]

convert reads one filter list, or every *.txt list in a directory.
defaults: --out ${DEFAULT_OUT_FILE}, --advanced-out ${DEFAULT_ADVANCED_OUT_FILE}`);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.stack ?? error.message : String(error);
      console.error(message);
      process.exitCode = 1;
    });
}
