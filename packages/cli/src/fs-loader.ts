import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";

const FILTER_LIST_EXTENSION = ".txt";

export interface LoadedFilterLists {
  files: string[];
  lines: string[];
}

/**
 * Reads a single filter list, or every `*.txt` list in a directory in name order.
 */
export async function loadFilterLists(inputPath: string): Promise<LoadedFilterLists> {
  const info = await stat(inputPath);
  const files = info.isDirectory() ? await listFilterFiles(inputPath) : [inputPath];

  const lines: string[] = [];
  for (const file of files) {
    const content = await readFile(file, "utf8");
    lines.push(...content.split(/\r?\n/));
  }

  return { files, lines };
}

async function listFilterFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(FILTER_LIST_EXTENSION))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}
