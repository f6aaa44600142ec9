import fs from "node:fs/promises";
import path from "node:path";
import { ConfigError } from "../errors.js";
import type { WorkItem } from "../types.js";
import { isMissingFile } from "../utils/files.js";

export function isUrl(entry: string): boolean {
  return entry.startsWith("http://") || entry.startsWith("https://");
}

/** Last path segment for URLs, basename for local paths. */
export function filenameFromEntry(entry: string): string {
  if (isUrl(entry)) {
    const segments = entry.split("/");
    return segments[segments.length - 1] ?? "";
  }
  return path.basename(entry);
}

/** Non-blank, trimmed lines of the work list file. A missing file is fatal. */
export async function readWorkList(file: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      throw new ConfigError(`Work list not found: ${file}`);
    }
    throw err;
  }
  return parseWorkList(raw);
}

export function parseWorkList(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * URL entries whose filename is not yet completed, in work-list order,
 * truncated to `limit` when given. Only the first URL per filename is kept,
 * since the filename names the file on disk and the ledger entry.
 */
export function selectPending(
  entries: string[],
  completed: ReadonlySet<string>,
  limit?: number
): WorkItem[] {
  const seen = new Set<string>();
  const pending: WorkItem[] = [];
  for (const url of entries.filter(isUrl)) {
    const filename = filenameFromEntry(url);
    if (filename.length === 0 || completed.has(filename) || seen.has(filename)) continue;
    seen.add(filename);
    pending.push({ url, filename });
  }
  return limit === undefined ? pending : pending.slice(0, Math.max(0, limit));
}

/** URL entries whose filename was already taken by an earlier entry. */
export function duplicateEntries(entries: string[]): string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const url of entries.filter(isUrl)) {
    const filename = filenameFromEntry(url);
    if (seen.has(filename)) duplicates.push(url);
    seen.add(filename);
  }
  return duplicates;
}
