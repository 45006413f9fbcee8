import fs from "node:fs";
import path from "node:path";
import AdmZip from "adm-zip";
import { ArchiveError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";

export interface ArchiveEntry {
  /** Entry path with forward slashes, as stored in the archive. */
  name: string;
  isDirectory: boolean;
  getData(): Buffer;
}

export interface ExtractSummary {
  written: string[];
  skipped: string[];
}

export function openArchive(bytes: Buffer): ArchiveEntry[] {
  let zip: AdmZip;
  try {
    zip = new AdmZip(bytes);
  } catch (err) {
    throw new ArchiveError(errorMessage(err), err);
  }
  return zip.getEntries().map((entry) => ({
    name: entry.entryName.replace(/\\/g, "/"),
    isDirectory: entry.isDirectory,
    getData: () => {
      try {
        return entry.getData();
      } catch (err) {
        throw new ArchiveError(`${entry.entryName}: ${errorMessage(err)}`, err);
      }
    },
  }));
}

/**
 * Resolves an entry name inside `root`. Returns undefined for names that are
 * absolute, empty or climb out of `root`.
 */
export function enclosedPath(root: string, name: string): string | undefined {
  const trimmed = name.replace(/\/+$/, "");
  if (trimmed === "" || path.isAbsolute(trimmed) || /^[A-Za-z]:/.test(trimmed)) {
    return undefined;
  }
  const out = path.resolve(root, trimmed);
  const rel = path.relative(root, out);
  if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return undefined;
  }
  return out;
}

function isHidden(name: string): boolean {
  const first = name.split("/").find((segment) => segment !== "" && segment !== ".");
  return first?.startsWith(".") ?? false;
}

function writeEntry(entry: ArchiveEntry, out: string): void {
  if (entry.isDirectory) {
    fs.mkdirSync(out, { recursive: true });
    return;
  }
  fs.mkdirSync(path.dirname(out), { recursive: true });
  fs.writeFileSync(out, entry.getData());
}

export function extractArchive(bytes: Buffer, dest: string): ExtractSummary {
  const summary: ExtractSummary = { written: [], skipped: [] };
  const root = path.resolve(dest);

  for (const entry of openArchive(bytes)) {
    const out = enclosedPath(root, entry.name);
    if (!out) {
      logger.debug(`Skipping entry outside the extraction root: ${entry.name}`);
      summary.skipped.push(entry.name);
      continue;
    }
    if (isHidden(entry.name)) {
      logger.debug(`Skipping hidden entry ${entry.name}`);
      summary.skipped.push(entry.name);
      continue;
    }

    writeEntry(entry, out);
    summary.written.push(out);
  }

  return summary;
}

/**
 * Extracts the entries below `prefix/`, with the prefix removed, into `dest`.
 */
export function extractPrefixed(bytes: Buffer, prefix: string, dest: string): ExtractSummary {
  const summary: ExtractSummary = { written: [], skipped: [] };
  const root = path.resolve(dest);
  const lead = `${prefix.replace(/\/+$/, "")}/`;

  for (const entry of openArchive(bytes)) {
    if (!entry.name.startsWith(lead)) continue;
    const rest = entry.name.slice(lead.length);
    if (rest === "") continue;

    const out = enclosedPath(root, rest);
    if (!out) {
      logger.debug(`Skipping entry outside the extraction root: ${entry.name}`);
      summary.skipped.push(entry.name);
      continue;
    }
    writeEntry(entry, out);
    summary.written.push(out);
  }

  return summary;
}

function makeScratchDir(parent: string): string {
  fs.mkdirSync(parent, { recursive: true });
  return fs.mkdtempSync(path.join(parent, ".modkeep-"));
}

function removeScratchDir(dir: string): void {
  try {
    fs.rmSync(dir, { recursive: true, force: true });
  } catch (err) {
    logger.warn(`Error removing temp directory at '${dir}': ${errorMessage(err)}`);
  }
}

/**
 * Runs `fn` with a fresh, uniquely named scratch directory under `parent`.
 * The directory is removed when `fn` settles, whatever the outcome.
 */
export async function withScratchDir<T>(
  parent: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const dir = makeScratchDir(parent);
  try {
    return await fn(dir);
  } finally {
    removeScratchDir(dir);
  }
}

export function withScratchDirSync<T>(parent: string, fn: (dir: string) => T): T {
  const dir = makeScratchDir(parent);
  try {
    return fn(dir);
  } finally {
    removeScratchDir(dir);
  }
}
