import fs from "node:fs";
import path from "node:path";
import type { CacheEntry } from "../types/index.js";
import { IoError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";

const CACHE_NAME_REGEX = /^(.+?)[_-](\d+\.\d+\.\d+)(\.zip)?$/;

export function parseCacheName(fileName: string): { name: string; version: string } | undefined {
  const match = CACHE_NAME_REGEX.exec(fileName);
  if (!match) return undefined;
  const [, name, version] = match;
  if (!name || !version) return undefined;
  return { name, version };
}

function keyOf(name: string, version: string): string {
  return `${name}@${version}`;
}

/**
 * In-memory view of the downloaded archives in a cache directory.
 */
export class Cache {
  private readonly tracked = new Map<string, CacheEntry>();

  private constructor(readonly dir: string) {}

  static build(dir: string): Cache {
    fs.mkdirSync(dir, { recursive: true });
    const cache = new Cache(dir);

    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (entry.isDirectory()) continue;
      const parsed = parseCacheName(entry.name);
      if (!parsed) {
        logger.debug(`Skipping unrecognised cache file ${entry.name}`);
        continue;
      }
      const key = keyOf(parsed.name, parsed.version);
      if (cache.tracked.has(key)) {
        logger.debug(`Ignoring duplicate cache file ${entry.name}`);
        continue;
      }
      cache.tracked.set(key, { ...parsed, path: path.join(dir, entry.name) });
    }

    return cache;
  }

  /** Whether an entry with the same name and version as `candidate`'s file name is cached. */
  check(candidate: string): boolean {
    const parsed = parseCacheName(path.basename(candidate));
    if (!parsed) return false;
    return this.tracked.has(keyOf(parsed.name, parsed.version));
  }

  get(name: string, version: string): string | undefined {
    return this.tracked.get(keyOf(name, version))?.path;
  }

  pathFor(name: string, version: string): string {
    return path.join(this.dir, `${name}_${version}.zip`);
  }

  /** Starts tracking a file written into the cache directory. */
  track(filePath: string): CacheEntry | undefined {
    const parsed = parseCacheName(path.basename(filePath));
    if (!parsed) {
      logger.debug(`Not tracking ${filePath}: unrecognised file name`);
      return undefined;
    }
    const entry = { ...parsed, path: filePath };
    this.tracked.set(keyOf(parsed.name, parsed.version), entry);
    return entry;
  }

  entries(): CacheEntry[] {
    return [...this.tracked.values()];
  }

  /**
   * Deletes every cached version of `name` other than `keepVersion`.
   * Returns whether anything was removed.
   */
  clean(name: string, keepVersion: string): boolean {
    let removed = false;
    for (const [key, entry] of [...this.tracked]) {
      if (entry.name !== name || entry.version === keepVersion) continue;
      try {
        fs.rmSync(entry.path, { force: true });
      } catch (err) {
        throw new IoError(`Unable to remove cached file ${entry.path}: ${errorMessage(err)}`, err);
      }
      this.tracked.delete(key);
      logger.debug(`Removed cached ${entry.name} ${entry.version}`);
      removed = true;
    }
    return removed;
  }
}

/**
 * Deletes cached archives under `dir`. With `force`, deletes every file.
 * Emptied subdirectories are removed.
 */
export function clearCache(dir: string, force = false): number {
  let count = 0;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      count += clearCache(full, force);
      if (fs.readdirSync(full).length === 0) fs.rmdirSync(full);
    } else if (force || path.extname(entry.name) === ".zip") {
      fs.unlinkSync(full);
      count++;
    }
  }
  return count;
}
